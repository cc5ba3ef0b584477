import chalk, {type ChalkInstance} from 'chalk'
import {ansi} from './ansi.js'
import type {AnimationState} from './animation-state.js'
import type {Logo, Scene} from './assets.js'

export type Viewport = {
  width: number
  height: number
}

export type FrameLayout = {
  topPadding: number
  leftPadding: number
  fillLines: number
}

/** The subset of a tty.WriteStream needed to learn the terminal size. */
export interface TerminalSize {
  isTTY?: boolean
  columns?: number
  rows?: number
}

export const FALLBACK_VIEWPORT: Viewport = {width: 80, height: 24}

export function resolveViewport(output: TerminalSize): Viewport {
  const {columns, rows} = output
  if (!output.isTTY || !columns || !rows) return {...FALLBACK_VIEWPORT}
  return {width: columns, height: rows}
}

export function computeLayout(viewport: Viewport, logo: Logo): FrameLayout {
  // One row is reserved for the scroller and one as a gap above it
  const topPadding = Math.max(0, Math.floor((viewport.height - logo.height - 2) / 2))
  const leftPadding = Math.max(0, Math.floor((viewport.width - logo.width) / 2))
  // Fill follows the clamped top padding so a frame that fits is exactly viewport.height rows
  const fillLines = Math.max(0, viewport.height - topPadding - logo.height - 1)
  return {topPadding, leftPadding, fillLines}
}

/**
 * Visible slice of a circularly repeating text. Appending the text's own
 * prefix makes the slice cross the end of the text without a special case.
 */
export function scrollWindow(text: string, offset: number, width: number): string {
  if (width <= 0) return ''
  return (text + text.slice(0, width)).slice(offset, offset + width)
}

export function scrollerLine(text: string, offset: number, width: number): string {
  if (width <= 0) return ''
  return scrollWindow(text, offset, width).padEnd(width)
}

export function renderFrame(scene: Scene, state: AnimationState, viewport: Viewport, colors: ChalkInstance = chalk): string {
  const {topPadding, leftPadding, fillLines} = computeLayout(viewport, scene.logo)
  const paint = colors[scene.palette[state.paletteIndex]]
  const indent = ' '.repeat(leftPadding)

  let frame = ansi.cursorHome
  if (topPadding > 0) frame += '\n'.repeat(topPadding)

  for (const line of scene.logo.lines) {
    frame += `${indent}${paint(line)}\n`
  }

  if (fillLines > 0) frame += '\n'.repeat(fillLines)

  frame += colors.bold.yellowBright(scrollerLine(scene.scrollText, state.scrollOffset, viewport.width))
  return frame
}
