import {setTimeout as wait} from 'node:timers/promises'
import chalk, {type ChalkInstance} from 'chalk'
import {advanceAnimation, initialAnimationState, type AnimationState} from './animation-state.js'
import {defaultScene, type Scene} from './assets.js'
import {renderFrame, resolveViewport, type TerminalSize} from './frame.js'

// 10 frames per second
export const FRAME_DELAY_MS = 1000 / 10

export interface FrameSink extends TerminalSize {
  write(chunk: string): boolean
}

export type PlayOptions = {
  output: FrameSink
  signal: AbortSignal
  scene?: Scene
  colors?: ChalkInstance
  frameDelayMs?: number
  onFrame?: (state: AnimationState) => void
}

/**
 * Draws one frame with a single write, then returns the state for the next one.
 */
export function tick(state: AnimationState, scene: Scene, output: FrameSink, colors: ChalkInstance = chalk): AnimationState {
  output.write(renderFrame(scene, state, resolveViewport(output), colors))
  return advanceAnimation(state, scene)
}

/**
 * Runs frames until `signal` aborts. The sleep between frames is the only
 * place cancellation is observed, so a frame is never cut off halfway.
 */
export async function playAnimation(options: PlayOptions): Promise<AnimationState> {
  const {output, signal, scene = defaultScene, colors = chalk, frameDelayMs = FRAME_DELAY_MS, onFrame} = options
  let state = initialAnimationState

  while (!signal.aborted) {
    state = tick(state, scene, output, colors)
    onFrame?.(state)

    try {
      await wait(frameDelayMs, undefined, {signal})
    } catch (error) {
      if (signal.aborted) break
      throw error
    }
  }

  return state
}
