import type {Scene} from './assets.js'

/**
 * Everything that carries over from one frame to the next.
 * Each tick produces a new value instead of mutating the old one.
 */
export type AnimationState = {
  readonly frame: number
  readonly scrollOffset: number
  readonly paletteIndex: number
}

export const initialAnimationState: AnimationState = {frame: 0, scrollOffset: 0, paletteIndex: 0}

export function advanceAnimation(state: AnimationState, scene: Scene): AnimationState {
  return {
    frame: state.frame + 1,
    scrollOffset: (state.scrollOffset + 1) % scene.scrollText.length,
    paletteIndex: (state.paletteIndex + 1) % scene.palette.length,
  }
}
