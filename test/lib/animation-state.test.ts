import {expect} from 'chai'
import {advanceAnimation, initialAnimationState, type AnimationState} from '../../src/lib/animation-state.js'
import {PALETTE, SCROLL_TEXT, defaultScene} from '../../src/lib/assets.js'

function advanceTimes(ticks: number): AnimationState {
  let state = initialAnimationState
  for (let i = 0; i < ticks; i++) state = advanceAnimation(state, defaultScene)
  return state
}

describe('animation state', () => {
  it('starts at the first color and the start of the text', () => {
    expect(initialAnimationState).to.deep.equal({frame: 0, scrollOffset: 0, paletteIndex: 0})
  })

  it('keeps both counters modular after any number of ticks', () => {
    for (const ticks of [0, 1, 4, 5, 6, 13, SCROLL_TEXT.length - 1, SCROLL_TEXT.length, SCROLL_TEXT.length + 3]) {
      const state = advanceTimes(ticks)
      expect(state.frame).to.equal(ticks)
      expect(state.scrollOffset, `after ${ticks} ticks`).to.equal(ticks % SCROLL_TEXT.length)
      expect(state.paletteIndex, `after ${ticks} ticks`).to.equal(ticks % PALETTE.length)
    }
  })

  it('returns to the first color after one full palette rotation', () => {
    expect(advanceTimes(PALETTE.length - 1).paletteIndex).to.equal(PALETTE.length - 1)
    expect(advanceTimes(PALETTE.length).paletteIndex).to.equal(0)
  })

  it('does not mutate the previous state', () => {
    const before = {frame: 2, scrollOffset: 2, paletteIndex: 2}
    const after = advanceAnimation(before, defaultScene)
    expect(before).to.deep.equal({frame: 2, scrollOffset: 2, paletteIndex: 2})
    expect(after).to.deep.equal({frame: 3, scrollOffset: 3, paletteIndex: 3})
  })
})
