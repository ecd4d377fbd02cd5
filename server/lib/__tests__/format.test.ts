import { describe, it, expect } from 'vitest'
import { formatChain, formatChains } from '../format'

describe('formatChain', () => {
  it('joins with an arrow by default', () => {
    expect(formatChain(['sat', 'at', 'a'])).toBe('sat => at => a')
  })

  it('accepts another separator', () => {
    expect(formatChain(['sat', 'at'], ', ')).toBe('sat, at')
  })

  it('prints a lone word as is', () => {
    expect(formatChain(['cat'])).toBe('cat')
  })
})

describe('formatChains', () => {
  it('gives one line per chain', () => {
    expect(formatChains([['abc', 'bc', 'c'], ['abc', 'ab', 'a']])).toEqual([
      'abc => bc => c',
      'abc => ab => a'
    ])
  })
})
