/**
 * Unit tests for the general helpers.
 */

import { describe, it, expect } from 'vitest'
import { formatDuration, generateId, isPlainObject, preview } from '../helpers.js'

describe('formatDuration', () => {
  it('formats milliseconds, seconds and minutes', () => {
    expect(formatDuration(250)).toBe('250ms')
    expect(formatDuration(1500)).toBe('1.5s')
    expect(formatDuration(125_000)).toBe('2m 5s')
  })
})

describe('generateId', () => {
  it('prefixes a uuid', () => {
    expect(generateId('dlb')).toMatch(/^dlb-[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/)
  })

  it('returns a bare uuid without a prefix', () => {
    expect(generateId()).toMatch(/^[0-9a-f-]{36}$/)
  })
})

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
  })

  it('rejects arrays, dates and primitives', () => {
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject('x')).toBe(false)
    expect(isPlainObject(null)).toBe(false)
  })
})

describe('preview', () => {
  it('keeps short text', () => {
    expect(preview('short')).toBe('short')
  })

  it('cuts long text with an ellipsis', () => {
    expect(preview('abcdefghij', 4)).toBe('abcd...')
  })
})
