import { describe, it, expect } from 'vitest'
import {
  asBool,
  asString,
  boolValue,
  f32Value,
  formatValue,
  i32Value,
  isI32,
  stringValue,
  UNIT,
  valuesEqual,
  zeroValue,
} from './values'

describe('values', () => {
  it('should produce zero values per data type', () => {
    expect(zeroValue('Bool')).toEqual({ type: 'Bool', value: false })
    expect(zeroValue('I32')).toEqual({ type: 'I32', value: 0 })
    expect(zeroValue('F32')).toEqual({ type: 'F32', value: 0 })
    expect(zeroValue('String')).toEqual({ type: 'String', value: '' })
    expect(zeroValue('Exec')).toEqual({ type: 'Unit' })
    expect(zeroValue('Unit')).toEqual({ type: 'Unit' })
  })

  it('should keep I32 values in the signed 32-bit range', () => {
    expect(i32Value(3.9)).toEqual({ type: 'I32', value: 3 })
    expect(i32Value(2147483648)).toEqual({ type: 'I32', value: -2147483648 })
  })

  it('should round F32 values to single precision', () => {
    expect(f32Value(0.1)).toEqual({ type: 'F32', value: Math.fround(0.1) })
    expect(f32Value(0.5)).toEqual({ type: 'F32', value: 0.5 })
  })

  it('should detect 32-bit integers', () => {
    expect(isI32(2147483647)).toBe(true)
    expect(isI32(2147483648)).toBe(false)
    expect(isI32(1.5)).toBe(false)
  })

  it('should compare values by type and payload', () => {
    expect(valuesEqual(i32Value(1), i32Value(1))).toBe(true)
    expect(valuesEqual(i32Value(1), f32Value(1))).toBe(false)
    expect(valuesEqual(UNIT, { type: 'Unit' })).toBe(true)
    expect(valuesEqual(UNIT, stringValue(''))).toBe(false)
  })

  it('should format values for display', () => {
    expect(formatValue(UNIT)).toBe('()')
    expect(formatValue(boolValue(true))).toBe('true')
    expect(formatValue(stringValue('hi'))).toBe('hi')
    expect(formatValue(i32Value(-4))).toBe('-4')
  })

  it('should narrow values by type', () => {
    expect(asString(stringValue('a'))).toBe('a')
    expect(asString(boolValue(true))).toBeUndefined()
    expect(asBool(boolValue(true))).toBe(true)
    expect(asBool(undefined)).toBeUndefined()
  })
})
