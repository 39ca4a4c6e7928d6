// ═══════════════════════════════════════════════════════════════════════════
// Values - Scalar data types carried by pins and variables
// ═══════════════════════════════════════════════════════════════════════════

export const DATA_TYPES = ['Exec', 'Bool', 'I32', 'F32', 'String', 'Unit'] as const

export type DataType = (typeof DATA_TYPES)[number]

export type Value =
  | { type: 'Bool'; value: boolean }
  | { type: 'I32'; value: number }
  | { type: 'F32'; value: number }
  | { type: 'String'; value: string }
  | { type: 'Unit' }

export type ValueType = Value['type']

const I32_MIN = -2147483648
const I32_MAX = 2147483647

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const UNIT: Value = { type: 'Unit' }

export function boolValue(value: boolean): Value {
  return { type: 'Bool', value }
}

/** Truncates toward zero and wraps into the signed 32-bit range. */
export function i32Value(value: number): Value {
  return { type: 'I32', value: value | 0 }
}

export function f32Value(value: number): Value {
  return { type: 'F32', value: Math.fround(value) }
}

export function stringValue(value: string): Value {
  return { type: 'String', value }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** The data type a value belongs to. */
export function valueDataType(value: Value): DataType {
  return value.type
}

/** Zero value used when a variable has no explicit default. */
export function zeroValue(type: DataType): Value {
  switch (type) {
    case 'Bool':
      return boolValue(false)
    case 'I32':
      return i32Value(0)
    case 'F32':
      return f32Value(0)
    case 'String':
      return stringValue('')
    case 'Exec':
    case 'Unit':
      return UNIT
  }
}

export function isI32(n: number): boolean {
  return Number.isInteger(n) && n >= I32_MIN && n <= I32_MAX
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a.type === 'Unit' || b.type === 'Unit') return a.type === b.type
  return a.type === b.type && a.value === b.value
}

export function cloneValue(value: Value): Value {
  return { ...value }
}

/** Human readable rendering, used for logs and inspectors. */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'Unit':
      return '()'
    case 'String':
      return value.value
    default:
      return String(value.value)
  }
}

export function asString(value: Value | undefined): string | undefined {
  return value?.type === 'String' ? value.value : undefined
}

export function asBool(value: Value | undefined): boolean | undefined {
  return value?.type === 'Bool' ? value.value : undefined
}
