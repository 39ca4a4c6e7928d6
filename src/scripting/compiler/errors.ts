// ═══════════════════════════════════════════════════════════════════════════
// Compile Errors
// ═══════════════════════════════════════════════════════════════════════════

import type { NodeId, PinId } from '../model/graph'

export type ValidationErrorKind =
  | 'DuplicateVariable'
  | 'UnknownPin'
  | 'CrossGraphLink'
  | 'DirectionMismatch'
  | 'TypeMismatch'
  | 'MultipleExecInputs'
  | 'MultipleDataInputs'
  | 'UnknownVariable'
  | 'ExecCycle'

export const VALIDATION_MESSAGES: Record<ValidationErrorKind, string> = {
  DuplicateVariable: 'duplicate variable name',
  UnknownPin: 'link refers to unknown pin',
  CrossGraphLink: 'link crosses graphs',
  DirectionMismatch: 'pin direction mismatch',
  TypeMismatch: 'pin type mismatch',
  MultipleExecInputs: 'multiple exec inputs connected',
  MultipleDataInputs: 'multiple links into one data input',
  UnknownVariable: 'unknown variable',
  ExecCycle: 'exec flow cycle detected',
}

export interface ErrorLocation {
  nodeId?: NodeId
  pinId?: PinId
}

/**
 * Static fault in a graph. Carries the offending node and/or pin so an editor
 * can highlight it without parsing the message.
 */
export class CompileError extends Error {
  readonly kind: ValidationErrorKind
  readonly nodeId?: NodeId
  readonly pinId?: PinId

  constructor(kind: ValidationErrorKind, location: ErrorLocation = {}) {
    super(
      `compile failed: ${VALIDATION_MESSAGES[kind]} ` +
        `(node=${location.nodeId ?? 'none'} pin=${location.pinId ?? 'none'})`
    )
    this.name = 'CompileError'
    this.kind = kind
    this.nodeId = location.nodeId
    this.pinId = location.pinId
  }
}
