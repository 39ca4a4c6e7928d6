export { compile, tryCompile, compiledPin } from './compile'
export type { CompiledGraph, CompiledNode, CompiledPin, CompileResult } from './compile'
export { CompileError, VALIDATION_MESSAGES } from './errors'
export type { ValidationErrorKind, ErrorLocation } from './errors'
export { effectiveType, referencedVariable } from './effectiveType'
export { validate } from './validate'
