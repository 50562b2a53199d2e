/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { StepwiseRuntimeError, isRuntimeError } from './runtime-error.js';
export type { SerializedRuntimeError } from './runtime-error.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity, StepwiseErrorCode } from './types.js';
