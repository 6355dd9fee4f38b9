/**
 * Centralized Type Definitions
 *
 * Shared interfaces, result tuples and error classes used by every package
 * in the workspace.
 */

export * from './errors'
export * from './room'
// Safe types for error handling
export * from './safe'
export * from './vm'
