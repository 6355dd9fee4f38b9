/**
 * Utility exports
 */

export * from './buffer'
