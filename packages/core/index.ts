/**
 * Core Package
 *
 * Logging, environment configuration and byte utilities shared by every
 * package in the workspace.
 */

export * from './src/env'
export * from './src/logger'
export * from './src/utils'
