export * from './arithmetic'
export * from './base'
export * from './bitwise'
export * from './comparison'
export * from './control-flow'
export * from './io'
export * from './memory'
export * from './register'
export * from './registry'
export * from './stack'
