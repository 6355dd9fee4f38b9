export * from './src/addressing'
export * from './src/config'
export * from './src/disassembler'
export * from './src/instructions'
export * from './src/memory'
export * from './src/operand-stack'
export * from './src/program-builder'
export * from './src/program-loader'
export * from './src/snapshot'
export * from './src/transports'
export * from './src/vm'
