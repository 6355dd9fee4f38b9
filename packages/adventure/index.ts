export * from './src/explorer'
export * from './src/room-parser'
export * from './src/scripted-world'
