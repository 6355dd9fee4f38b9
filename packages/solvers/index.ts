export * from './src/coins'
export * from './src/room-search'
export * from './src/teleporter'
export * from './src/vault'
