export * from './buffered'
export * from './terminal'
