export * from './fields'
export * from './identifier'
export * from './record'
