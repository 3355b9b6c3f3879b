export * from './level'
export * from './site'
export * from './config'
