export * from './site'
export * from './check'
export * from './report'
export * from './config'
