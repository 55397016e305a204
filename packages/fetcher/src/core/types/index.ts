export * from './cache.js'
export * from './config.js'
export * from './package.js'
export * from './source.js'
export * from './version.js'
