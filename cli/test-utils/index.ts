export * from './types.js'
export * from './certificates.js'
export * from './compression.js'
export * from './target-servers.js'
export * from './control-plane.js'
export * from './dispatcher.js'
export * from './fixtures.js'
