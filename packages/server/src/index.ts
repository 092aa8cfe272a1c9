/**
 * @pagewatch/server
 *
 * Live-preview server: builds a document set, serves the output and reloads
 * connected browsers after every successful rebuild.
 */

export * from './types/index.js'
export * from './errors/index.js'
export * from './logging/index.js'
export * from './config/index.js'
export * from './bus/index.js'
export * from './builder/index.js'
export * from './watcher/index.js'
export * from './rebuild/index.js'
export * from './server/index.js'
export * from './supervisor/index.js'
