export * from './source-watcher.js'
