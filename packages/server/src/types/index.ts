export * from './serving.js'
