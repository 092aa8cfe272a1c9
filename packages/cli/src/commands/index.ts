export * from './serve.js'
export * from './build.js'
