export * from './command-builder.js'
