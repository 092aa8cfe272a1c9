export * from './reload-bus.js'
