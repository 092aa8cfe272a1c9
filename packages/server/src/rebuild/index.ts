export * from './rebuild-trigger.js'
