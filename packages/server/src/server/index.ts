export * from './router.js'
export * from './static-assets.js'
export * from './live-reload.js'
export * from './server-runtime.js'
export * from './client-reload.js'
