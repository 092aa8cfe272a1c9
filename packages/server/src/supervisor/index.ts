export * from './serving-context.js'
export * from './fatal-hook.js'
export * from './open-browser.js'
export * from './supervisor.js'
