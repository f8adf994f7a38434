/**
 * Central configuration export point.
 */

export * from './app.config'
export * from './sort.config'
