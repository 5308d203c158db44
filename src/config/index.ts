/**
 * Configuration module
 * Environment loaders with fail-fast validation, and Zod-validated tunables
 */

export * from './environment'
export * from './schema'
