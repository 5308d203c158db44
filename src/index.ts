// Core exports
export * from './errors'
export * from './observability'
export { RetryHandler, DEFAULT_RETRY_POLICY } from './runtime/retry-handler'
export type { RetryPolicy, RetryHandlerOptions, RetryPredicate } from './runtime/retry-handler'
export { JsonClient, HttpStatusError, NetworkError, MalformedResponseError, isTransientHttpError } from './runtime/http'
export type { FetchLike, JsonClientOptions } from './runtime/http'

// Configuration exports
export * from './config'

// LLM exports
export * from './ai'

// Secret-management exports
export * from './secrets'

// Turn pipeline exports
export * from './intent'
export * from './facade'
export * from './formatter'
export * from './session'
export * from './assistant'
export { createKeyscout } from './bootstrap/create-keyscout'
export type { Keyscout, KeyscoutOverrides } from './bootstrap/create-keyscout'
