// Types
export * from './types'

// Errors
export { AidoError, ConfigurationError, ModelError, TransportError, errorCode, errorMessage } from './errors'
export type { ModelErrorOptions } from './errors'

// Agent
export { AgentInstance, createAgent, MAX_ITERATIONS_MESSAGE, DEFAULT_HISTORY_WINDOW, DEFAULT_WRAP_WIDTH } from './agent/agent'

// Policy
export { DEFAULT_POLICY, HISTORY_MODES, OVERRIDE_PERMISSIONS } from './policy/defaults'
export {
    applyCaps,
    applyOverrides,
    historyRank,
    maxDepthOf,
    mergeProfile,
    resolveEffectiveConfig,
} from './policy/resolver'
export { parsePolicy, PolicyProfileSchema, DepthCapSchema, RecursionSchema } from './policy/schema'

// Recursion
export {
    DEFAULT_PROGRAM_NAMES,
    DEPTH_ENV_VAR,
    decorateCommand,
    depthLimitCommand,
    isSelfInvocation,
    parseDepth,
} from './recursion/guard'
export type { RecursionGuardOptions } from './recursion/guard'

// Transport
export {
    DEFAULT_BASE_DELAY_MS,
    DEFAULT_MAX_DELAY_MS,
    DEFAULT_MAX_RETRIES,
    MIN_BACKOFF_MS,
    clampWait,
    computeBackoff,
    parseRetryHint,
    retryAfterFromHeaders,
    withRetry,
} from './transport/retry'
export type { BackoffHint, BackoffOptions, RetryOptions, RetryState } from './transport/retry'

// Tools
export { ToolRegistry, defineTool, renderToolResult, toolResult } from './tool/registry'

// Middleware
export { MiddlewarePipeline } from './middleware/pipeline'

// Event
export { EventEmitter } from './event/emitter'

// Context
export { createContext } from './context/factory'
export type { CreateContextOptions } from './context/factory'

// Utilities
export { wrapText } from './text/wrap'
export { atomicWrite } from './fs/atomic'
export type { AtomicWriteOps } from './fs/atomic'
