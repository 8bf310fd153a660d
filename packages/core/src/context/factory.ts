import type { ExecutionContext, ExecutionState, InvocationContext, TokenUsage } from '../types'
import type { EventEmitter } from '../event/emitter'

function emptyUsage(): TokenUsage {
    return { promptTokens: 0, completionTokens: 0, totalTokens: 0 }
}

function emptyState(): ExecutionState {
    return {
        phase: 'start',
        iterations: 0,
        messages: [],
        toolCalls: [],
        usage: emptyUsage(),
        startedAt: new Date(),
    }
}

export interface CreateContextOptions {
    input: string
    invocation: InvocationContext
    emitter: EventEmitter
    /** Receives errors thrown by handlers of events emitted through `ctx.emit` */
    onEmitError: (err: unknown) => void
}

/**
 * Creates an isolated ExecutionContext for a single `.run()` call.
 */
export function createContext(options: CreateContextOptions): ExecutionContext {
    const { input, invocation, emitter, onEmitError } = options

    return {
        input,
        invocation,
        state: emptyState(),
        emit(event, payload) {
            emitter.emit(event, payload).catch((err: unknown) => onEmitError(err))
        },
    }
}
