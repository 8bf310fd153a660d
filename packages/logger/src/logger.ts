import type { Middleware, MiddlewareContext, MiddlewareScope, NextFn } from '@aido/core'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const satisfies readonly LogLevel[]

export interface LogEntry {
    level: LogLevel
    scope: MiddlewareScope
    tool?: string | undefined
    timestamp: string
    durationMs?: number | undefined
    meta?: Record<string, unknown> | undefined
}

export type LogTransport = (entry: LogEntry) => void

export interface LoggerMiddlewareConfig {
    /**
     * Minimum log level to emit.
     * @default 'info'
     */
    level?: LogLevel | undefined

    /**
     * Which middleware scopes to log.
     * Defaults to all scopes.
     */
    scopes?: MiddlewareScope[] | undefined

    /**
     * Custom transport. Defaults to one line per entry on stderr.
     */
    transport?: LogTransport | undefined

    /**
     * Whether to measure and log duration per scope pair (e.g. before→after).
     * @default true
     */
    timing?: boolean | undefined

    /**
     * Prefix prepended to all log output (when using default transport).
     * @default '[aido]'
     */
    prefix?: string | undefined

    /** Clock, for tests */
    now?: (() => number) | undefined
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 99,
}

function shouldLog(entry: LogLevel, min: LogLevel): boolean {
    return LEVEL_RANK[entry] >= LEVEL_RANK[min]
}

// stdout carries the answer; diagnostics go to stderr
const stderrConsole = new console.Console({ stdout: process.stderr, stderr: process.stderr })

export function formatEntry(prefix: string, entry: LogEntry): string {
    const { level, scope, timestamp, durationMs, tool, meta } = entry

    const parts: string[] = [
        prefix,
        `[${timestamp}]`,
        `[${level.toUpperCase()}]`,
        `scope=${scope}`,
    ]

    if (tool) parts.push(`tool=${tool}`)
    if (durationMs !== undefined) parts.push(`duration=${durationMs}ms`)
    if (meta && Object.keys(meta).length) parts.push(JSON.stringify(meta))

    return parts.join(' ')
}

function defaultTransport(prefix: string, out: Console = stderrConsole): LogTransport {
    return (entry: LogEntry) => {
        const line = formatEntry(prefix, entry)

        switch (entry.level) {
            case 'debug':
                out.debug(line)
                break
            case 'info':
                out.info(line)
                break
            case 'warn':
                out.warn(line)
                break
            case 'error':
                out.error(line)
                break
        }
    }
}

function scopeToLevel(scope: MiddlewareScope): LogLevel {
    switch (scope) {
        case 'run:before':
        case 'run:after':
            return 'info'
        case 'step:before':
        case 'step:after':
        case 'tool:before':
        case 'tool:after':
            return 'debug'
    }
}

function beforeMeta({ scope, ctx, tool }: MiddlewareContext): Record<string, unknown> {
    const { depth, config } = ctx.invocation
    switch (scope) {
        case 'run:before':
            return { depth, model: config.model, toolLoops: config.toolLoops, history: config.history }
        case 'step:before':
            return { depth, iteration: ctx.state.iterations }
        default:
            return { depth, args: tool?.args }
    }
}

function afterMeta({ scope, ctx, tool }: MiddlewareContext): Record<string, unknown> {
    const { depth } = ctx.invocation
    switch (scope) {
        case 'run:after':
            return { depth, phase: ctx.state.phase, iterations: ctx.state.iterations, usage: ctx.state.usage }
        case 'step:after':
            return { depth, iteration: ctx.state.iterations }
        default:
            return { depth, result: tool?.result }
    }
}

/**
 * Structured logging middleware for the agent loop.
 *
 * Logs lifecycle events across all (or selected) scopes with optional timing.
 * Every entry carries the invocation depth, so nested runs can be told apart.
 *
 * @example
 * ```ts
 * agent.use(createLogger())
 * agent.use(createLogger({ level: 'debug', timing: true }))
 * agent.use(createLogger({ transport: (entry) => entries.push(entry) }))
 * ```
 */
export function createLogger(config: LoggerMiddlewareConfig = {}): Middleware {
    const {
        level: minLevel = 'info',
        scopes,
        timing = true,
        prefix = '[aido]',
        transport = defaultTransport(prefix),
        now = Date.now,
    } = config

    // Timing store: scope pair + tool → start time
    const timers = new Map<string, number>()

    return {
        name: 'logger',
        run: async (mCtx: MiddlewareContext, next: NextFn) => {
            const { scope, tool } = mCtx

            if (minLevel === 'silent' || (scopes && !scopes.includes(scope))) {
                await next()
                return
            }

            const level = scopeToLevel(scope)
            if (!shouldLog(level, minLevel)) {
                await next()
                return
            }

            const pair = scope.slice(0, scope.indexOf(':'))
            const timerKey = `${pair}:${tool?.name ?? ''}`

            // ── BEFORE scopes: start timer & log entry ──
            if (scope.endsWith(':before')) {
                if (timing) timers.set(timerKey, now())

                transport({
                    level,
                    scope,
                    timestamp: new Date(now()).toISOString(),
                    tool: tool?.name,
                    meta: beforeMeta(mCtx),
                })

                await next()
                return
            }

            // ── AFTER scopes: compute duration & log ──
            let durationMs: number | undefined
            if (timing) {
                const start = timers.get(timerKey)
                if (start !== undefined) {
                    durationMs = now() - start
                    timers.delete(timerKey)
                }
            }

            await next()

            transport({
                level,
                scope,
                timestamp: new Date(now()).toISOString(),
                tool: tool?.name,
                durationMs,
                meta: afterMeta(mCtx),
            })
        },
    }
}
