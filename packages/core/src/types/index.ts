// ─── Model Provider Types ───────────────────────────────────────────────────

export interface ModelMessage {
    role: 'system' | 'user' | 'assistant' | 'tool'
    content: string
    /** Tool name, set on `tool` messages */
    name?: string | undefined
    toolCallId?: string | undefined
    toolCalls?: ToolCall[] | undefined
}

export interface ToolCall {
    id: string
    name: string
    arguments: Record<string, unknown>
}

export interface ModelRequest {
    messages: ModelMessage[]
    tools?: ToolSchema[] | undefined
    /** Overrides the provider's default model for this call */
    model?: string | undefined
    /** Overrides the provider's default output token limit for this call */
    maxTokens?: number | undefined
}

export interface ModelResponse {
    message: ModelMessage
    toolCalls?: ToolCall[] | undefined
    usage?: TokenUsage | undefined
    raw?: unknown
}

export interface TokenUsage {
    promptTokens: number
    completionTokens: number
    totalTokens: number
}

export interface ModelProvider {
    name: string
    complete(request: ModelRequest): Promise<ModelResponse>
}

// ─── Tool Types ──────────────────────────────────────────────────────────────

export interface ToolSchema {
    name: string
    description: string
    parameters: Record<string, unknown> // JSON Schema
}

/**
 * Outcome classes for a tool call. Anything other than `ok`, `empty` and
 * `truncated` is reported back to the model as an error line.
 */
export type ToolResultKind =
    | 'ok'
    | 'empty'
    | 'truncated'
    | 'refused'
    | 'missing'
    | 'invalid'
    | 'failed'

export interface ToolResult {
    kind: ToolResultKind
    message: string
}

export interface ToolDefinition {
    schema: ToolSchema
    execute(args: Record<string, unknown>, ctx: ExecutionContext): Promise<ToolResult>
}

// ─── History Types ───────────────────────────────────────────────────────────

export interface HistoryEntry {
    role: 'user' | 'assistant'
    content: string
}

/**
 * Conversation log that survives between invocations.
 * Loaded once before the loop starts, saved once after a final answer.
 */
export interface HistoryStore {
    readonly type: string
    /** Where the log lives, for display only */
    readonly location?: string | undefined
    load(): Promise<HistoryEntry[]>
    save(entries: HistoryEntry[]): Promise<void>
}

// ─── Policy Types ────────────────────────────────────────────────────────────

/** Ordered from most to least durable. */
export type HistoryMode = 'persist' | 'temp' | 'none'

export type OverridePermission = 'all' | 'safe' | 'none'

export interface EffectiveConfig {
    model: string
    maxTokens: number
    toolLoops: number
    history: HistoryMode
    overridePermission: OverridePermission
}

export type PolicyProfile = {
    [K in keyof EffectiveConfig]?: EffectiveConfig[K] | undefined
}

export interface DepthCap {
    maxTokens?: number | undefined
    toolLoops?: number | undefined
    /** History modes permitted at this depth */
    history?: HistoryMode[] | undefined
}

export interface RecursionPolicy {
    maxDepth: number
}

export interface Policy {
    defaults: EffectiveConfig
    profiles: Record<number, PolicyProfile>
    caps: Record<number, DepthCap>
    recursion: RecursionPolicy
}

export interface ConfigOverrides {
    maxTokens?: number | undefined
    toolLoops?: number | undefined
    history?: HistoryMode | undefined
}

// ─── Execution Context ───────────────────────────────────────────────────────

/**
 * Values fixed for the lifetime of one invocation.
 * Built once at process start and threaded through every component.
 */
export interface InvocationContext {
    readonly depth: number
    readonly maxDepth: number
    readonly cwd: string
    readonly config: EffectiveConfig
}

export type LoopPhase =
    | 'start'
    | 'awaiting_response'
    | 'tool_dispatch'
    | 'finalized'
    | 'iterations_exhausted'
    | 'failed'

export interface ExecutionState {
    phase: LoopPhase
    /** Remote calls made so far */
    iterations: number
    messages: ModelMessage[]
    toolCalls: Array<{ call: ToolCall; result: ToolResult }>
    usage: TokenUsage
    startedAt: Date
    finishedAt?: Date | undefined
}

export interface ExecutionContext {
    /** User query for this run */
    input: string
    invocation: InvocationContext
    /** Internal runtime state, read-only outside the agent */
    state: ExecutionState
    /** Emit a custom event */
    emit(event: string, payload?: unknown): void
}

// ─── Middleware Types ─────────────────────────────────────────────────────────

export type MiddlewareScope =
    | 'run:before'
    | 'run:after'
    | 'step:before'
    | 'step:after'
    | 'tool:before'
    | 'tool:after'

export interface MiddlewareContext {
    scope: MiddlewareScope
    ctx: ExecutionContext
    /** Tool-specific context, present when scope is tool:* */
    tool?: {
        name: string
        args: Record<string, unknown>
        result?: string | undefined
    } | undefined
}

export type NextFn = () => Promise<void>

export interface Middleware {
    name?: string
    scope?: MiddlewareScope | MiddlewareScope[]
    run(mCtx: MiddlewareContext, next: NextFn): Promise<void>
}

// ─── Event Types ─────────────────────────────────────────────────────────────

export type CoreEvent =
    | 'run:start'
    | 'run:end'
    | 'model:request'
    | 'model:response'
    | 'tool:before'
    | 'tool:after'
    | 'history:read'
    | 'history:write'
    | 'error'

export type EventHandler<TPayload = unknown> = (payload: TPayload) => void | Promise<void>

// ─── Agent Config Types ───────────────────────────────────────────────────────

export interface AgentConfig {
    name: string
    model?: ModelProvider
    tools?: ToolDefinition[]
    history?: HistoryStore | null
    middleware?: Middleware[]
    systemPrompt?: string
    /**
     * Number of trailing history entries replayed into each run, counting
     * the current query. `0` sends the query alone.
     * @default 10
     */
    historyWindow?: number
    /**
     * Column width the final answer is reflowed to.
     * @default 100
     */
    wrapWidth?: number
}

export interface RunOptions {
    input: string
    invocation: InvocationContext
}

export type RunStatus = 'finalized' | 'iterations_exhausted'

export interface RunResult {
    status: RunStatus
    /** Display text: the wrapped answer, or the exhaustion notice */
    output: string
    /** Unwrapped final answer, absent when iterations ran out */
    text?: string | undefined
    state: ExecutionState
}
