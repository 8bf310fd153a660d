import type {
    AgentConfig,
    CoreEvent,
    EventHandler,
    ExecutionContext,
    HistoryEntry,
    HistoryStore,
    Middleware,
    ModelMessage,
    ModelProvider,
    RunOptions,
    RunResult,
    ToolCall,
    ToolDefinition,
} from '../types'
import { EventEmitter } from '../event/emitter'
import { ToolRegistry, renderToolResult } from '../tool/registry'
import { MiddlewarePipeline } from '../middleware/pipeline'
import { createContext } from '../context/factory'
import { wrapText } from '../text/wrap'

/** Output when the tool-loop budget runs out before a final answer. */
export const MAX_ITERATIONS_MESSAGE = 'Error: Maximum tool call iterations reached.'

export const DEFAULT_HISTORY_WINDOW = 10
export const DEFAULT_WRAP_WIDTH = 100

/**
 * Agent: drives one bounded conversation per `.run()` call.
 *
 * Each iteration sends the working messages to the model. Tool calls are
 * dispatched and their results appended; the first reply without tool calls
 * ends the run. The run stops after `config.toolLoops` remote calls.
 */
export class AgentInstance {
    private readonly config: AgentConfig
    private _model: ModelProvider | undefined
    private _history: HistoryStore | null = null
    private readonly _tools: ToolRegistry = new ToolRegistry()
    private readonly _middleware: MiddlewarePipeline = new MiddlewarePipeline()
    private readonly _emitter: EventEmitter = new EventEmitter()

    constructor(config: AgentConfig = { name: 'agent' }) {
        this.config = config
        if (config.model) this._model = config.model
        if (config.history) this._history = config.history
        if (config.tools) config.tools.forEach((t) => this._tools.register(t))
        if (config.middleware) config.middleware.forEach((m) => this._middleware.use(m))
    }

    provider(model: ModelProvider): this { this._model = model; return this }
    tool(definition: ToolDefinition): this { this._tools.register(definition); return this }
    use(middleware: Middleware): this { this._middleware.use(middleware); return this }
    history(store: HistoryStore | null): this { this._history = store; return this }

    on<TPayload = unknown>(event: CoreEvent | string, handler: EventHandler<TPayload>): this {
        this._emitter.on(event, handler)
        return this
    }

    async run(options: RunOptions): Promise<RunResult> {
        const ctx = createContext({
            input: options.input,
            invocation: options.invocation,
            emitter: this._emitter,
            onEmitError: (err) => {
                process.emitWarning(`[Agent:${this.config.name}] event handler failed: ${String(err)}`)
            },
        })

        await this._emitter.emit('run:start', { input: options.input, depth: options.invocation.depth })

        try {
            await this._middleware.run({ scope: 'run:before', ctx })
            const result = await this._loop(ctx)
            ctx.state.finishedAt = new Date()
            await this._middleware.run({ scope: 'run:after', ctx })
            await this._emitter.emit('run:end', { status: result.status, output: result.output, state: ctx.state })
            return result
        } catch (err) {
            ctx.state.phase = 'failed'
            ctx.state.finishedAt = new Date()
            await this._emitter.emit('error', err)
            throw err
        }
    }

    private async _loop(ctx: ExecutionContext): Promise<RunResult> {
        const model = this._model
        if (!model) throw new Error(`[Agent:${this.config.name}] No model provider configured.`)

        const { config } = ctx.invocation
        const window = this.config.historyWindow ?? DEFAULT_HISTORY_WINDOW

        const history = await this._readHistory()
        history.push({ role: 'user', content: ctx.input })

        // Seed messages
        ctx.state.messages = []
        if (this.config.systemPrompt) {
            ctx.state.messages.push({ role: 'system', content: this.config.systemPrompt })
        }
        // the current query is always sent, even with a window below 1
        for (const entry of history.slice(-Math.max(1, window))) {
            ctx.state.messages.push({ role: entry.role, content: entry.content })
        }

        const tools = this._tools.getSchemas()

        for (let i = 0; i < config.toolLoops; i++) {
            ctx.state.phase = 'awaiting_response'
            ctx.state.iterations = i + 1
            await this._middleware.run({ scope: 'step:before', ctx })

            await this._emitter.emit('model:request', { iteration: i + 1, messages: ctx.state.messages.length })
            const response = await model.complete({
                messages: [...ctx.state.messages],
                tools,
                model: config.model,
                maxTokens: config.maxTokens,
            })
            if (response.usage) {
                ctx.state.usage.promptTokens += response.usage.promptTokens
                ctx.state.usage.completionTokens += response.usage.completionTokens
                ctx.state.usage.totalTokens += response.usage.totalTokens
            }
            await this._emitter.emit('model:response', { iteration: i + 1, toolCalls: response.toolCalls?.length ?? 0 })

            ctx.state.messages.push(response.message)
            await this._middleware.run({ scope: 'step:after', ctx })

            const toolCalls = response.toolCalls ?? []
            if (toolCalls.length > 0) {
                ctx.state.phase = 'tool_dispatch'
                for (const call of toolCalls) {
                    await this._dispatch(ctx, call)
                }
                continue
            }

            const text = response.message.content
            history.push({ role: 'assistant', content: text })
            await this._writeHistory(history)

            ctx.state.phase = 'finalized'
            return {
                status: 'finalized',
                output: wrapText(text, this.config.wrapWidth ?? DEFAULT_WRAP_WIDTH),
                text,
                state: ctx.state,
            }
        }

        ctx.state.phase = 'iterations_exhausted'
        return { status: 'iterations_exhausted', output: MAX_ITERATIONS_MESSAGE, state: ctx.state }
    }

    private async _dispatch(ctx: ExecutionContext, call: ToolCall): Promise<void> {
        const { name, arguments: args } = call

        await this._emitter.emit('tool:before', { tool: name, args })
        await this._middleware.run({ scope: 'tool:before', ctx, tool: { name, args } })

        const result = await this._tools.dispatch(call, ctx)
        const content = renderToolResult(result)

        ctx.state.toolCalls.push({ call, result })
        const message: ModelMessage = { role: 'tool', name, toolCallId: call.id, content }
        ctx.state.messages.push(message)

        await this._emitter.emit('tool:after', { tool: name, result })
        await this._middleware.run({ scope: 'tool:after', ctx, tool: { name, args, result: content } })
    }

    private async _readHistory(): Promise<HistoryEntry[]> {
        if (!this._history) return []
        await this._emitter.emit('history:read', { store: this._history.type, location: this._history.location })
        return [...(await this._history.load())]
    }

    private async _writeHistory(entries: HistoryEntry[]): Promise<void> {
        if (!this._history) return
        await this._emitter.emit('history:write', { store: this._history.type, entries: entries.length })
        await this._history.save(entries)
    }
}

/**
 * Creates an agent instance from a configuration object.
 *
 * @example
 * ```ts
 * const agent = createAgent({ name: 'aido', systemPrompt })
 *     .provider(openai({ apiKey }))
 *     .history(new JsonFileHistory({ path }))
 * ```
 */
export function createAgent(config?: AgentConfig): AgentInstance {
    return new AgentInstance(config)
}
