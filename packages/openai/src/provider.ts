import OpenAI from 'openai'
import { z } from 'zod'
import { ModelError, TransportError, errorMessage, retryAfterFromHeaders, withRetry } from '@aido/core'
import type {
    ModelMessage,
    ModelProvider,
    ModelRequest,
    ModelResponse,
    RetryOptions,
    TokenUsage,
    ToolCall,
} from '@aido/core'

export const DEFAULT_MODEL = 'gpt-4o-mini'
export const DEFAULT_TIMEOUT_MS = 120_000

/**
 * The slice of the SDK client the provider calls. Tests pass a fake.
 */
export interface ChatCompletionsClient {
    chat: {
        completions: {
            create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<unknown>
        }
    }
}

export interface OpenAIProviderConfig {
    apiKey: string
    /**
     * Used when a request names no model.
     * @default 'gpt-4o-mini'
     */
    model?: string | undefined
    /** OpenAI-compatible endpoint root, e.g. `http://localhost:8080/v1` */
    baseURL?: string | undefined
    organization?: string | undefined
    /** Used when a request sets no token limit */
    maxTokens?: number | undefined
    /** @default 120000 */
    timeoutMs?: number | undefined
    /** Rate-limit retry and pacing; the SDK's own retries stay off */
    retry?: RetryOptions | undefined
    client?: ChatCompletionsClient | undefined
}

// ─── Response shape ──────────────────────────────────────────────────────────

const ToolCallSchema = z.object({
    id: z.string(),
    function: z.object({
        name: z.string(),
        arguments: z.string().nullish(),
    }),
})

const CompletionSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullish(),
                    tool_calls: z.array(ToolCallSchema).nullish(),
                }),
            }),
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .nullish(),
})

const ErrorBodySchema = z.object({
    error: z.object({ message: z.string().nullish() }).passthrough(),
})

type Completion = z.infer<typeof CompletionSchema>

// ─── Mapping ─────────────────────────────────────────────────────────────────

function toOpenAIMessages(messages: ModelMessage[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((msg): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (msg.role) {
            case 'tool':
                return {
                    role: 'tool',
                    content: msg.content,
                    tool_call_id: msg.toolCallId ?? '',
                } satisfies OpenAI.Chat.ChatCompletionToolMessageParam
            case 'assistant':
                if (msg.toolCalls?.length) {
                    return {
                        role: 'assistant',
                        content: msg.content || null,
                        tool_calls: msg.toolCalls.map((tc) => ({
                            id: tc.id,
                            type: 'function' as const,
                            function: {
                                name: tc.name,
                                arguments: JSON.stringify(tc.arguments),
                            },
                        })),
                    } satisfies OpenAI.Chat.ChatCompletionAssistantMessageParam
                }
                return { role: 'assistant', content: msg.content }
            case 'system':
                return { role: 'system', content: msg.content }
            case 'user':
                return { role: 'user', content: msg.content }
        }
    })
}

function toOpenAITools(tools: ModelRequest['tools']): OpenAI.Chat.ChatCompletionTool[] {
    if (!tools || tools.length === 0) return []
    return tools.map((t) => ({
        type: 'function' as const,
        function: {
            name: t.name,
            description: t.description,
            parameters: t.parameters,
        },
    }))
}

/**
 * Decode tool-call arguments. Malformed JSON or a non-object value yields
 * `{}`, leaving the tool's own argument validation to report what is missing.
 */
export function parseToolArguments(raw: string | null | undefined): Record<string, unknown> {
    if (!raw) return {}
    let value: unknown
    try {
        value = JSON.parse(raw)
    } catch {
        return {}
    }
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return {}
    return Object.fromEntries(Object.entries(value))
}

function extractUsage(usage: Completion['usage']): TokenUsage | undefined {
    if (!usage) return undefined
    return {
        promptTokens: usage.prompt_tokens,
        completionTokens: usage.completion_tokens,
        totalTokens: usage.total_tokens,
    }
}

/**
 * Map an SDK failure onto the runtime's error classes. Connection failures
 * and timeouts are transport errors; any HTTP error becomes a
 * {@link ModelError} carrying the status and the server's wait hint.
 */
export function toModelError(err: unknown): Error {
    if (err instanceof ModelError || err instanceof TransportError) return err
    // APIConnectionError extends APIError, so test it first
    if (err instanceof OpenAI.APIConnectionError) {
        return new TransportError(`[OpenAIProvider] ${err.message}`, { cause: err })
    }
    if (err instanceof OpenAI.APIError) {
        return new ModelError(`OpenAI Error: ${err.message}`, {
            status: err.status,
            retryAfterMs: retryAfterFromHeaders(err.headers),
            cause: err,
        })
    }
    return new TransportError(`[OpenAIProvider] ${errorMessage(err)}`, { cause: err })
}

/**
 * Turn a raw response body into a {@link ModelResponse}. An `error` payload
 * becomes a {@link ModelError}; anything without a first choice is a
 * {@link TransportError}.
 */
export function parseCompletion(body: unknown): ModelResponse {
    const failure = ErrorBodySchema.safeParse(body)
    if (failure.success) {
        throw new ModelError(`OpenAI Error: ${failure.data.error.message ?? 'Unknown error'}`)
    }

    const parsed = CompletionSchema.safeParse(body)
    if (!parsed.success) throw new TransportError('[OpenAIProvider] Invalid response from API.')

    const completion = parsed.data
    const [choice] = completion.choices
    if (!choice) throw new TransportError('[OpenAIProvider] Empty response from API.')

    const calls = choice.message.tool_calls ?? []
    const toolCalls: ToolCall[] | undefined = calls.length
        ? calls.map((tc) => ({
            id: tc.id,
            name: tc.function.name,
            arguments: parseToolArguments(tc.function.arguments),
        }))
        : undefined

    const message: ModelMessage = {
        role: 'assistant',
        content: choice.message.content ?? '',
        toolCalls,
    }

    return {
        message,
        toolCalls,
        usage: extractUsage(completion.usage),
        raw: body,
    }
}

export class OpenAIProvider implements ModelProvider {
    readonly name = 'openai'

    private readonly client: ChatCompletionsClient
    private readonly config: OpenAIProviderConfig

    constructor(config: OpenAIProviderConfig) {
        this.config = config
        this.client = config.client ?? new OpenAI({
            apiKey: config.apiKey,
            baseURL: config.baseURL,
            organization: config.organization,
            timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            maxRetries: 0,
        })
    }

    async complete(request: ModelRequest): Promise<ModelResponse> {
        const tools = toOpenAITools(request.tools)
        const maxTokens = request.maxTokens ?? this.config.maxTokens
        const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
            model: request.model ?? this.config.model ?? DEFAULT_MODEL,
            messages: toOpenAIMessages(request.messages),
            ...(maxTokens !== undefined ? { max_tokens: maxTokens } : {}),
            ...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
        }

        return withRetry(async () => {
            let raw: unknown
            try {
                raw = await this.client.chat.completions.create(body)
            } catch (err) {
                throw toModelError(err)
            }
            return parseCompletion(raw)
        }, this.config.retry)
    }
}

/**
 * Create an OpenAI model provider.
 *
 * @example
 * ```ts
 * agent.provider(openai({ apiKey: config.apiKey, retry: { paceMs: 500 } }))
 * agent.provider(openai({ apiKey: 'sk-...', baseURL: 'http://localhost:8080/v1' }))
 * ```
 */
export function openai(config: OpenAIProviderConfig): OpenAIProvider {
    return new OpenAIProvider(config)
}
