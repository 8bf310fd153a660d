import { describe, it, expect } from 'vitest'
import OpenAI from 'openai'
import { ModelError, TransportError } from '@aido/core'
import type { ModelRequest } from '@aido/core'
import { OpenAIProvider, parseCompletion, parseToolArguments, toModelError } from '../src/provider'
import type { ChatCompletionsClient } from '../src/provider'

type Body = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming

class FakeClient implements ChatCompletionsClient {
    readonly bodies: Body[] = []
    readonly chat = {
        completions: {
            create: async (body: Body): Promise<unknown> => {
                this.bodies.push(body)
                const next = this.script.shift()
                if (next === undefined) throw new Error('script exhausted')
                if (next instanceof Error) throw next
                return next
            },
        },
    }

    constructor(private readonly script: unknown[]) {}
}

function completion(content: string | null, toolCalls?: Array<{ id: string; name: string; args: string }>) {
    return {
        id: 'chatcmpl-test',
        choices: [
            {
                index: 0,
                finish_reason: toolCalls ? 'tool_calls' : 'stop',
                message: {
                    role: 'assistant',
                    content,
                    ...(toolCalls
                        ? {
                            tool_calls: toolCalls.map((c) => ({
                                id: c.id,
                                type: 'function',
                                function: { name: c.name, arguments: c.args },
                            })),
                        }
                        : {}),
                },
            },
        ],
        usage: { prompt_tokens: 12, completion_tokens: 3, total_tokens: 15 },
    }
}

const request: ModelRequest = {
    model: 'test-model',
    maxTokens: 250,
    messages: [
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'list files' },
        {
            role: 'assistant',
            content: '',
            toolCalls: [{ id: 'call_1', name: 'run_command', arguments: { command: 'ls' } }],
        },
        { role: 'tool', name: 'run_command', toolCallId: 'call_1', content: 'a.txt' },
    ],
    tools: [
        {
            name: 'run_command',
            description: 'Run a shell command',
            parameters: { type: 'object', properties: { command: { type: 'string' } }, required: ['command'] },
        },
    ],
}

describe('OpenAIProvider', () => {
    it('sends the effective model, token limit, tools and mapped messages', async () => {
        const client = new FakeClient([completion('a.txt is there')])
        const provider = new OpenAIProvider({ apiKey: 'test-secret', client })

        const response = await provider.complete(request)

        expect(response.message).toEqual({ role: 'assistant', content: 'a.txt is there', toolCalls: undefined })
        expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 3, totalTokens: 15 })

        const body = client.bodies[0]
        expect(body?.model).toBe('test-model')
        expect(body?.max_tokens).toBe(250)
        expect(body?.tool_choice).toBe('auto')
        expect(body?.tools?.[0]?.function.name).toBe('run_command')
        expect(body?.messages).toEqual([
            { role: 'system', content: 'sys' },
            { role: 'user', content: 'list files' },
            {
                role: 'assistant',
                content: null,
                tool_calls: [
                    { id: 'call_1', type: 'function', function: { name: 'run_command', arguments: '{"command":"ls"}' } },
                ],
            },
            { role: 'tool', content: 'a.txt', tool_call_id: 'call_1' },
        ])
    })

    it('falls back to the configured model and omits empty tool lists', async () => {
        const client = new FakeClient([completion('hi')])
        const provider = new OpenAIProvider({ apiKey: 'test-secret', model: 'fallback-model', client })

        await provider.complete({ messages: [{ role: 'user', content: 'hi' }], tools: [] })

        expect(client.bodies[0]?.model).toBe('fallback-model')
        expect(client.bodies[0]).not.toHaveProperty('tools')
        expect(client.bodies[0]).not.toHaveProperty('max_tokens')
    })

    it('decodes tool calls', async () => {
        const client = new FakeClient([
            completion(null, [{ id: 'call_9', name: 'read_file', args: '{"path":"notes.txt"}' }]),
        ])
        const provider = new OpenAIProvider({ apiKey: 'test-secret', client })

        const response = await provider.complete(request)

        expect(response.toolCalls).toEqual([{ id: 'call_9', name: 'read_file', arguments: { path: 'notes.txt' } }])
        expect(response.message.content).toBe('')
        expect(response.message.toolCalls).toEqual(response.toolCalls)
    })

    it('retries rate-limited requests using the server hint', async () => {
        const limited = new OpenAI.RateLimitError(
            429,
            { message: 'Rate limit reached' },
            undefined,
            { 'retry-after-ms': '1500' },
        )
        const client = new FakeClient([limited, completion('ok')])
        const waits: number[] = []
        const provider = new OpenAIProvider({
            apiKey: 'test-secret',
            client,
            retry: { sleep: async (ms) => { waits.push(ms) } },
        })

        const response = await provider.complete(request)

        expect(response.message.content).toBe('ok')
        expect(client.bodies).toHaveLength(2)
        expect(waits).toEqual([1500])
    })

    it('does not retry other API errors', async () => {
        const denied = new OpenAI.AuthenticationError(401, { message: 'Incorrect API key' }, undefined, {})
        const client = new FakeClient([denied, completion('never')])
        const provider = new OpenAIProvider({ apiKey: 'test-secret', client, retry: { sleep: async () => {} } })

        const failure = provider.complete(request)

        await expect(failure).rejects.toBeInstanceOf(ModelError)
        await expect(failure).rejects.toMatchObject({ status: 401, rateLimited: false })
        expect(client.bodies).toHaveLength(1)
    })

    it('gives up after the configured number of retries', async () => {
        const limited = () => new OpenAI.RateLimitError(429, { message: 'slow down' }, undefined, {})
        const client = new FakeClient([limited(), limited(), limited()])
        const provider = new OpenAIProvider({
            apiKey: 'test-secret',
            client,
            retry: { maxRetries: 2, sleep: async () => {}, random: () => 0 },
        })

        await expect(provider.complete(request)).rejects.toMatchObject({ status: 429 })
        expect(client.bodies).toHaveLength(3)
    })

    it('paces every attempt', async () => {
        const client = new FakeClient([completion('paced')])
        const waits: number[] = []
        const provider = new OpenAIProvider({
            apiKey: 'test-secret',
            client,
            retry: { paceMs: 300, sleep: async (ms) => { waits.push(ms) } },
        })

        await provider.complete(request)

        expect(waits).toEqual([300])
    })
})

describe('parseCompletion', () => {
    it('raises a model error for an error payload', () => {
        expect(() => parseCompletion({ error: { message: 'model overloaded' } })).toThrow(
            new ModelError('OpenAI Error: model overloaded'),
        )
        expect(() => parseCompletion({ error: {} })).toThrow('OpenAI Error: Unknown error')
    })

    it('raises a transport error when no choice is usable', () => {
        expect(() => parseCompletion({ choices: [] })).toThrow(TransportError)
        expect(() => parseCompletion('<html>bad gateway</html>')).toThrow('[OpenAIProvider] Invalid response from API.')
    })
})

describe('toModelError', () => {
    it('maps connection failures to transport errors', () => {
        const mapped = toModelError(new OpenAI.APIConnectionError({ message: 'socket hang up' }))
        expect(mapped).toBeInstanceOf(TransportError)
        expect(mapped.message).toBe('[OpenAIProvider] socket hang up')
    })

    it('carries status and retry hint from API errors', () => {
        const mapped = toModelError(
            new OpenAI.RateLimitError(429, { message: 'Rate limit reached' }, undefined, { 'retry-after': '2' }),
        )
        expect(mapped).toBeInstanceOf(ModelError)
        expect(mapped).toMatchObject({ status: 429, retryAfterMs: 2000, rateLimited: true })
        expect(mapped.message).toMatch(/^OpenAI Error: .*Rate limit reached/)
    })

    it('wraps unknown failures', () => {
        const mapped = toModelError(new Error('boom'))
        expect(mapped).toBeInstanceOf(TransportError)
        expect(mapped.message).toBe('[OpenAIProvider] boom')
    })
})

describe('parseToolArguments', () => {
    it('accepts JSON objects only', () => {
        expect(parseToolArguments('{"path":"a"}')).toEqual({ path: 'a' })
        expect(parseToolArguments('not json')).toEqual({})
        expect(parseToolArguments('[1,2]')).toEqual({})
        expect(parseToolArguments('')).toEqual({})
        expect(parseToolArguments(null)).toEqual({})
    })
})
