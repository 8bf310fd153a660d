/**
 * Embedding the aido agent loop in another program, without the CLI.
 *
 * Type-checks against the workspace packages. Running it needs an
 * `OPENAI_API_KEY` in the environment.
 */

import { createAgent, parseDepth, resolveEffectiveConfig, DEFAULT_POLICY, maxDepthOf } from '@aido/core'
import type { Middleware } from '@aido/core'
import { openai } from '@aido/openai'
import { builtinTools, COMMAND_EXECUTE_EVENT } from '@aido/tools'
import type { CommandExecuteEvent } from '@aido/tools'
import { BufferHistory } from '@aido/history'
import { createLogger } from '@aido/logger'

// ─── 1. Resolve the configuration for this depth ─────────────────────────────

const depth = parseDepth(process.env['AIDO_DEPTH'])
const config = resolveEffectiveConfig(DEFAULT_POLICY, depth, { toolLoops: 3, history: 'none' })

// ─── 2. A middleware that counts dispatched tool calls ───────────────────────

let toolCalls = 0
const countTools: Middleware = {
    name: 'count-tools',
    scope: 'tool:after',
    async run(_mCtx, next) {
        toolCalls++
        await next()
    },
}

// ─── 3. Build and run ────────────────────────────────────────────────────────

const history = new BufferHistory({ maxEntries: 20 })

const agent = createAgent({
    name: 'embedded',
    systemPrompt: 'You inspect the working directory and answer briefly.',
    tools: builtinTools(),
})
    .provider(openai({ apiKey: process.env['OPENAI_API_KEY'] ?? '', retry: { paceMs: 200 } }))
    .history(history)
    .use(countTools)
    .use(createLogger({ level: 'info' }))
    .on<CommandExecuteEvent>(COMMAND_EXECUTE_EVENT, ({ command }) => {
        console.log(`> ${command}`)
    })

const result = await agent.run({
    input: 'How many TypeScript files are in this directory?',
    invocation: { depth, maxDepth: maxDepthOf(DEFAULT_POLICY), cwd: process.cwd(), config },
})

console.log(result.output)
console.log(`status=${result.status} tools=${toolCalls} tokens=${result.state.usage.totalTokens}`)
console.log(history.snapshot())
