import type { ExecutionContext } from '@aido/core'

export interface TestContext extends ExecutionContext {
    events: Array<{ event: string; payload: unknown }>
}

export function toolContext(cwd: string, depth = 0, maxDepth = 1): TestContext {
    const events: TestContext['events'] = []
    return {
        input: 'test',
        invocation: {
            depth,
            maxDepth,
            cwd,
            config: { model: 'test-model', maxTokens: 100, toolLoops: 3, history: 'none', overridePermission: 'all' },
        },
        state: {
            phase: 'tool_dispatch',
            iterations: 1,
            messages: [],
            toolCalls: [],
            usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
            startedAt: new Date(0),
        },
        events,
        emit(event, payload) {
            events.push({ event, payload })
        },
    }
}
