import type { EffectiveConfig } from '@aido/core'

export interface RuntimeFacts {
    now: Date
    cwd: string
    hostname: string
    os: string
    depth: number
    maxDepth: number
}

/** Block prepended to the system prompt so the model knows where it runs. */
export function buildRuntimeContext(config: EffectiveConfig, facts: RuntimeFacts): string {
    return [
        'RUNTIME CONTEXT',
        `- Current time: ${facts.now.toISOString()}`,
        `- Working directory: ${facts.cwd}`,
        `- Hostname: ${facts.hostname}`,
        `- OS: ${facts.os}`,
        `- Depth: ${facts.depth}`,
        `- Max depth: ${facts.maxDepth}`,
        `- Model: ${config.model}`,
        `- Max tokens: ${config.maxTokens}`,
        `- Tool loops: ${config.toolLoops}`,
        `- History: ${config.history}`,
        '',
        '',
    ].join('\n')
}
