import type { EffectiveConfig } from '@aido/core'
import { CONFIG_FILE, POLICY_FILE, PROMPT_FILE } from './files'
import type { ResolvedFiles } from './files'

export function formatPaths(files: ResolvedFiles, depth: number): string {
    return [
        `depth: ${depth}`,
        `${CONFIG_FILE}: ${files.configFile ?? '(not found)'}`,
        `${PROMPT_FILE}: ${files.promptFile ?? '(not found)'}`,
        `${POLICY_FILE}: ${files.policyFile ?? '(not found)'}`,
        '',
    ].join('\n')
}

export function formatConfig(
    config: EffectiveConfig,
    historyFile: string | null,
    depth: number,
    maxDepth: number,
): string {
    return [
        `depth: ${depth}`,
        `max_depth: ${maxDepth}`,
        `model: ${config.model}`,
        `max_tokens: ${config.maxTokens}`,
        `tool_loops: ${config.toolLoops}`,
        `history: ${config.history}`,
        `override_policy: ${config.overridePermission}`,
        `history_file: ${historyFile ?? '(none)'}`,
        '',
    ].join('\n')
}
