import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationError, DEFAULT_POLICY, errorMessage, parsePolicy } from '@aido/core'
import type { Policy } from '@aido/core'
import { CONFIG_FILE, POLICY_FILE, PROMPT_FILE, SEARCH_HINT } from './files'

const AppConfigSchema = z.object({
    openai_api_key: z.string().optional(),
    base_url: z.string().url().optional(),
    pace_ms: z.number().int().min(0).optional(),
    max_retries: z.number().int().min(0).optional(),
    timeout_ms: z.number().int().positive().optional(),
})

export interface AppConfig {
    apiKey: string
    baseURL?: string | undefined
    paceMs?: number | undefined
    maxRetries?: number | undefined
    timeoutMs?: number | undefined
}

function missing(name: string): ConfigurationError {
    return new ConfigurationError(`${name} missing.\n${SEARCH_HINT}`)
}

async function readJson(path: string): Promise<unknown> {
    let text: string
    try {
        text = await readFile(path, 'utf8')
    } catch (err) {
        throw new ConfigurationError(`cannot read ${path}: ${errorMessage(err)}`, { cause: err })
    }
    try {
        return JSON.parse(text)
    } catch (err) {
        throw new ConfigurationError(`${path} is not valid JSON: ${errorMessage(err)}`, { cause: err })
    }
}

export async function loadConfig(path: string | null): Promise<AppConfig> {
    if (path === null) throw missing(CONFIG_FILE)

    const parsed = AppConfigSchema.safeParse(await readJson(path))
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
        throw new ConfigurationError(`invalid ${CONFIG_FILE} (${issues})`)
    }

    const { openai_api_key: apiKey, base_url, pace_ms, max_retries, timeout_ms } = parsed.data
    if (!apiKey) throw new ConfigurationError(`OpenAI API Key not found in ${CONFIG_FILE}`)

    return { apiKey, baseURL: base_url, paceMs: pace_ms, maxRetries: max_retries, timeoutMs: timeout_ms }
}

export async function loadPrompt(path: string | null): Promise<string> {
    if (path === null) throw missing(PROMPT_FILE)
    try {
        return await readFile(path, 'utf8')
    } catch (err) {
        throw new ConfigurationError(`cannot read ${path}: ${errorMessage(err)}`, { cause: err })
    }
}

/**
 * No policy file means the built-in default. A file that exists must be
 * readable JSON; fields inside it that fail validation are ignored.
 */
export async function loadPolicy(path: string | null): Promise<Policy> {
    if (path === null) return DEFAULT_POLICY
    return parsePolicy(await readJson(path))
}
