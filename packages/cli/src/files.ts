import { access } from 'node:fs/promises'
import { join } from 'node:path'
import type { Environment } from './environment'

export const CONFIG_FILE = 'config.json'
export const PROMPT_FILE = 'sysprompt.txt'
export const POLICY_FILE = 'policy.json'

export const SEARCH_HINT = 'Looked in: $AIDO_HOME, cwd, script dir, ~/.config/aido'

export interface ResolvedFiles {
    configFile: string | null
    promptFile: string | null
    policyFile: string | null
}

type SearchEnv = Pick<Environment, 'aidoHome' | 'cwd' | 'programDir' | 'home'>

function trimSlashes(dir: string): string {
    const trimmed = dir.replace(/\/+$/, '')
    return trimmed === '' ? '/' : trimmed
}

/** `$AIDO_HOME`, cwd, program directory, `~/.config/aido`; first occurrence kept. */
export function candidateBaseDirs(env: SearchEnv): string[] {
    const dirs: string[] = []
    if (env.aidoHome) dirs.push(trimSlashes(env.aidoHome))
    if (env.cwd) dirs.push(trimSlashes(env.cwd))
    dirs.push(trimSlashes(env.programDir))
    if (env.home) dirs.push(join(env.home, '.config', 'aido'))
    return [...new Set(dirs)]
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path)
        return true
    } catch {
        return false
    }
}

async function firstExisting(paths: string[]): Promise<string | null> {
    for (const path of paths) {
        if (await exists(path)) return path
    }
    return null
}

export async function resolveFiles(env: SearchEnv): Promise<ResolvedFiles> {
    const bases = candidateBaseDirs(env)
    const find = (name: string) => firstExisting(bases.map((base) => join(base, name)))

    return {
        configFile: await find(CONFIG_FILE),
        promptFile: await find(PROMPT_FILE),
        policyFile: await find(POLICY_FILE),
    }
}
