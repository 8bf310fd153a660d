import { join } from 'node:path'
import type { HistoryMode, HistoryStore } from '@aido/core'
import { JsonFileHistory } from './json-file'

export const PERSIST_FILE = 'conversation_history.json'

/** Process facts history locations depend on. */
export interface HistoryPathEnv {
    home?: string | undefined
    tmpDir?: string | undefined
    uid: number
    pid: number
    /** Fallback directory for `persist` when there is no home directory */
    programDir: string
}

/**
 * Where the log for `mode` lives.
 *
 * - `persist`: `~/.local/state/aido/conversation_history.json`
 * - `temp`: `$TMPDIR/aido_history_<uid>_<pid>.json`, private to this process
 * - `none`: `null`
 */
export function resolveHistoryPath(mode: HistoryMode, env: HistoryPathEnv): string | null {
    switch (mode) {
        case 'none':
            return null
        case 'persist':
            return env.home ? join(env.home, '.local', 'state', 'aido', PERSIST_FILE) : join(env.programDir, PERSIST_FILE)
        case 'temp':
            return join(env.tmpDir || '/tmp', `aido_history_${env.uid}_${env.pid}.json`)
    }
}

export function createHistoryStore(mode: HistoryMode, env: HistoryPathEnv): HistoryStore | null {
    const path = resolveHistoryPath(mode, env)
    return path === null ? null : new JsonFileHistory({ path })
}
