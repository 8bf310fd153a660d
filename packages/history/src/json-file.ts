import { mkdir, open, readFile, rm } from 'node:fs/promises'
import { dirname } from 'node:path'
import { setTimeout as delay } from 'node:timers/promises'
import { z } from 'zod'
import { atomicWrite, errorCode } from '@aido/core'
import type { HistoryEntry, HistoryStore } from '@aido/core'

const HistoryEntrySchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
})

export interface JsonFileHistoryConfig {
    path: string
    /**
     * Attempts at creating the `.lock` sibling before writing without it.
     * @default 5
     */
    lockAttempts?: number | undefined
    /** @default 50 */
    lockRetryMs?: number | undefined
    sleep?: ((ms: number) => Promise<void>) | undefined
}

/**
 * Keep only well-formed `{ role, content }` records from a parsed document.
 * Anything that is not an array reads as an empty log.
 */
export function parseHistory(raw: unknown): HistoryEntry[] {
    if (!Array.isArray(raw)) return []
    return raw.flatMap((item) => {
        const entry = HistoryEntrySchema.safeParse(item)
        return entry.success ? [entry.data] : []
    })
}

/**
 * JsonFileHistory: the conversation log as a pretty-printed JSON array.
 *
 * Writes go to a temporary sibling that is renamed into place, under a
 * best-effort `<path>.lock`. Concurrent writers are not otherwise
 * coordinated: the last one wins.
 *
 * @example
 * ```ts
 * agent.history(new JsonFileHistory({ path: '/home/me/.local/state/aido/conversation_history.json' }))
 * ```
 */
export class JsonFileHistory implements HistoryStore {
    readonly type = 'json-file'

    private readonly path: string
    private readonly lockAttempts: number
    private readonly lockRetryMs: number
    private readonly sleep: (ms: number) => Promise<void>

    constructor(config: JsonFileHistoryConfig) {
        this.path = config.path
        this.lockAttempts = Math.max(1, config.lockAttempts ?? 5)
        this.lockRetryMs = config.lockRetryMs ?? 50
        this.sleep = config.sleep ?? ((ms: number) => delay(ms))
    }

    get location(): string {
        return this.path
    }

    get lockPath(): string {
        return `${this.path}.lock`
    }

    async load(): Promise<HistoryEntry[]> {
        let text: string
        try {
            text = await readFile(this.path, 'utf8')
        } catch (err) {
            if (errorCode(err) === 'ENOENT') return []
            throw err
        }

        let raw: unknown
        try {
            raw = JSON.parse(text)
        } catch {
            return []
        }
        return parseHistory(raw)
    }

    async save(entries: HistoryEntry[]): Promise<void> {
        await mkdir(dirname(this.path), { recursive: true, mode: 0o700 })

        const locked = await this.acquireLock()
        try {
            await atomicWrite(this.path, JSON.stringify(entries, null, 4))
        } finally {
            if (locked) await rm(this.lockPath, { force: true })
        }
    }

    /** Resolves `false` when the lock stayed taken for every attempt. */
    private async acquireLock(): Promise<boolean> {
        for (let attempt = 1; attempt <= this.lockAttempts; attempt++) {
            try {
                const handle = await open(this.lockPath, 'wx')
                await handle.close()
                return true
            } catch (err) {
                if (errorCode(err) !== 'EEXIST') throw err
                if (attempt < this.lockAttempts) await this.sleep(this.lockRetryMs)
            }
        }
        return false
    }
}
