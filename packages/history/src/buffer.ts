import type { HistoryEntry, HistoryStore } from '@aido/core'

export interface BufferHistoryConfig {
    /**
     * Oldest entries beyond this count are dropped on save.
     * Unlimited when omitted.
     */
    maxEntries?: number | undefined

    /** Optional pre-populated log, useful for seeding or testing */
    entries?: HistoryEntry[] | undefined
}

/**
 * BufferHistory: in-process conversation log.
 * Lives as long as the instance does.
 */
export class BufferHistory implements HistoryStore {
    readonly type = 'buffer'

    private readonly maxEntries: number | undefined
    private entries: HistoryEntry[]

    constructor(config: BufferHistoryConfig = {}) {
        this.maxEntries = config.maxEntries
        this.entries = [...(config.entries ?? [])]
    }

    async load(): Promise<HistoryEntry[]> {
        return this.entries.map((e) => ({ ...e }))
    }

    async save(entries: HistoryEntry[]): Promise<void> {
        const kept = this.maxEntries !== undefined && entries.length > this.maxEntries
            ? entries.slice(-this.maxEntries)
            : entries
        this.entries = kept.map((e) => ({ ...e }))
    }

    snapshot(): readonly HistoryEntry[] {
        return this.entries
    }
}
