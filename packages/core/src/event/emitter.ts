import type { CoreEvent, EventHandler } from '../types'

type Handler = EventHandler<unknown>

/**
 * Per-agent event bus.
 *
 * Handlers for one event are started in subscription order, run concurrently
 * and are awaited together. A rejecting handler rejects `emit`.
 */
export class EventEmitter {
    private readonly handlers = new Map<string, Set<Handler>>()

    /** Subscribe `handler`; the returned function unsubscribes it. */
    on<TPayload = unknown>(event: CoreEvent | string, handler: EventHandler<TPayload>): () => void {
        const set = this.handlers.get(event) ?? new Set<Handler>()
        const stored = handler as Handler
        set.add(stored)
        this.handlers.set(event, set)
        return () => {
            set.delete(stored)
            if (set.size === 0) this.handlers.delete(event)
        }
    }

    listenerCount(event: CoreEvent | string): number {
        return this.handlers.get(event)?.size ?? 0
    }

    async emit(event: CoreEvent | string, payload?: unknown): Promise<void> {
        const set = this.handlers.get(event)
        if (!set) return
        await Promise.all([...set].map((h) => h(payload)))
    }
}
