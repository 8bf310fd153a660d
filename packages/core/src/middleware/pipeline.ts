import type { Middleware, MiddlewareContext, MiddlewareScope } from '../types'

function appliesTo(middleware: Middleware, scope: MiddlewareScope): boolean {
    if (middleware.scope === undefined) return true
    return Array.isArray(middleware.scope) ? middleware.scope.includes(scope) : middleware.scope === scope
}

/**
 * Onion-style middleware chain, one pass per scope.
 *
 * Middleware registered for the scope (or for every scope) runs in
 * registration order; each continues the chain by awaiting `next()`, at most
 * once. Not calling `next()` stops the remaining middleware for that pass.
 */
export class MiddlewarePipeline {
    private readonly middlewares: Middleware[] = []

    use(middleware: Middleware): this {
        this.middlewares.push(middleware)
        return this
    }

    get size(): number {
        return this.middlewares.length
    }

    async run(mCtx: MiddlewareContext): Promise<void> {
        const chain = this.middlewares.filter((m) => appliesTo(m, mCtx.scope))
        let reached = -1

        const dispatch = async (index: number): Promise<void> => {
            if (index <= reached) {
                const caller = chain[index - 1]?.name ?? 'anonymous'
                throw new Error(`[MiddlewarePipeline] next() called more than once by "${caller}" (${mCtx.scope})`)
            }
            reached = index
            const middleware = chain[index]
            if (!middleware) return
            await middleware.run(mCtx, () => dispatch(index + 1))
        }

        await dispatch(0)
    }
}
