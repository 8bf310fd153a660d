import { isAbsolute, resolve } from 'node:path'
import type { z } from 'zod'
import { toolResult } from '@aido/core'
import type { ToolResult } from '@aido/core'

export type ParsedArgs<T> = { ok: true; value: T } | { ok: false; result: ToolResult }

/**
 * Validate raw model arguments. Failures come back as an `invalid` result
 * naming each offending field.
 */
export function parseArgs<T extends z.ZodTypeAny>(
    tool: string,
    schema: T,
    args: Record<string, unknown>,
): ParsedArgs<z.output<T>> {
    const parsed = schema.safeParse(args)
    if (parsed.success) return { ok: true, value: parsed.data }

    const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ')
    return { ok: false, result: toolResult('invalid', `${tool}: invalid arguments (${issues})`) }
}

/** Resolve a tool path against the invocation's working directory. */
export function resolveToolPath(cwd: string, path: string): string {
    return isAbsolute(path) ? resolve(path) : resolve(cwd, path)
}
