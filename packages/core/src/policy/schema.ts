import { z } from 'zod'

import type { DepthCap, Policy, PolicyProfile, RecursionPolicy } from '../types'
import { DEFAULT_POLICY, HISTORY_MODES, OVERRIDE_PERMISSIONS } from './defaults'
import { mergeProfile } from './resolver'

/**
 * On-disk policy shape (snake_case JSON). Every field is optional and any
 * field that fails validation is dropped, so a partly broken file degrades
 * to the defaults instead of failing.
 */

function lenient<T extends z.ZodTypeAny>(schema: T) {
    return schema.optional().catch(undefined)
}

// Numbers and numeric strings only; null, booleans and '' fall through to absent
const integer = z.union([
    z.number().int(),
    z.string().trim().regex(/^-?\d+$/).transform(Number),
])

const HistoryModeSchema = z.enum(HISTORY_MODES)

const OverridePermissionSchema = z.enum(OVERRIDE_PERMISSIONS)

export const PolicyProfileSchema = z.object({
    model: lenient(z.string().min(1)),
    max_tokens: lenient(integer),
    tool_loops: lenient(integer),
    history: lenient(HistoryModeSchema),
    override_policy: lenient(OverridePermissionSchema),
})

export const DepthCapSchema = z.object({
    max_tokens: lenient(integer),
    tool_loops: lenient(integer),
    history: lenient(
        z.array(z.unknown()).transform((modes) =>
            modes.flatMap((mode) => {
                const parsed = HistoryModeSchema.safeParse(mode)
                return parsed.success ? [parsed.data] : []
            }),
        ),
    ),
})

export const RecursionSchema = z.object({
    max_depth: lenient(integer),
})

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read a depth-keyed table given either as an array (index = depth) or as an
 * object with numeric keys. Entries that fail `parse` are skipped.
 */
function depthTable<T>(raw: unknown, parse: (value: unknown) => T | undefined): Record<number, T> {
    const table: Record<number, T> = {}
    let entries: Array<[string, unknown]> = []
    if (Array.isArray(raw)) entries = raw.map((value, index) => [String(index), value])
    else if (isRecord(raw)) entries = Object.entries(raw)

    for (const [key, value] of entries) {
        if (!/^\d+$/.test(key)) continue
        const parsed = parse(value)
        if (parsed !== undefined) table[Number(key)] = parsed
    }
    return table
}

function parseProfile(value: unknown): PolicyProfile | undefined {
    const result = PolicyProfileSchema.safeParse(value)
    if (!result.success) return undefined
    const { model, max_tokens, tool_loops, history, override_policy } = result.data
    return {
        model,
        maxTokens: max_tokens,
        toolLoops: tool_loops,
        history,
        overridePermission: override_policy,
    }
}

function parseCap(value: unknown): DepthCap | undefined {
    const result = DepthCapSchema.safeParse(value)
    if (!result.success) return undefined
    return {
        maxTokens: result.data.max_tokens,
        toolLoops: result.data.tool_loops,
        history: result.data.history,
    }
}

function parseRecursion(value: unknown, fallback: RecursionPolicy): RecursionPolicy {
    const result = RecursionSchema.safeParse(value)
    if (!result.success || result.data.max_depth === undefined) return { ...fallback }
    return { maxDepth: Math.max(0, result.data.max_depth) }
}

/**
 * Turn a raw policy document into a typed {@link Policy}, merged over
 * `fallback`. Never throws: a non-object document yields `fallback` itself.
 */
export function parsePolicy(raw: unknown, fallback: Policy = DEFAULT_POLICY): Policy {
    if (!isRecord(raw)) return fallback

    return {
        defaults: mergeProfile(fallback.defaults, parseProfile(raw['defaults'])),
        profiles: { ...fallback.profiles, ...depthTable(raw['profiles'], parseProfile) },
        caps: { ...fallback.caps, ...depthTable(raw['caps'], parseCap) },
        recursion: parseRecursion(raw['recursion'], fallback.recursion),
    }
}
