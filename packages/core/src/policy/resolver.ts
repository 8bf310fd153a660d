import type {
    ConfigOverrides,
    DepthCap,
    EffectiveConfig,
    HistoryMode,
    Policy,
    PolicyProfile,
} from '../types'

const HISTORY_RANK: Record<HistoryMode, number> = {
    persist: 0,
    temp: 1,
    none: 2,
}

/** Rank by decreasing durability: persist < temp < none. */
export function historyRank(mode: HistoryMode): number {
    return HISTORY_RANK[mode]
}

function positiveInt(value: number): number {
    return Number.isFinite(value) ? Math.max(1, Math.trunc(value)) : 1
}

/**
 * Overlay a profile on a configuration, field by field.
 * Fields the profile leaves undefined keep their current value.
 */
export function mergeProfile(base: EffectiveConfig, profile: PolicyProfile | undefined): EffectiveConfig {
    if (!profile) return { ...base }
    return {
        model: profile.model ?? base.model,
        maxTokens: profile.maxTokens ?? base.maxTokens,
        toolLoops: profile.toolLoops ?? base.toolLoops,
        history: profile.history ?? base.history,
        overridePermission: profile.overridePermission ?? base.overridePermission,
    }
}

function normalize(config: EffectiveConfig): EffectiveConfig {
    return {
        ...config,
        maxTokens: positiveInt(config.maxTokens),
        toolLoops: positiveInt(config.toolLoops),
    }
}

/**
 * Clamp a configuration to a depth cap.
 *
 * Numeric fields take the minimum of value and ceiling. A history mode outside
 * the allowed set is replaced by the least durable allowed mode, or `none`
 * when the set is empty. Idempotent: `applyCaps(applyCaps(x, c), c)` equals
 * `applyCaps(x, c)`.
 */
export function applyCaps(config: EffectiveConfig, cap: DepthCap | undefined): EffectiveConfig {
    if (!cap) return { ...config }
    const capped = { ...config }

    if (cap.maxTokens !== undefined) capped.maxTokens = Math.min(capped.maxTokens, cap.maxTokens)
    if (cap.toolLoops !== undefined) capped.toolLoops = Math.min(capped.toolLoops, cap.toolLoops)

    if (cap.history && !cap.history.includes(capped.history)) {
        let best: HistoryMode = 'none'
        if (cap.history.length > 0) {
            best = cap.history.reduce((a, b) => (historyRank(b) > historyRank(a) ? b : a))
        }
        capped.history = best
    }

    return normalize(capped)
}

function acceptNumber(
    config: EffectiveConfig,
    requested: number | undefined,
    current: number,
): number | undefined {
    if (requested === undefined || !Number.isFinite(requested) || requested <= 0) return undefined
    const value = Math.trunc(requested)
    if (value <= 0) return undefined
    if (config.overridePermission === 'safe' && value >= current) return undefined
    return value
}

/**
 * Apply caller overrides under the configuration's override permission.
 *
 * - `none`: every override is ignored.
 * - `all`: supplied values replace the field (numbers must be > 0).
 * - `safe`: numbers only when strictly smaller, history only toward less
 *   durable modes.
 */
export function applyOverrides(config: EffectiveConfig, overrides: ConfigOverrides): EffectiveConfig {
    const next = { ...config }
    if (config.overridePermission === 'none') return next

    const toolLoops = acceptNumber(config, overrides.toolLoops, config.toolLoops)
    if (toolLoops !== undefined) next.toolLoops = toolLoops

    const maxTokens = acceptNumber(config, overrides.maxTokens, config.maxTokens)
    if (maxTokens !== undefined) next.maxTokens = maxTokens

    const history = overrides.history
    if (history !== undefined) {
        if (config.overridePermission === 'all') {
            next.history = history
        } else if (historyRank(history) >= historyRank(config.history)) {
            next.history = history
        }
    }

    return next
}

/**
 * Compute the effective configuration for one invocation at `depth`.
 *
 * defaults → profile merge → normalize → caps → overrides → caps again.
 * The second cap pass makes caps a ceiling no override can lift.
 *
 * @example
 * ```ts
 * const config = resolveEffectiveConfig(policy, depth, { toolLoops: 2 })
 * ```
 */
export function resolveEffectiveConfig(
    policy: Policy,
    depth: number,
    overrides: ConfigOverrides = {},
): Readonly<EffectiveConfig> {
    const cap = policy.caps[depth]
    const merged = normalize(mergeProfile(policy.defaults, policy.profiles[depth]))
    const capped = applyCaps(merged, cap)
    const overridden = applyOverrides(capped, overrides)
    return Object.freeze(applyCaps(overridden, cap))
}

export function maxDepthOf(policy: Policy): number {
    const { maxDepth } = policy.recursion
    return Number.isFinite(maxDepth) ? Math.max(0, Math.trunc(maxDepth)) : 0
}
