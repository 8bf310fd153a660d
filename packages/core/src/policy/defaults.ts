import type { HistoryMode, OverridePermission, Policy } from '../types'

export const HISTORY_MODES = ['persist', 'temp', 'none'] as const satisfies readonly HistoryMode[]

export const OVERRIDE_PERMISSIONS = ['all', 'safe', 'none'] as const satisfies readonly OverridePermission[]

/**
 * Policy used when no policy file is found. A loaded policy is merged over it,
 * so every field it sets is also the fallback for a malformed file.
 */
export const DEFAULT_POLICY: Policy = {
    defaults: {
        model: 'gpt-4o-mini',
        maxTokens: 800,
        toolLoops: 5,
        history: 'persist',
        overridePermission: 'all',
    },
    profiles: {},
    caps: {},
    recursion: {
        maxDepth: 0,
    },
}
