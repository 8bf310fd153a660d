/** Environment variable carrying the recursion depth into child invocations. */
export const DEPTH_ENV_VAR = 'AIDO_DEPTH'

/** Command heads recognised as a self-invocation. */
export const DEFAULT_PROGRAM_NAMES: readonly string[] = ['aido', '/usr/local/bin/aido']

export interface RecursionGuardOptions {
    /** @default DEFAULT_PROGRAM_NAMES */
    programNames?: readonly string[] | undefined
    /** @default DEPTH_ENV_VAR */
    depthVariable?: string | undefined
}

interface Assignment {
    name: string
    text: string
}

interface SplitCommand {
    assignments: Assignment[]
    /** Command head and its arguments, untouched */
    rest: string
}

// NAME=value, NAME='value', NAME="value", NAME=
const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=('[^']*'|"(?:[^"\\]|\\.)*"|[^\s'"]*)(?=\s|$)\s*/

function splitCommand(command: string): SplitCommand {
    let rest = command.trimStart()
    const assignments: Assignment[] = []

    for (let match = ASSIGNMENT.exec(rest); match; match = ASSIGNMENT.exec(rest)) {
        assignments.push({ name: match[1] ?? '', text: match[0].trimEnd() })
        rest = rest.slice(match[0].length)
    }

    return { assignments, rest }
}

function headMatches(rest: string, names: readonly string[]): boolean {
    return names.some((name) => {
        if (!rest.startsWith(name)) return false
        return rest.length === name.length || /\s/.test(rest.charAt(name.length))
    })
}

/**
 * Heuristic self-invocation check: after skipping leading `NAME=value`
 * assignments, the command must start with a recognised program name,
 * alone or followed by whitespace.
 *
 * Not detected: the program inside quotes, after a pipe or `&&`, or reached
 * through a wrapper (`sh -c`, `xargs`, an alias).
 */
export function isSelfInvocation(command: string, options: RecursionGuardOptions = {}): boolean {
    const names = options.programNames ?? DEFAULT_PROGRAM_NAMES
    return headMatches(splitCommand(command).rest, names)
}

export function depthLimitCommand(depth: number, maxDepth: number): string {
    return `echo "Error: recursion depth limit reached (depth=${depth}, max_depth=${maxDepth})"`
}

/**
 * Rewrite a shell command before execution.
 *
 * Non-recursive commands come back unchanged. A self-invocation below the
 * limit gets a fresh `AIDO_DEPTH=<depth + 1>` prefix, replacing any marker
 * already present; at or above the limit it becomes an `echo` of the limit
 * message, so the model still receives a textual result.
 *
 * @example
 * ```ts
 * decorateCommand('aido --print-config', 0, 1) // 'AIDO_DEPTH=1 aido --print-config'
 * decorateCommand('aido --print-config', 1, 1) // 'echo "Error: recursion depth limit reached (depth=1, max_depth=1)"'
 * ```
 */
export function decorateCommand(
    command: string,
    depth: number,
    maxDepth: number,
    options: RecursionGuardOptions = {},
): string {
    const names = options.programNames ?? DEFAULT_PROGRAM_NAMES
    const variable = options.depthVariable ?? DEPTH_ENV_VAR
    const { assignments, rest } = splitCommand(command)

    if (!headMatches(rest, names)) return command
    if (depth >= maxDepth) return depthLimitCommand(depth, maxDepth)

    const kept = assignments.filter((a) => a.name !== variable).map((a) => a.text)
    return [`${variable}=${depth + 1}`, ...kept, rest].join(' ')
}

/**
 * Parse the inherited depth marker. Anything but a plain non-negative
 * integer counts as depth 0.
 */
export function parseDepth(value: string | undefined): number {
    if (value === undefined || !/^\d+$/.test(value)) return 0
    const depth = Number(value)
    return Number.isSafeInteger(depth) ? depth : 0
}
