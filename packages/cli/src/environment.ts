import { hostname, release, type } from 'node:os'
import { dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { DEPTH_ENV_VAR } from '@aido/core'

/**
 * Process facts the CLI depends on, captured once at start-up. Nothing
 * past this module reads `process.env`.
 */
export interface Environment {
    readonly cwd: string
    readonly home: string | undefined
    /** `$AIDO_HOME`, searched first for configuration files */
    readonly aidoHome: string | undefined
    readonly tmpDir: string | undefined
    /** Raw `$AIDO_DEPTH` */
    readonly depthMarker: string | undefined
    readonly uid: number
    readonly pid: number
    readonly hostname: string
    readonly os: string
    /** Directory holding the program's sources */
    readonly programDir: string
    readonly stdinIsTTY: boolean
    readonly stdoutIsTTY: boolean
    readonly noColor: boolean
}

function nonEmpty(value: string | undefined): string | undefined {
    return value === undefined || value === '' ? undefined : value
}

export function captureEnvironment(): Environment {
    const env = process.env
    return Object.freeze({
        cwd: process.cwd(),
        home: nonEmpty(env['HOME']),
        aidoHome: nonEmpty(env['AIDO_HOME']),
        tmpDir: nonEmpty(env['TMPDIR']),
        depthMarker: env[DEPTH_ENV_VAR],
        uid: process.geteuid?.() ?? 0,
        pid: process.pid,
        hostname: hostname(),
        os: `${type()} ${release()}`,
        programDir: dirname(fileURLToPath(import.meta.url)),
        stdinIsTTY: process.stdin.isTTY === true,
        stdoutIsTTY: process.stdout.isTTY === true,
        noColor: 'NO_COLOR' in env,
    })
}
