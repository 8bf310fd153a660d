import { spawn } from 'node:child_process'

export interface ShellRunOptions {
    cwd: string
}

/** Runs a command line through the system shell. */
export interface ShellExecutor {
    /** Resolves with stdout and stderr interleaved in arrival order. */
    run(command: string, options: ShellRunOptions): Promise<string>
}

/**
 * Default executor: `sh -c <command>` with stdin closed and both output
 * streams captured into one buffer.
 */
export const execShell: ShellExecutor = {
    run(command, options) {
        return new Promise((resolve, reject) => {
            const child = spawn(command, {
                cwd: options.cwd,
                shell: true,
                stdio: ['ignore', 'pipe', 'pipe'],
            })

            const chunks: Buffer[] = []
            child.stdout.on('data', (d: Buffer) => chunks.push(d))
            child.stderr.on('data', (d: Buffer) => chunks.push(d))

            child.on('error', (err) => {
                reject(new Error(`failed to spawn shell (cwd=${options.cwd}): ${err.message}`, { cause: err }))
            })
            child.on('close', () => resolve(Buffer.concat(chunks).toString('utf8')))
        })
    },
}
