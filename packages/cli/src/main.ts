#!/usr/bin/env tsx
import { text } from 'node:stream/consumers'
import { runCli } from './app'
import type { CliIO } from './app'
import { captureEnvironment } from './environment'

const io: CliIO = {
    stdout: (chunk) => {
        process.stdout.write(chunk)
    },
    stderr: (chunk) => {
        process.stderr.write(chunk)
    },
    readStdin: () => text(process.stdin),
}

process.exitCode = await runCli(process.argv.slice(2), { env: captureEnvironment(), io })
