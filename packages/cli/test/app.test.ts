import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ModelError } from '@aido/core'
import type { ModelProvider, ModelRequest, ModelResponse } from '@aido/core'
import { BufferHistory } from '@aido/history'
import type { ShellExecutor } from '@aido/tools'
import { runCli } from '../src/app'
import type { CliDeps } from '../src/app'
import type { Environment } from '../src/environment'

// ─── Harness ─────────────────────────────────────────────────────────────────

const PROMPT = 'You are a shell helper.'

const POLICY = {
    defaults: { model: 'test-model', max_tokens: 800, tool_loops: 5, history: 'temp', override_policy: 'all' },
    recursion: { max_depth: 1 },
}

let dir: string

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aido-app-'))
})

afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
})

async function writeHome(options: { config?: boolean } = {}): Promise<void> {
    if (options.config ?? true) {
        await writeFile(join(dir, 'config.json'), JSON.stringify({ openai_api_key: 'test-secret' }))
    }
    await writeFile(join(dir, 'sysprompt.txt'), PROMPT)
    await writeFile(join(dir, 'policy.json'), JSON.stringify(POLICY))
}

function environment(overrides: Partial<Environment> = {}): Environment {
    return {
        cwd: dir,
        home: undefined,
        aidoHome: dir,
        tmpDir: dir,
        depthMarker: undefined,
        uid: 1000,
        pid: 4242,
        hostname: 'testhost',
        os: 'Linux 6.0',
        programDir: join(dir, 'program'),
        stdinIsTTY: false,
        stdoutIsTTY: false,
        noColor: true,
        ...overrides,
    }
}

class FakeProvider implements ModelProvider {
    readonly name = 'fake'
    readonly requests: ModelRequest[] = []

    constructor(private readonly responses: Array<ModelResponse | Error>) {}

    async complete(request: ModelRequest): Promise<ModelResponse> {
        this.requests.push(request)
        const next = this.responses.shift()
        if (next === undefined) throw new Error('no scripted response')
        if (next instanceof Error) throw next
        return next
    }
}

class FakeShell implements ShellExecutor {
    readonly commands: string[] = []

    constructor(private readonly output: string) {}

    async run(command: string): Promise<string> {
        this.commands.push(command)
        return this.output
    }
}

function runCommand(command: string): ModelResponse {
    const toolCalls = [{ id: 'call_1', name: 'run_command', arguments: { command } }]
    return { message: { role: 'assistant', content: '', toolCalls }, toolCalls }
}

function reply(content: string): ModelResponse {
    return { message: { role: 'assistant', content } }
}

interface Harness {
    deps: CliDeps
    out: string[]
    err: string[]
    provider: FakeProvider
    shell: FakeShell
    history: BufferHistory
}

function harness(options: {
    responses?: Array<ModelResponse | Error>
    env?: Partial<Environment>
    stdin?: string
    shellOutput?: string
} = {}): Harness {
    const out: string[] = []
    const err: string[] = []
    const provider = new FakeProvider(options.responses ?? [])
    const shell = new FakeShell(options.shellOutput ?? 'depth: 1\n')
    const history = new BufferHistory()

    const deps: CliDeps = {
        env: environment(options.env),
        io: {
            stdout: (text) => { out.push(text) },
            stderr: (text) => { err.push(text) },
            readStdin: async () => options.stdin ?? '',
        },
        createProvider: () => provider,
        executor: shell,
        createHistory: () => history,
        now: () => new Date('2026-01-02T03:04:05Z'),
    }
    return { deps, out, err, provider, shell, history }
}

// ─── Informational flags ─────────────────────────────────────────────────────

describe('informational flags', () => {
    it('prints the version', async () => {
        const h = harness()

        expect(await runCli(['--version'], h.deps)).toBe(0)
        expect(h.out.join('')).toBe('aido 0.1.0\n')
    })

    it('prints help and exits cleanly', async () => {
        const h = harness()

        expect(await runCli(['--help'], h.deps)).toBe(0)
        expect(h.out.join('')).toContain('Usage: aido [options] [question...]')
    })

    it('prints resolved paths without needing any file', async () => {
        const h = harness()
        await writeFile(join(dir, 'sysprompt.txt'), PROMPT)

        expect(await runCli(['--print-paths'], h.deps)).toBe(0)
        expect(h.out.join('')).toBe(
            'depth: 0\n' +
                'config.json: (not found)\n' +
                `sysprompt.txt: ${join(dir, 'sysprompt.txt')}\n` +
                'policy.json: (not found)\n',
        )
    })

    it('prints the effective config with overrides applied', async () => {
        await writeHome()
        const h = harness()

        expect(await runCli(['--print-config', '--tool-loops', '2'], h.deps)).toBe(0)
        expect(h.out.join('')).toBe(
            'depth: 0\n' +
                'max_depth: 1\n' +
                'model: test-model\n' +
                'max_tokens: 800\n' +
                'tool_loops: 2\n' +
                'history: temp\n' +
                'override_policy: all\n' +
                `history_file: ${join(dir, 'aido_history_1000_4242.json')}\n`,
        )
    })

    it('rejects unknown options', async () => {
        const h = harness()

        expect(await runCli(['--bogus'], h.deps)).toBe(1)
        expect(h.err.join('')).toContain("unknown option '--bogus'")
    })
})

// ─── Queries ─────────────────────────────────────────────────────────────────

describe('queries', () => {
    it('runs a tool round trip and prints the transcript', async () => {
        await writeHome()
        const h = harness({ responses: [runCommand('aido --print-config'), reply('all done')] })

        expect(await runCli(['check', 'config'], h.deps)).toBe(0)

        expect(h.out).toEqual([
            '\n[User]: check config\n',
            '[Executing]: AIDO_DEPTH=1 aido --print-config\n',
            '[Assistant]: all done\n\n',
        ])
        expect(h.shell.commands).toEqual(['AIDO_DEPTH=1 aido --print-config'])
        expect(h.history.snapshot()).toEqual([
            { role: 'user', content: 'check config' },
            { role: 'assistant', content: 'all done' },
        ])
    })

    it('sends the runtime context ahead of the system prompt', async () => {
        await writeHome()
        const h = harness({ responses: [reply('hi')] })

        await runCli(['hello'], h.deps)

        const [request] = h.provider.requests
        expect(request?.model).toBe('test-model')
        expect(request?.maxTokens).toBe(800)
        expect(request?.messages[0]).toEqual({
            role: 'system',
            content:
                'RUNTIME CONTEXT\n' +
                '- Current time: 2026-01-02T03:04:05.000Z\n' +
                `- Working directory: ${dir}\n` +
                '- Hostname: testhost\n' +
                '- OS: Linux 6.0\n' +
                '- Depth: 0\n' +
                '- Max depth: 1\n' +
                '- Model: test-model\n' +
                '- Max tokens: 800\n' +
                '- Tool loops: 5\n' +
                '- History: temp\n\n' +
                PROMPT,
        })
        expect(request?.tools?.map((t) => t.name)).toEqual(['run_command', 'write_file', 'read_file', 'file_info'])
    })

    it('replaces self-invocations at the depth limit', async () => {
        await writeHome()
        const limit = 'echo "Error: recursion depth limit reached (depth=1, max_depth=1)"'
        const h = harness({
            env: { depthMarker: '1' },
            responses: [runCommand('aido --print-config'), reply('stopped')],
        })

        expect(await runCli(['recurse'], h.deps)).toBe(0)
        expect(h.shell.commands).toEqual([limit])
        expect(h.out[1]).toBe(`[Executing]: ${limit}\n`)
    })

    it('reads the question from piped stdin', async () => {
        await writeHome()
        const h = harness({ stdin: '  piped question \n', responses: [reply('ok')] })

        expect(await runCli([], h.deps)).toBe(0)
        expect(h.out[0]).toBe('\n[User]: piped question\n')
    })

    it('prints usage and fails on an empty query', async () => {
        await writeHome()
        const h = harness()

        expect(await runCli([], h.deps)).toBe(1)
        expect(h.out.join('')).toMatch(/^Usage: aido/)
        expect(h.provider.requests).toHaveLength(0)
    })

    it('reports a missing config file', async () => {
        await writeHome({ config: false })
        const h = harness()

        expect(await runCli(['hello'], h.deps)).toBe(1)
        expect(h.err).toEqual(['Error: config.json missing.\nLooked in: $AIDO_HOME, cwd, script dir, ~/.config/aido\n'])
        expect(h.out).toEqual([])
    })

    it('reports model errors on stderr', async () => {
        await writeHome()
        const h = harness({ responses: [new ModelError('OpenAI Error: quota exceeded', { status: 429 })] })

        expect(await runCli(['hello'], h.deps)).toBe(1)
        expect(h.err).toEqual(['Error: OpenAI Error: quota exceeded\n'])
        expect(h.history.snapshot()).toEqual([])
    })
})
