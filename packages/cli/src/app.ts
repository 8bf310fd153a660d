import pc from 'picocolors'
import { CommanderError } from 'commander'
import {
    createAgent,
    errorMessage,
    maxDepthOf,
    parseDepth,
    resolveEffectiveConfig,
} from '@aido/core'
import type { HistoryMode, HistoryStore, InvocationContext, ModelProvider } from '@aido/core'
import { createHistoryStore, resolveHistoryPath } from '@aido/history'
import type { HistoryPathEnv } from '@aido/history'
import { createLogger } from '@aido/logger'
import { openai } from '@aido/openai'
import { COMMAND_EXECUTE_EVENT, builtinTools } from '@aido/tools'
import type { CommandExecuteEvent, ShellExecutor } from '@aido/tools'
import type { Environment } from './environment'
import { resolveFiles } from './files'
import { resolveQuery } from './input'
import { loadConfig, loadPolicy, loadPrompt } from './loaders'
import type { AppConfig } from './loaders'
import { formatConfig, formatPaths } from './print'
import { createProgram, overridesFromOptions, parseCommandLine } from './program'
import type { ParsedCommandLine } from './program'
import { buildRuntimeContext } from './runtime-context'

export interface CliIO {
    stdout(text: string): void
    stderr(text: string): void
    readStdin(): Promise<string>
}

export interface CliDeps {
    env: Environment
    io: CliIO
    /** @default OpenAI chat completions */
    createProvider?: ((config: AppConfig) => ModelProvider) | undefined
    executor?: ShellExecutor | undefined
    /** @default JSON file at the mode's location */
    createHistory?: ((mode: HistoryMode, env: HistoryPathEnv) => HistoryStore | null) | undefined
    now?: (() => Date) | undefined
}

function defaultProvider(config: AppConfig): ModelProvider {
    return openai({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeoutMs: config.timeoutMs,
        retry: { paceMs: config.paceMs, maxRetries: config.maxRetries },
    })
}

/**
 * Run one `aido` invocation and resolve with its exit code.
 *
 * @example
 * ```ts
 * process.exitCode = await runCli(process.argv.slice(2), { env: captureEnvironment(), io })
 * ```
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
    const { env, io } = deps
    const colors = pc.createColors(env.stdoutIsTTY && !env.noColor)

    const program = createProgram({
        writeOut: (text) => io.stdout(text),
        writeErr: (text) => io.stderr(text),
    })

    let parsed: ParsedCommandLine
    try {
        parsed = parseCommandLine(program, argv)
    } catch (err) {
        // help, version and usage errors have already been written
        if (err instanceof CommanderError) return err.exitCode
        throw err
    }
    const { options } = parsed

    const depth = parseDepth(env.depthMarker)
    const files = await resolveFiles(env)

    if (options.printPaths) {
        io.stdout(formatPaths(files, depth))
        return 0
    }

    try {
        const appConfig = await loadConfig(files.configFile)
        const prompt = await loadPrompt(files.promptFile)
        const policy = await loadPolicy(files.policyFile)

        const maxDepth = maxDepthOf(policy)
        const config = resolveEffectiveConfig(policy, depth, overridesFromOptions(options))
        const historyEnv: HistoryPathEnv = {
            home: env.home,
            tmpDir: env.tmpDir,
            uid: env.uid,
            pid: env.pid,
            programDir: env.programDir,
        }

        if (options.printConfig) {
            io.stdout(formatConfig(config, resolveHistoryPath(config.history, historyEnv), depth, maxDepth))
            return 0
        }

        const query = await resolveQuery(parsed.question, options.stdin, {
            stdinIsTTY: env.stdinIsTTY,
            readStdin: () => io.readStdin(),
            hint: (text) => io.stderr(text),
        })
        if (query === null) {
            io.stdout(program.helpInformation())
            return 1
        }

        const runtimeContext = buildRuntimeContext(config, {
            now: deps.now?.() ?? new Date(),
            cwd: env.cwd,
            hostname: env.hostname,
            os: env.os,
            depth,
            maxDepth,
        })

        const history = (deps.createHistory ?? createHistoryStore)(config.history, historyEnv)
        const agent = createAgent({
            name: 'aido',
            systemPrompt: runtimeContext + prompt,
            tools: builtinTools({ executor: deps.executor }),
        })
            .provider((deps.createProvider ?? defaultProvider)(appConfig))
            .history(history)
            .on<CommandExecuteEvent>(COMMAND_EXECUTE_EVENT, ({ command }) => {
                io.stdout(`${colors.yellow(`[Executing]: ${command}`)}\n`)
            })

        if (options.logLevel) agent.use(createLogger({ level: options.logLevel }))

        const invocation: InvocationContext = { depth, maxDepth, cwd: env.cwd, config }

        io.stdout(`\n${colors.green('[User]:')} ${query}\n`)
        const result = await agent.run({ input: query, invocation })
        io.stdout(`${colors.cyan('[Assistant]:')} ${result.output}\n\n`)
        return 0
    } catch (err) {
        io.stderr(`${colors.red('Error:')} ${errorMessage(err)}\n`)
        return 1
    }
}
