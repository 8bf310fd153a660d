import { Command, InvalidArgumentError, Option } from 'commander'
import type { OutputConfiguration } from 'commander'
import { z } from 'zod'
import { HISTORY_MODES } from '@aido/core'
import type { ConfigOverrides, HistoryMode } from '@aido/core'
import { LOG_LEVELS } from '@aido/logger'
import type { LogLevel } from '@aido/logger'

export const VERSION = '0.1.0'

export interface CliOptions {
    printPaths: boolean
    printConfig: boolean
    toolLoops?: number | undefined
    maxTokens?: number | undefined
    history?: HistoryMode | undefined
    stdin: boolean
    logLevel?: LogLevel | undefined
}

export interface ParsedCommandLine {
    options: CliOptions
    /** Positional words joined by spaces; empty when none were given */
    question: string
}

const OptionsSchema = z.object({
    printPaths: z.boolean().default(false),
    printConfig: z.boolean().default(false),
    toolLoops: z.number().int().optional(),
    maxTokens: z.number().int().optional(),
    history: z.enum(HISTORY_MODES).optional(),
    stdin: z.boolean().default(false),
    logLevel: z.enum(LOG_LEVELS).optional(),
})

function parseInteger(value: string): number {
    if (!/^-?\d+$/.test(value.trim())) throw new InvalidArgumentError('Expected an integer.')
    return Number.parseInt(value, 10)
}

const EXAMPLES = `
Examples:
  aido "what changed in this repo?"
  echo "hello" | aido
  aido --stdin <<'EOF'
  build a small demo site
  EOF
  aido --print-config
  aido --tool-loops 15 "do a longer task"
`

/**
 * Build the command definition. Commander never exits the process: help,
 * version and usage errors surface as `CommanderError`s.
 */
export function createProgram(output?: OutputConfiguration): Command {
    const program = new Command()
        .name('aido')
        .description('Ask a model to get things done in your shell.')
        .argument('[question...]', 'question to ask')
        .helpOption('-h, --help', 'show this help')
        .version(`aido ${VERSION}`, '--version', 'show version')
        .option('--print-paths', 'show resolved file paths')
        .option('--print-config', 'show effective config')
        .option('--tool-loops <n>', 'override tool loop limit', parseInteger)
        .option('--max-tokens <n>', 'override max tokens', parseInteger)
        .addOption(new Option('--history <mode>', 'history mode').choices(HISTORY_MODES))
        .option('--stdin', 'read the prompt from stdin when no question is given')
        .addOption(new Option('--log-level <level>', 'log agent activity to stderr').choices(LOG_LEVELS))
        .addHelpText('after', EXAMPLES)
        .exitOverride()

    if (output) program.configureOutput(output)
    return program
}

export function parseCommandLine(program: Command, argv: readonly string[]): ParsedCommandLine {
    program.parse([...argv], { from: 'user' })
    return {
        options: OptionsSchema.parse(program.opts()),
        question: program.args.join(' '),
    }
}

export function overridesFromOptions(options: CliOptions): ConfigOverrides {
    return {
        toolLoops: options.toolLoops,
        maxTokens: options.maxTokens,
        history: options.history,
    }
}
