import { z } from 'zod'
import { decorateCommand, defineTool, toolResult } from '@aido/core'
import type { RecursionGuardOptions, ToolDefinition } from '@aido/core'
import { parseArgs } from './args'
import { execShell } from './shell'
import type { ShellExecutor } from './shell'

export const NO_OUTPUT_MESSAGE = 'Command executed, but returned no output or failed.'

/** Custom event emitted with the command line actually handed to the shell. */
export const COMMAND_EXECUTE_EVENT = 'command:execute'

export interface CommandExecuteEvent {
    /** After the recursion guard */
    command: string
    /** As requested by the model */
    requested: string
}

const RunCommandArgs = z.object({
    command: z.string().min(1),
})

export interface RunCommandOptions {
    executor?: ShellExecutor | undefined
    guard?: RecursionGuardOptions | undefined
}

export function runCommandTool(options: RunCommandOptions = {}): ToolDefinition {
    const executor = options.executor ?? execShell

    return defineTool({
        schema: {
            name: 'run_command',
            description: 'Execute a shell command on the local system and return its combined output.',
            parameters: {
                type: 'object',
                properties: {
                    command: { type: 'string', description: 'The shell command to run.' },
                },
                required: ['command'],
            },
        },
        async execute(args, ctx) {
            const parsed = parseArgs('run_command', RunCommandArgs, args)
            if (!parsed.ok) return parsed.result

            const { depth, maxDepth, cwd } = ctx.invocation
            const requested = parsed.value.command
            const command = decorateCommand(requested, depth, maxDepth, options.guard)

            const event: CommandExecuteEvent = { command, requested }
            ctx.emit(COMMAND_EXECUTE_EVENT, event)

            const output = await executor.run(command, { cwd })
            if (output.length === 0) return toolResult('empty', NO_OUTPUT_MESSAGE)
            return toolResult('ok', output)
        },
    })
}
