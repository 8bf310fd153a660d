import type { RecursionGuardOptions, ToolDefinition } from '@aido/core'
import { fileInfoTool } from './file-info'
import { readFileTool } from './read-file'
import { runCommandTool } from './run-command'
import type { ShellExecutor } from './shell'
import { writeFileTool } from './write-file'

export { COMMAND_EXECUTE_EVENT, NO_OUTPUT_MESSAGE, runCommandTool } from './run-command'
export type { CommandExecuteEvent, RunCommandOptions } from './run-command'
export { writeFileTool } from './write-file'
export { DEFAULT_MAX_BYTES, readFileTool, truncationNotice } from './read-file'
export { DEFAULT_HEAD_BYTES, MAX_HEAD_BYTES, describePath, fileInfoTool } from './file-info'
export type { FileInfo, FileType } from './file-info'
export { execShell } from './shell'
export type { ShellExecutor, ShellRunOptions } from './shell'
export { parseArgs, resolveToolPath } from './args'

export interface BuiltinToolsOptions {
    executor?: ShellExecutor | undefined
    guard?: RecursionGuardOptions | undefined
}

/**
 * The four tools exposed to the model, in schema order:
 * `run_command`, `write_file`, `read_file`, `file_info`.
 *
 * @example
 * ```ts
 * const agent = createAgent({ name: 'aido', tools: builtinTools() })
 * ```
 */
export function builtinTools(options: BuiltinToolsOptions = {}): ToolDefinition[] {
    return [
        runCommandTool({ executor: options.executor, guard: options.guard }),
        writeFileTool(),
        readFileTool(),
        fileInfoTool(),
    ]
}
