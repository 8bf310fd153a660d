import { open } from 'node:fs/promises'
import { z } from 'zod'
import { defineTool, errorCode, toolResult } from '@aido/core'
import type { ToolDefinition, ToolResult } from '@aido/core'
import { parseArgs, resolveToolPath } from './args'

export const DEFAULT_MAX_BYTES = 200_000

const ReadFileArgs = z.object({
    path: z.string().min(1),
    max_bytes: z.coerce.number().int().positive().default(DEFAULT_MAX_BYTES),
})

export function truncationNotice(shown: number, size: number): string {
    return `[truncated: showing first ${shown} of ${size} bytes]`
}

/** Map the filesystem errors a model can act on to results. */
export function fsFailure(err: unknown, path: string): ToolResult | undefined {
    switch (errorCode(err)) {
        case 'ENOENT':
        case 'ENOTDIR':
            return toolResult('missing', `no such file: ${path}`)
        case 'EACCES':
        case 'EPERM':
            return toolResult('refused', `permission denied: ${path}`)
        case 'EISDIR':
            return toolResult('refused', `${path} is a directory`)
        default:
            return undefined
    }
}

export function readFileTool(): ToolDefinition {
    return defineTool({
        schema: {
            name: 'read_file',
            description: 'Read a text file. Files larger than max_bytes are cut off with a truncation notice.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'File path, relative to the working directory or absolute.' },
                    max_bytes: { type: 'integer', description: `Maximum bytes to return. Default ${DEFAULT_MAX_BYTES}.` },
                },
                required: ['path'],
            },
        },
        async execute(args, ctx) {
            const parsed = parseArgs('read_file', ReadFileArgs, args)
            if (!parsed.ok) return parsed.result

            const maxBytes = parsed.value.max_bytes
            const target = resolveToolPath(ctx.invocation.cwd, parsed.value.path)

            try {
                const handle = await open(target, 'r')
                try {
                    const info = await handle.stat()
                    if (info.isDirectory()) return toolResult('refused', `${target} is a directory`)

                    const length = Math.min(info.size, maxBytes)
                    const buffer = Buffer.alloc(length)
                    const { bytesRead } = await handle.read(buffer, 0, length, 0)
                    const text = buffer.subarray(0, bytesRead).toString('utf8')

                    if (info.size > maxBytes) {
                        return toolResult('truncated', `${text}\n\n${truncationNotice(bytesRead, info.size)}`)
                    }
                    return toolResult('ok', text)
                } finally {
                    await handle.close()
                }
            } catch (err) {
                const failure = fsFailure(err, target)
                if (failure) return failure
                throw err
            }
        },
    })
}
