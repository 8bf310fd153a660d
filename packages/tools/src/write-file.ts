import { mkdir, stat } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import { dirname } from 'node:path'
import { z } from 'zod'
import { atomicWrite, defineTool, errorCode, toolResult } from '@aido/core'
import type { ToolDefinition } from '@aido/core'
import { parseArgs, resolveToolPath } from './args'

const WriteFileArgs = z.object({
    path: z.string().min(1),
    content: z.string(),
    mkdirp: z.boolean().default(true),
    overwrite: z.boolean().default(true),
})

async function statOrNull(path: string): Promise<Stats | null> {
    try {
        return await stat(path)
    } catch (err) {
        if (errorCode(err) === 'ENOENT' || errorCode(err) === 'ENOTDIR') return null
        throw err
    }
}

export function writeFileTool(): ToolDefinition {
    return defineTool({
        schema: {
            name: 'write_file',
            description:
                'Write text to a file atomically. Creates parent directories unless mkdirp is false; ' +
                'refuses to replace an existing file when overwrite is false.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'File path, relative to the working directory or absolute.' },
                    content: { type: 'string', description: 'Full file content.' },
                    mkdirp: { type: 'boolean', description: 'Create missing parent directories. Default true.' },
                    overwrite: { type: 'boolean', description: 'Replace an existing file. Default true.' },
                },
                required: ['path', 'content'],
            },
        },
        async execute(args, ctx) {
            const parsed = parseArgs('write_file', WriteFileArgs, args)
            if (!parsed.ok) return parsed.result

            const { content, mkdirp, overwrite } = parsed.value
            const target = resolveToolPath(ctx.invocation.cwd, parsed.value.path)

            try {
                const existing = await statOrNull(target)
                if (existing?.isDirectory()) return toolResult('refused', `${target} is a directory`)
                if (existing && !overwrite) return toolResult('refused', `${target} already exists (overwrite=false)`)

                const parent = dirname(target)
                const parentStat = await statOrNull(parent)
                if (!parentStat) {
                    if (!mkdirp) return toolResult('missing', `parent directory does not exist: ${parent}`)
                    await mkdir(parent, { recursive: true })
                } else if (!parentStat.isDirectory()) {
                    return toolResult('refused', `parent path is not a directory: ${parent}`)
                }

                await atomicWrite(target, content)
            } catch (err) {
                const code = errorCode(err)
                if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
                    return toolResult('refused', `permission denied: ${target}`)
                }
                throw err
            }

            const bytes = Buffer.byteLength(content, 'utf8')
            return toolResult('ok', `Wrote ${bytes} bytes to ${target}`)
        },
    })
}
