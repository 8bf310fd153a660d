import { createHash } from 'node:crypto'
import { createReadStream } from 'node:fs'
import type { Stats } from 'node:fs'
import { open, stat } from 'node:fs/promises'
import { z } from 'zod'
import { defineTool, errorCode, toolResult } from '@aido/core'
import type { ToolDefinition } from '@aido/core'
import { parseArgs, resolveToolPath } from './args'
import { fsFailure } from './read-file'

export const DEFAULT_HEAD_BYTES = 16
export const MAX_HEAD_BYTES = 4096

const FileInfoArgs = z.object({
    path: z.string().min(1),
    head_bytes: z.coerce.number().int().min(0).max(MAX_HEAD_BYTES).default(DEFAULT_HEAD_BYTES),
})

export type FileType = 'file' | 'directory' | 'symlink' | 'other'

export type FileInfo =
    | { path: string; exists: false }
    | {
        path: string
        exists: true
        type: FileType
        size: number
        modified: string
        /** Regular files only */
        sha256?: string | undefined
        head_hex?: string | undefined
    }

function fileType(info: Stats): FileType {
    if (info.isFile()) return 'file'
    if (info.isDirectory()) return 'directory'
    if (info.isSymbolicLink()) return 'symlink'
    return 'other'
}

async function sha256Of(path: string): Promise<string> {
    const hash = createHash('sha256')
    for await (const chunk of createReadStream(path)) hash.update(chunk)
    return hash.digest('hex')
}

async function headHex(path: string, headBytes: number): Promise<string> {
    const handle = await open(path, 'r')
    try {
        const { buffer, bytesRead } = await handle.read(Buffer.alloc(headBytes), 0, headBytes, 0)
        return buffer.subarray(0, bytesRead).toString('hex')
    } finally {
        await handle.close()
    }
}

/** The file is streamed through the hash, never held in memory whole. */
async function digest(path: string, headBytes: number): Promise<{ sha256: string; head_hex: string }> {
    return {
        sha256: await sha256Of(path),
        head_hex: await headHex(path, headBytes),
    }
}

/**
 * Collect an existence, size, hash and leading-bytes report for a path.
 * A missing path is a report with `exists: false`, not a failure.
 */
export async function describePath(path: string, headBytes = DEFAULT_HEAD_BYTES): Promise<FileInfo> {
    let info: Stats
    try {
        info = await stat(path)
    } catch (err) {
        const code = errorCode(err)
        if (code === 'ENOENT' || code === 'ENOTDIR') return { path, exists: false }
        throw err
    }

    const type = fileType(info)
    const report: Extract<FileInfo, { exists: true }> = {
        path,
        exists: true,
        type,
        size: info.size,
        modified: info.mtime.toISOString(),
    }
    return type === 'file' ? { ...report, ...(await digest(path, headBytes)) } : report
}

export function fileInfoTool(): ToolDefinition {
    return defineTool({
        schema: {
            name: 'file_info',
            description:
                'Report whether a path exists, its type, size, modification time, SHA-256 and first bytes in hex. ' +
                'Use it to verify writes.',
            parameters: {
                type: 'object',
                properties: {
                    path: { type: 'string', description: 'File path, relative to the working directory or absolute.' },
                    head_bytes: {
                        type: 'integer',
                        description: `Leading bytes to include as hex. Default ${DEFAULT_HEAD_BYTES}.`,
                    },
                },
                required: ['path'],
            },
        },
        async execute(args, ctx) {
            const parsed = parseArgs('file_info', FileInfoArgs, args)
            if (!parsed.ok) return parsed.result

            const target = resolveToolPath(ctx.invocation.cwd, parsed.value.path)
            try {
                const report = await describePath(target, parsed.value.head_bytes)
                return toolResult('ok', JSON.stringify(report, null, 2))
            } catch (err) {
                const failure = fsFailure(err, target)
                if (failure) return failure
                throw err
            }
        },
    })
}
