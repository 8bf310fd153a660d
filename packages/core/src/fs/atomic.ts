import { randomUUID } from 'node:crypto'
import { rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/** Filesystem calls used by {@link atomicWrite}, swappable in tests. */
export interface AtomicWriteOps {
    writeFile(path: string, data: string): Promise<void>
    rename(from: string, to: string): Promise<void>
    rm(path: string, options: { force: boolean }): Promise<void>
}

const nodeOps: AtomicWriteOps = { writeFile, rename, rm }

/**
 * Write `data` to a uniquely named sibling, then rename it over `target`.
 * Readers see either the old file or the new one, never a partial write.
 * The parent directory must exist.
 */
export async function atomicWrite(target: string, data: string, ops: AtomicWriteOps = nodeOps): Promise<void> {
    const tmp = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`)

    try {
        await ops.writeFile(tmp, data)
        await ops.rename(tmp, target)
    } catch (err) {
        await ops.rm(tmp, { force: true })
        throw err
    }
}
