import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { atomicWrite } from '../../src'

let dir: string

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aido-atomic-'))
})

afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
})

describe('atomicWrite', () => {
    it('creates and replaces the target', async () => {
        const target = join(dir, 'out.json')

        await atomicWrite(target, 'first')
        await atomicWrite(target, 'second')

        expect(await readFile(target, 'utf8')).toBe('second')
        expect(await readdir(dir)).toEqual(['out.json'])
    })

    it('keeps the previous content when the rename fails', async () => {
        const target = join(dir, 'out.json')
        await writeFile(target, 'original')

        const write = atomicWrite(target, 'replacement', {
            writeFile: (path, data) => writeFile(path, data),
            rename: async () => {
                throw new Error('disk full')
            },
            rm,
        })

        await expect(write).rejects.toThrow('disk full')
        expect(await readFile(target, 'utf8')).toBe('original')
        expect(await readdir(dir)).toEqual(['out.json'])
    })

    it('fails when the parent directory is missing', async () => {
        await expect(atomicWrite(join(dir, 'missing', 'out.json'), 'x')).rejects.toThrow(/ENOENT/)
    })
})
