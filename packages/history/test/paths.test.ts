import { describe, it, expect } from 'vitest'
import { BufferHistory, JsonFileHistory, createHistoryStore, resolveHistoryPath } from '../src'

const env = { home: '/home/dev', tmpDir: '/var/tmp/', uid: 1000, pid: 4242, programDir: '/opt/aido' }

describe('resolveHistoryPath', () => {
    it('places persistent history under the home state directory', () => {
        expect(resolveHistoryPath('persist', env)).toBe('/home/dev/.local/state/aido/conversation_history.json')
    })

    it('falls back to the program directory without a home', () => {
        expect(resolveHistoryPath('persist', { ...env, home: undefined })).toBe('/opt/aido/conversation_history.json')
    })

    it('scopes temporary history to user and process', () => {
        expect(resolveHistoryPath('temp', env)).toBe('/var/tmp/aido_history_1000_4242.json')
        expect(resolveHistoryPath('temp', { ...env, tmpDir: '' })).toBe('/tmp/aido_history_1000_4242.json')
    })

    it('has no location when disabled', () => {
        expect(resolveHistoryPath('none', env)).toBeNull()
    })
})

describe('createHistoryStore', () => {
    it('returns a file store for persistent modes', () => {
        const store = createHistoryStore('temp', env)
        expect(store).toBeInstanceOf(JsonFileHistory)
        expect(store?.location).toBe('/var/tmp/aido_history_1000_4242.json')
    })

    it('returns null when history is off', () => {
        expect(createHistoryStore('none', env)).toBeNull()
    })
})

describe('BufferHistory', () => {
    it('keeps the newest entries up to its limit', async () => {
        const store = new BufferHistory({ maxEntries: 2 })

        await store.save([
            { role: 'user', content: 'a' },
            { role: 'assistant', content: 'b' },
            { role: 'user', content: 'c' },
        ])

        expect(await store.load()).toEqual([
            { role: 'assistant', content: 'b' },
            { role: 'user', content: 'c' },
        ])
    })

    it('hands out copies', async () => {
        const store = new BufferHistory({ entries: [{ role: 'user', content: 'seed' }] })

        const loaded = await store.load()
        loaded.push({ role: 'assistant', content: 'local' })

        expect(store.snapshot()).toEqual([{ role: 'user', content: 'seed' }])
    })
})
