import { describe, it, expect } from 'vitest'
import { buildRuntimeContext } from '../src/runtime-context'
import { formatConfig, formatPaths } from '../src/print'

const config = { model: 'test-model', maxTokens: 800, toolLoops: 5, history: 'persist', overridePermission: 'all' } as const

describe('buildRuntimeContext', () => {
    it('lists the invocation facts and ends with a blank line', () => {
        const text = buildRuntimeContext(config, {
            now: new Date('2026-01-02T03:04:05Z'),
            cwd: '/work',
            hostname: 'testhost',
            os: 'Linux 6.0',
            depth: 1,
            maxDepth: 2,
        })

        expect(text).toBe(
            'RUNTIME CONTEXT\n' +
                '- Current time: 2026-01-02T03:04:05.000Z\n' +
                '- Working directory: /work\n' +
                '- Hostname: testhost\n' +
                '- OS: Linux 6.0\n' +
                '- Depth: 1\n' +
                '- Max depth: 2\n' +
                '- Model: test-model\n' +
                '- Max tokens: 800\n' +
                '- Tool loops: 5\n' +
                '- History: persist\n\n',
        )
    })
})

describe('print helpers', () => {
    it('formats resolved paths', () => {
        expect(formatPaths({ configFile: '/cfg/config.json', promptFile: null, policyFile: null }, 0)).toBe(
            'depth: 0\nconfig.json: /cfg/config.json\nsysprompt.txt: (not found)\npolicy.json: (not found)\n',
        )
    })

    it('formats the effective config', () => {
        expect(formatConfig(config, null, 0, 1)).toBe(
            'depth: 0\nmax_depth: 1\nmodel: test-model\nmax_tokens: 800\ntool_loops: 5\n' +
                'history: persist\noverride_policy: all\nhistory_file: (none)\n',
        )
    })
})
