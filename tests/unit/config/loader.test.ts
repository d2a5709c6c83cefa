import path from 'node:path'
import { describe, it, expect } from 'vitest'
import { MockFileSystem } from '../../../src/core/fs.js'
import { loadConfig } from '../../../src/config/loader.js'
import { CONFIG_DIR, DEFAULT_CONFIG, GLOBAL_CONFIG_FILE } from '../../../src/config/defaults.js'

const PROJECT_DIR = '/work/project'
const LOCAL_FILE = path.join(PROJECT_DIR, '.roomlog/config.json')

describe('loadConfig', () => {
    it('returns defaults when no config files exist', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })

        expect(config).toEqual({
            ...DEFAULT_CONFIG,
            projectDir: PROJECT_DIR,
            configDir: CONFIG_DIR,
        })
    })

    it('loads the global config file', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ coordinatorId: 'chief' }))

        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })
        expect(config.coordinatorId).toBe('chief')
    })

    it('local config overrides global config', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ coordinatorId: 'chief', defaultRoomId: 'lobby' }))
        fs.setFile(LOCAL_FILE, JSON.stringify({ coordinatorId: 'lead' }))

        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })
        expect(config.coordinatorId).toBe('lead')
        expect(config.defaultRoomId).toBe('lobby')
    })

    it('merges nested sections field by field', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, JSON.stringify({ thinking: { mode: 'user_choice' } }))
        fs.setFile(LOCAL_FILE, JSON.stringify({ thinking: { showStats: false } }))

        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })
        expect(config.thinking).toEqual({ mode: 'user_choice', defaultExpanded: false, showStats: false })
    })

    it('reads work log retention next to the archive switch', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ worklog: { retentionDays: 14 } }))

        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })
        expect(config.worklog).toEqual({ archive: true, retentionDays: 14 })
    })

    it('env vars override config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(LOCAL_FILE, JSON.stringify({ coordinatorId: 'lead', logLevel: 'warn' }))

        const config = await loadConfig({
            fs,
            projectDir: PROJECT_DIR,
            env: { ROOMLOG_COORDINATOR: 'env-lead', ROOMLOG_LOG_LEVEL: 'error' },
        })
        expect(config.coordinatorId).toBe('env-lead')
        expect(config.logLevel).toBe('error')
    })

    it('ignores an unknown log level in the environment', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: { ROOMLOG_LOG_LEVEL: 'loud' } })
        expect(config.logLevel).toBe('info')
    })

    it('overrides win over env vars', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({
            fs,
            projectDir: PROJECT_DIR,
            env: { ROOMLOG_COORDINATOR: 'env-lead' },
            overrides: { coordinatorId: 'flag-lead', summary: { maxActions: 3 } },
        })
        expect(config.coordinatorId).toBe('flag-lead')
        expect(config.summary).toEqual({ maxActions: 3, clauseLength: 40 })
    })

    it('resolves a relative data dir against the project dir', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: { ROOMLOG_DATA_DIR: 'state' } })
        expect(config.dataDir).toBe('/work/project/state')
    })

    it('keeps an absolute data dir', async () => {
        const fs = new MockFileSystem()
        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, overrides: { dataDir: '/var/roomlog' }, env: {} })
        expect(config.dataDir).toBe('/var/roomlog')
    })

    it('skips invalid config files', async () => {
        const fs = new MockFileSystem()
        fs.setFile(GLOBAL_CONFIG_FILE, '{ not json')
        fs.setFile(LOCAL_FILE, JSON.stringify({ summary: { clauseLength: 2 } }))

        const config = await loadConfig({ fs, projectDir: PROJECT_DIR, env: {} })
        expect(config.summary).toEqual({ maxActions: 2, clauseLength: 40 })
    })
})
