import { describe, it, expect, vi } from 'vitest'
import { InvalidEntryError, PersistenceError, SealedLogError, WorkLogNotFoundError } from '../../../src/core/errors.js'
import { MockFileSystem } from '../../../src/core/fs.js'
import { WorkLogArchive } from '../../../src/worklog/archive.js'
import { DATA_DIR, readyRoomFixture, silentLogger } from '../../helpers/fixtures.js'
import { createWorkLogManager, launchRoom } from '../../helpers/worklog.js'

describe('WorkLogManager', () => {
    describe('open', () => {
        it('binds the log to a snapshot of the room', () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom, 'plan the launch')

            const log = manager.get(handle)
            expect(log).toMatchObject({
                id: handle.id,
                sessionKey: 's1',
                query: 'plan the launch',
                roomContext: { roomId: 'launch', roomType: 'project', participants: ['leader', 'alice'] },
                entries: [],
            })
            expect(log?.sealedAt).toBeUndefined()
        })

        it('keeps the snapshot when the room changes later', async () => {
            const { manager: rooms } = await readyRoomFixture()
            const room = await rooms.createRoom('launch', 'project', ['alice'])
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', room)

            await rooms.inviteParticipant('launch', 'bob')

            const snapshot = manager.get(handle)?.roomContext
            expect(snapshot?.participants).toEqual(['leader', 'alice'])
            expect(Object.isFrozen(snapshot)).toBe(true)
            expect(Object.isFrozen(snapshot?.participants)).toBe(true)
        })

        it('makes the new log the current one', () => {
            const { manager } = createWorkLogManager()
            manager.open('s1', launchRoom)
            const second = manager.open('s1', launchRoom)

            expect(manager.getCurrent('s1')?.id).toBe(second.id)
            expect(manager.getCurrent('s2')).toBeUndefined()
        })

        it('emits worklog:opened', () => {
            const { manager, eventBus } = createWorkLogManager()
            const handler = vi.fn()
            eventBus.on('worklog:opened', handler)

            const handle = manager.open('s1', launchRoom)
            expect(handler).toHaveBeenCalledWith({ logId: handle.id, sessionKey: 's1', roomId: 'launch' })
        })
    })

    describe('append', () => {
        it('assigns sequence numbers from 1', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)

            const first = await manager.append(handle, { level: 'decision', message: 'Split the work', confidence: 0.8 })
            const second = await manager.append(handle, {
                level: 'tool',
                message: 'Read the brief',
                toolName: 'read_file',
                result: 'success',
                durationMs: 12,
                botName: 'researcher',
            })

            expect(first).toMatchObject({ sequence: 1, level: 'decision', message: 'Split the work', confidence: 0.8 })
            expect(second).toMatchObject({ sequence: 2, toolName: 'read_file', durationMs: 12, botName: 'researcher' })
            expect(Object.isFrozen(second)).toBe(true)
        })

        it('omits optional fields that were not given', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            const entry = await manager.append(handle, { level: 'error', message: 'Timed out' })

            expect(Object.keys(entry).sort()).toEqual(['level', 'message', 'recordedAt', 'sequence'])
        })

        it('trims messages', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            const entry = await manager.append(handle, { level: 'coordination', message: '  hand off  ' })
            expect(entry.message).toBe('hand off')
        })

        it('keeps order and density under concurrent appends', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)

            await Promise.all(
                Array.from({ length: 20 }, (_, i) => manager.append(handle, { level: 'coordination', message: `step ${i}` }))
            )

            const entries = manager.get(handle)?.entries ?? []
            expect(entries.map((e) => e.sequence)).toEqual(Array.from({ length: 20 }, (_, i) => i + 1))
            expect(entries.map((e) => e.message)).toEqual(Array.from({ length: 20 }, (_, i) => `step ${i}`))
        })

        it('emits worklog:appended', async () => {
            const { manager, eventBus } = createWorkLogManager()
            const handler = vi.fn()
            eventBus.on('worklog:appended', handler)
            const handle = manager.open('s1', launchRoom)

            await manager.append(handle, { level: 'decision', message: 'Go' })
            expect(handler).toHaveBeenCalledWith({ logId: handle.id, sequence: 1, level: 'decision' })
        })

        it('validates entries by level', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)

            await expect(manager.append(handle, { level: 'tool', message: 'ran something' })).rejects.toThrow(
                'Invalid tool entry: toolName: tool entries need a toolName'
            )
            await expect(manager.append(handle, { level: 'error', message: 'x', confidence: 0.5 })).rejects.toThrow(
                InvalidEntryError
            )
            await expect(manager.append(handle, { level: 'decision', message: 'x', confidence: 1.5 })).rejects.toThrow(
                InvalidEntryError
            )
            await expect(manager.append(handle, { level: 'decision', message: '   ' })).rejects.toThrow(InvalidEntryError)
            expect(manager.get(handle)?.entries).toEqual([])
        })

        it('fails for an unknown handle', async () => {
            const { manager } = createWorkLogManager()
            await expect(manager.append({ id: 'missing', sessionKey: 's1' }, { level: 'decision', message: 'x' })).rejects.toThrow(
                WorkLogNotFoundError
            )
        })

        it('fails for a handle presented under another session', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            await expect(manager.append({ id: handle.id, sessionKey: 's2' }, { level: 'decision', message: 'x' })).rejects.toThrow(
                WorkLogNotFoundError
            )
        })
    })

    describe('seal', () => {
        it('freezes the entry list', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            await manager.append(handle, { level: 'decision', message: 'Go' })

            const sealed = await manager.seal(handle)
            expect(sealed.sealedAt).toBeDefined()
            expect(sealed.entries).toHaveLength(1)
            expect(Object.isFrozen(sealed.entries)).toBe(true)

            await expect(manager.append(handle, { level: 'decision', message: 'Too late' })).rejects.toThrow(SealedLogError)
            expect(manager.get(handle)?.entries).toHaveLength(1)
        })

        it('is idempotent', async () => {
            const { manager, eventBus } = createWorkLogManager()
            const handler = vi.fn()
            eventBus.on('worklog:sealed', handler)
            const handle = manager.open('s1', launchRoom)

            const first = await manager.seal(handle)
            const second = await manager.seal(handle)

            expect(second).toEqual(first)
            expect(handler).toHaveBeenCalledTimes(1)
            expect(handler).toHaveBeenCalledWith({ logId: handle.id, sessionKey: 's1', entryCount: 0 })
        })

        it('waits for appends queued before it', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)

            const pending = manager.append(handle, { level: 'decision', message: 'first' })
            const sealed = await manager.seal(handle)
            await pending

            expect(sealed.entries.map((e) => e.message)).toEqual(['first'])
        })

        it('archives the sealed log', async () => {
            const fs = new MockFileSystem()
            const archive = new WorkLogArchive(fs, DATA_DIR, silentLogger())
            const { manager } = createWorkLogManager(archive)
            const handle = manager.open('s1', launchRoom)
            await manager.append(handle, { level: 'decision', message: 'Go' })

            const sealed = await manager.seal(handle)
            expect(await archive.load('s1')).toEqual([sealed])
        })

        it('leaves the log open when archiving fails', async () => {
            const archive = new WorkLogArchive(new MockFileSystem(), DATA_DIR, silentLogger())
            vi.spyOn(archive, 'record').mockRejectedValueOnce(new PersistenceError('disk full'))
            const { manager } = createWorkLogManager(archive)
            const handle = manager.open('s1', launchRoom)

            await expect(manager.seal(handle)).rejects.toThrow(PersistenceError)
            expect(manager.get(handle)?.sealedAt).toBeUndefined()

            await manager.append(handle, { level: 'decision', message: 'still open' })
            const sealed = await manager.seal(handle)
            expect(sealed.entries).toHaveLength(1)
        })
    })

    describe('history', () => {
        it('returns logs in open order, optionally by room', () => {
            const { manager } = createWorkLogManager()
            const a = manager.open('s1', launchRoom)
            const b = manager.open('s1', { ...launchRoom, id: 'ops', type: 'coordination' })
            const c = manager.open('s1', launchRoom)
            manager.open('s2', launchRoom)

            expect(manager.getBySession('s1').map((l) => l.id)).toEqual([a.id, b.id, c.id])
            expect(manager.getBySession('s1', 'Launch').map((l) => l.id)).toEqual([a.id, c.id])
            expect(manager.getBySession('s3')).toEqual([])
        })

        it('returns copies that later appends do not change', async () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            const before = manager.get(handle)

            await manager.append(handle, { level: 'decision', message: 'Go' })

            expect(before?.entries).toEqual([])
            expect(manager.get(handle)?.entries).toHaveLength(1)
        })

        it('discards a finished session', () => {
            const { manager } = createWorkLogManager()
            const handle = manager.open('s1', launchRoom)
            manager.discardSession('s1')

            expect(manager.get(handle)).toBeUndefined()
            expect(manager.getBySession('s1')).toEqual([])
        })

        it('clears every session at once', async () => {
            const { manager } = createWorkLogManager()
            const first = manager.open('s1', launchRoom)
            manager.open('s2', launchRoom)
            manager.clear()

            expect(manager.getCurrent('s1')).toBeUndefined()
            expect(manager.getCurrent('s2')).toBeUndefined()
            await expect(manager.append(first, { level: 'decision', message: 'Late' })).rejects.toThrow(WorkLogNotFoundError)
        })
    })
})
