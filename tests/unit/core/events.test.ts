import { describe, it, expect, vi } from 'vitest'
import { TypedEventEmitter } from '../../../src/core/events.js'

describe('TypedEventEmitter', () => {
    it('emits and handles events', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('room:invited', handler)
        emitter.emit('room:invited', { roomId: 'dev', participantId: 'coder' })

        expect(handler).toHaveBeenCalledWith({ roomId: 'dev', participantId: 'coder' })
    })

    it('supports multiple handlers', () => {
        const emitter = new TypedEventEmitter()
        const h1 = vi.fn()
        const h2 = vi.fn()

        emitter.on('focus:switched', h1)
        emitter.on('focus:switched', h2)
        emitter.emit('focus:switched', { sessionKey: 's1', roomId: 'dev' })

        expect(h1).toHaveBeenCalledTimes(1)
        expect(h2).toHaveBeenCalledTimes(1)
    })

    it('removes handler with off', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('worklog:sealed', handler)
        emitter.off('worklog:sealed', handler)
        emitter.emit('worklog:sealed', { logId: 'l1', sessionKey: 's1', entryCount: 0 })

        expect(handler).not.toHaveBeenCalled()
    })

    it('removeAll clears all handlers', () => {
        const emitter = new TypedEventEmitter()
        const handler = vi.fn()

        emitter.on('worklog:opened', handler)
        emitter.removeAll()
        emitter.emit('worklog:opened', { logId: 'l1', sessionKey: 's1', roomId: 'general' })

        expect(handler).not.toHaveBeenCalled()
    })

    it('keeps going when a handler throws', () => {
        const emitter = new TypedEventEmitter()
        const after = vi.fn()

        emitter.on('worklog:appended', () => {
            throw new Error('listener failed')
        })
        emitter.on('worklog:appended', after)

        expect(() => emitter.emit('worklog:appended', { logId: 'l1', sequence: 1, level: 'decision' })).not.toThrow()
        expect(after).toHaveBeenCalledTimes(1)
    })
})
