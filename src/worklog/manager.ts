import { randomUUID } from 'node:crypto'
import { InvalidEntryError, SealedLogError, WorkLogNotFoundError } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedMutex } from '../core/lock.js'
import type { Logger } from '../logger/index.js'
import { slugify } from '../rooms/slug.js'
import { type Room, type RoomSnapshot, snapshotRoom } from '../rooms/types.js'
import type { WorkLogArchive } from './archive.js'
import { type LogEntry, type LogEntryInput, LogEntryInputSchema, type WorkLog, type WorkLogHandle } from './types.js'

export interface WorkLogManagerOptions {
    logger: Logger
    eventBus: TypedEventEmitter
    archive?: WorkLogArchive
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

interface OpenLog {
    id: string
    sessionKey: string
    query?: string
    roomContext: RoomSnapshot
    entries: LogEntry[]
    startedAt: string
    sealedAt?: string
}

function view(log: OpenLog): WorkLog {
    return Object.freeze({
        id: log.id,
        sessionKey: log.sessionKey,
        ...(log.query !== undefined ? { query: log.query } : {}),
        roomContext: log.roomContext,
        entries: Object.freeze([...log.entries]),
        startedAt: log.startedAt,
        ...(log.sealedAt !== undefined ? { sealedAt: log.sealedAt } : {}),
    })
}

/**
 * Opens, appends to and seals work logs. Appends and sealing of one log are
 * serialized; different logs never wait on each other.
 */
export class WorkLogManager {
    private logs = new Map<string, OpenLog>()
    private sessions = new Map<string, string[]>()
    private locks = new KeyedMutex()
    private logger: Logger
    private eventBus: TypedEventEmitter
    private archive?: WorkLogArchive

    constructor(options: WorkLogManagerOptions) {
        this.logger = options.logger
        this.eventBus = options.eventBus
        this.archive = options.archive
    }

    open(sessionKey: string, room: Room, query?: string): WorkLogHandle {
        const log: OpenLog = {
            id: randomUUID(),
            sessionKey,
            roomContext: snapshotRoom(room),
            entries: [],
            startedAt: new Date().toISOString(),
        }
        if (query !== undefined) log.query = query

        this.logs.set(log.id, log)
        const history = this.sessions.get(sessionKey) ?? []
        history.push(log.id)
        this.sessions.set(sessionKey, history)

        this.logger.debug({ logId: log.id, sessionKey, roomId: room.id }, 'worklog:open')
        this.eventBus.emit('worklog:opened', { logId: log.id, sessionKey, roomId: room.id })
        return Object.freeze({ id: log.id, sessionKey })
    }

    append(handle: WorkLogHandle, input: LogEntryInput): Promise<LogEntry> {
        return this.locks.withLock(handle.id, () => {
            const log = this.require(handle)
            if (log.sealedAt !== undefined) throw new SealedLogError(log.id)

            const parsed = LogEntryInputSchema.safeParse(input)
            if (!parsed.success) {
                const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
                throw new InvalidEntryError(`Invalid ${String(input.level)} entry: ${issues.join('; ')}`, issues)
            }

            const data = parsed.data
            const entry: Mutable<LogEntry> = {
                sequence: log.entries.length + 1,
                level: data.level,
                message: data.message,
                recordedAt: new Date().toISOString(),
            }
            if (data.botName !== undefined) entry.botName = data.botName
            if (data.toolName !== undefined) entry.toolName = data.toolName
            if (data.result !== undefined) entry.result = data.result
            if (data.durationMs !== undefined) entry.durationMs = data.durationMs
            if (data.confidence !== undefined) entry.confidence = data.confidence

            const frozen = Object.freeze(entry)
            log.entries.push(frozen)
            this.eventBus.emit('worklog:appended', { logId: log.id, sequence: frozen.sequence, level: frozen.level })
            return frozen
        })
    }

    /** Idempotent; the sealed log is archived before it is marked sealed. */
    seal(handle: WorkLogHandle): Promise<WorkLog> {
        return this.locks.withLock(handle.id, async () => {
            const log = this.require(handle)
            if (log.sealedAt !== undefined) return view(log)

            const sealedAt = new Date().toISOString()
            const sealed = view({ ...log, sealedAt })
            if (this.archive) await this.archive.record(sealed)
            log.sealedAt = sealedAt

            this.logger.debug({ logId: log.id, entries: log.entries.length }, 'worklog:sealed')
            this.eventBus.emit('worklog:sealed', {
                logId: log.id,
                sessionKey: log.sessionKey,
                entryCount: log.entries.length,
            })
            return sealed
        })
    }

    get(handle: WorkLogHandle): WorkLog | undefined {
        const log = this.logs.get(handle.id)
        return log ? view(log) : undefined
    }

    getCurrent(sessionKey: string): WorkLog | undefined {
        const ids = this.sessions.get(sessionKey)
        const latest = ids?.[ids.length - 1]
        const log = latest === undefined ? undefined : this.logs.get(latest)
        return log ? view(log) : undefined
    }

    getBySession(sessionKey: string, roomFilter?: string): WorkLog[] {
        const roomId = roomFilter === undefined ? undefined : slugify(roomFilter)
        const result: WorkLog[] = []
        for (const id of this.sessions.get(sessionKey) ?? []) {
            const log = this.logs.get(id)
            if (!log) continue
            if (roomId !== undefined && log.roomContext.roomId !== roomId) continue
            result.push(view(log))
        }
        return result
    }

    /** Drops a finished session's logs from memory; archived copies stay on disk. */
    discardSession(sessionKey: string): void {
        for (const id of this.sessions.get(sessionKey) ?? []) {
            this.logs.delete(id)
        }
        this.sessions.delete(sessionKey)
    }

    /** Forgets every session; handles issued earlier stop resolving. */
    clear(): void {
        this.logs.clear()
        this.sessions.clear()
    }

    private require(handle: WorkLogHandle): OpenLog {
        const log = this.logs.get(handle.id)
        if (!log || log.sessionKey !== handle.sessionKey) throw new WorkLogNotFoundError(handle.id)
        return log
    }
}
