import path from 'node:path'
import { errorMessage, PersistenceError } from '../core/errors.js'
import { type FileSystem, writeAtomic } from '../core/fs.js'
import { KeyedMutex } from '../core/lock.js'
import type { Logger } from '../logger/index.js'
import { slugify } from '../rooms/slug.js'
import { type WorkLog, WorkLogSchema } from './types.js'

const RECORD_PATTERN = /^(\d+)-.+\.json$/
const DAY_MS = 24 * 60 * 60 * 1000

export interface RecentLogsQuery {
    roomId?: string
    limit?: number
}

interface StoredRecord {
    file: string
    index: number
}

// '.' is escaped too so no key can name '.' or '..'
function encodeSegment(value: string): string {
    return encodeURIComponent(value).replace(/\./g, '%2E')
}

function newestFirst(a: WorkLog, b: WorkLog): number {
    if (a.startedAt !== b.startedAt) return a.startedAt < b.startedAt ? 1 : -1
    const aSealed = a.sealedAt ?? ''
    const bSealed = b.sealedAt ?? ''
    if (aSealed !== bSealed) return aSealed < bSealed ? 1 : -1
    return 0
}

/**
 * Sealed work logs on disk: one directory per session key, one JSON record
 * per log. Record names carry a running index so a session reads back in
 * sealing order.
 */
export class WorkLogArchive {
    private archiveDir: string
    private locks = new KeyedMutex()

    constructor(
        private fs: FileSystem,
        dataDir: string,
        private logger: Logger
    ) {
        this.archiveDir = path.join(dataDir, 'worklogs')
    }

    sessionDir(sessionKey: string): string {
        return path.join(this.archiveDir, encodeSegment(sessionKey))
    }

    async record(log: WorkLog): Promise<string> {
        const dir = this.sessionDir(log.sessionKey)
        const file = await this.locks.withLock(dir, async () => {
            try {
                const stored = await this.listRecords(dir)
                const index = stored.reduce((max, r) => Math.max(max, r.index), 0) + 1
                const target = path.join(dir, `${String(index).padStart(6, '0')}-${encodeSegment(log.id)}.json`)
                await writeAtomic(this.fs, target, JSON.stringify(log, null, 2))
                return target
            } catch (error) {
                throw new PersistenceError(`Failed to archive work log ${log.id}: ${errorMessage(error)}`, { cause: error })
            }
        })
        this.logger.debug({ logId: log.id, file }, 'worklog:archived')
        return file
    }

    /** Every archived log of one session, in sealing order. */
    async load(sessionKey: string): Promise<WorkLog[]> {
        const dir = this.sessionDir(sessionKey)
        const stored = await this.guard(dir, () => this.listRecords(dir))
        const logs: WorkLog[] = []
        for (const { file } of stored) logs.push(await this.readRecord(file))
        return logs
    }

    /** Logs across all sessions, newest `startedAt` first. */
    async listRecent(query: RecentLogsQuery = {}): Promise<WorkLog[]> {
        const limit = query.limit ?? 10
        if (!(limit > 0)) return []
        const roomId = query.roomId === undefined ? undefined : slugify(query.roomId)

        const logs: WorkLog[] = []
        for (const dir of await this.sessionDirs()) {
            const stored = await this.guard(dir, () => this.listRecords(dir))
            for (const { file } of stored) {
                const log = await this.readRecord(file)
                if (roomId === undefined || log.roomContext.roomId === roomId) logs.push(log)
            }
        }
        return logs.sort(newestFirst).slice(0, Math.floor(limit))
    }

    /**
     * Deletes logs that started more than `maxAgeDays` before `now` and any
     * session directory left empty. A non-positive age keeps everything.
     */
    async cleanup(maxAgeDays: number, now: number = Date.now()): Promise<number> {
        if (!Number.isFinite(maxAgeDays) || maxAgeDays <= 0) return 0
        const cutoff = now - maxAgeDays * DAY_MS

        let removed = 0
        for (const dir of await this.sessionDirs()) {
            removed += await this.locks.withLock(dir, async () => {
                const stored = await this.guard(dir, () => this.listRecords(dir))
                let count = 0
                for (const { file } of stored) {
                    const log = await this.readRecord(file)
                    if (Date.parse(log.startedAt) >= cutoff) continue
                    await this.guard(file, () => this.fs.remove(file))
                    count++
                }
                if (count === stored.length) {
                    await this.guard(dir, () => this.fs.remove(dir))
                }
                return count
            })
        }

        if (removed > 0) this.logger.info({ removed, maxAgeDays }, 'Removed expired work logs')
        return removed
    }

    private async sessionDirs(): Promise<string[]> {
        const names = await this.guard(this.archiveDir, () => this.fs.list(this.archiveDir))
        return names.map((name) => path.join(this.archiveDir, name))
    }

    private async listRecords(dir: string): Promise<StoredRecord[]> {
        const records: StoredRecord[] = []
        for (const name of await this.fs.list(dir)) {
            const match = RECORD_PATTERN.exec(name)
            if (!match?.[1]) continue
            records.push({ file: path.join(dir, name), index: Number(match[1]) })
        }
        return records.sort((a, b) => a.index - b.index)
    }

    private async readRecord(file: string): Promise<WorkLog> {
        let raw: unknown
        try {
            raw = await this.fs.readJSON(file)
        } catch (error) {
            throw new PersistenceError(`Corrupt work log record ${file}: ${errorMessage(error)}`, { cause: error })
        }
        const parsed = WorkLogSchema.safeParse(raw)
        if (!parsed.success) {
            throw new PersistenceError(`Corrupt work log record ${file}: ${parsed.error.issues[0]?.message ?? 'invalid'}`)
        }
        return parsed.data
    }

    private async guard<T>(target: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn()
        } catch (error) {
            if (error instanceof PersistenceError) throw error
            throw new PersistenceError(`Failed to access ${target}: ${errorMessage(error)}`, { cause: error })
        }
    }
}
