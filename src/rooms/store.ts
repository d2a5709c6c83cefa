import path from 'node:path'
import { errorMessage, PersistenceError } from '../core/errors.js'
import { type FileSystem, writeAtomic } from '../core/fs.js'
import type { Logger } from '../logger/index.js'
import { freezeRoom, type Room, RoomSchema } from './types.js'

export interface RoomStore {
    save(room: Room): Promise<void>
    load(id: string): Promise<Room | undefined>
    loadAll(): Promise<Room[]>
    exists(id: string): Promise<boolean>
}

const RECORD_EXT = '.json'

/**
 * One JSON record per room under `<dataDir>/rooms`. No caching; the
 * RoomManager owns the in-memory view.
 */
export class FileRoomStore implements RoomStore {
    private roomsDir: string

    constructor(
        private fs: FileSystem,
        dataDir: string,
        private logger: Logger
    ) {
        this.roomsDir = path.join(dataDir, 'rooms')
    }

    private fileFor(id: string): string {
        return path.join(this.roomsDir, `${id}${RECORD_EXT}`)
    }

    async save(room: Room): Promise<void> {
        const file = this.fileFor(room.id)
        const record: Room = {
            id: room.id,
            type: room.type,
            participants: [...room.participants],
            createdAt: room.createdAt,
            isDefault: room.isDefault,
            seq: room.seq,
        }
        try {
            await writeAtomic(this.fs, file, JSON.stringify(record, null, 2))
        } catch (error) {
            throw new PersistenceError(`Failed to write ${file}: ${errorMessage(error)}`, { cause: error })
        }
        this.logger.debug({ roomId: room.id }, 'room:saved')
    }

    async load(id: string): Promise<Room | undefined> {
        const file = this.fileFor(id)
        if (!(await this.guard(file, () => this.fs.exists(file)))) return undefined
        return this.readRecord(file)
    }

    async loadAll(): Promise<Room[]> {
        const names = await this.guard(this.roomsDir, () => this.fs.list(this.roomsDir))
        const rooms: Room[] = []
        for (const name of names) {
            if (!name.endsWith(RECORD_EXT)) continue
            rooms.push(await this.readRecord(path.join(this.roomsDir, name)))
        }
        return rooms
    }

    async exists(id: string): Promise<boolean> {
        const file = this.fileFor(id)
        return this.guard(file, () => this.fs.exists(file))
    }

    private async readRecord(file: string): Promise<Room> {
        const raw = await this.guard(file, () => this.fs.readJSON(file))
        const parsed = RoomSchema.safeParse(raw)
        if (!parsed.success) {
            const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
            throw new PersistenceError(`Corrupt room record ${file}: ${issues.join('; ')}`)
        }
        const expectedId = path.basename(file, RECORD_EXT)
        if (parsed.data.id !== expectedId) {
            throw new PersistenceError(`Corrupt room record ${file}: id '${parsed.data.id}' does not match file name`)
        }
        return freezeRoom(parsed.data)
    }

    private async guard<T>(target: string, op: () => Promise<T>): Promise<T> {
        try {
            return await op()
        } catch (error) {
            throw new PersistenceError(`Failed to read ${target}: ${errorMessage(error)}`, { cause: error })
        }
    }
}
