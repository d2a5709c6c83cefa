import {
    CapacityError,
    DuplicateRoomError,
    InvalidParticipantError,
    InvalidTypeError,
    NotInitializedError,
    PersistenceError,
    RoomNotFoundError,
} from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import { KeyedMutex } from '../core/lock.js'
import type { Logger } from '../logger/index.js'
import { normalizeRoomId, slugify } from './slug.js'
import type { RoomStore } from './store.js'
import { DIRECT_ROOM_CAPACITY, freezeRoom, type Room, type RoomSummary, type RoomType, RoomTypeSchema } from './types.js'

export interface RoomManagerOptions {
    store: RoomStore
    logger: Logger
    eventBus: TypedEventEmitter
    coordinatorId: string
    defaultRoomId: string
}

function byCreation(a: Room, b: Room): number {
    if (a.seq !== b.seq) return a.seq - b.seq
    if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? -1 : 1
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}

function normalizeParticipant(raw: string): string {
    const id = raw.trim()
    if (!id) throw new InvalidParticipantError(raw)
    return id
}

/**
 * Single source of truth for room existence and membership. Which room a
 * session is looking at is kept per session key here too, but it is never
 * written into the room records.
 */
export class RoomManager {
    private rooms = new Map<string, Room>()
    private focus = new Map<string, string>()
    private locks = new KeyedMutex()
    private loading: Promise<void> | null = null
    private defaultId: string | null = null
    private nextSeq = 1

    private store: RoomStore
    private logger: Logger
    private eventBus: TypedEventEmitter
    readonly coordinatorId: string
    private defaultRoomId: string

    constructor(options: RoomManagerOptions) {
        this.store = options.store
        this.logger = options.logger
        this.eventBus = options.eventBus
        this.coordinatorId = options.coordinatorId
        this.defaultRoomId = normalizeRoomId(options.defaultRoomId)
    }

    initialize(): Promise<void> {
        if (!this.loading) {
            this.loading = this.load().catch((error: unknown) => {
                this.loading = null
                throw error
            })
        }
        return this.loading
    }

    private async load(): Promise<void> {
        const loaded = (await this.store.loadAll()).sort(byCreation)
        const defaults = loaded.filter((r) => r.isDefault)
        if (defaults.length > 1) {
            throw new PersistenceError(`Multiple default rooms found: ${defaults.map((r) => r.id).join(', ')}`)
        }

        const rooms = new Map<string, Room>()
        for (const room of loaded) rooms.set(room.id, room)
        let nextSeq = loaded.reduce((max, room) => Math.max(max, room.seq), 0) + 1

        let defaultRoom = defaults[0]
        let createdDefault = false
        if (!defaultRoom) {
            if (rooms.has(this.defaultRoomId)) {
                throw new PersistenceError(`Room '${this.defaultRoomId}' exists but is not marked as the default room`)
            }
            defaultRoom = freezeRoom({
                id: this.defaultRoomId,
                type: 'open',
                participants: [this.coordinatorId],
                createdAt: new Date().toISOString(),
                isDefault: true,
                seq: nextSeq++,
            })
            await this.store.save(defaultRoom)
            rooms.set(defaultRoom.id, defaultRoom)
            this.logger.info({ roomId: defaultRoom.id }, 'Created default room')
            createdDefault = true
        }

        this.rooms = rooms
        this.nextSeq = nextSeq
        this.defaultId = defaultRoom.id
        this.logger.debug({ count: rooms.size }, 'Rooms loaded')

        if (createdDefault) {
            this.eventBus.emit('room:created', {
                roomId: defaultRoom.id,
                roomType: defaultRoom.type,
                participants: defaultRoom.participants,
            })
        }
    }

    private requireReady(): string {
        if (this.defaultId === null) throw new NotInitializedError('RoomManager')
        return this.defaultId
    }

    async createRoom(rawId: string, type: string, initialParticipants: readonly string[] = []): Promise<Room> {
        this.requireReady()
        const parsedType = RoomTypeSchema.safeParse(type)
        if (!parsedType.success) throw new InvalidTypeError(type)
        const roomType = parsedType.data
        const id = normalizeRoomId(rawId)
        const participants = this.initialParticipants(id, roomType, initialParticipants)

        return this.locks.withLock(id, async () => {
            if (this.rooms.has(id) || (await this.store.exists(id))) {
                throw new DuplicateRoomError(id)
            }

            const room = freezeRoom({
                id,
                type: roomType,
                participants,
                createdAt: new Date().toISOString(),
                isDefault: false,
                seq: this.nextSeq++,
            })
            await this.store.save(room)
            this.rooms.set(id, room)

            this.logger.info({ roomId: id, roomType, participants: participants.length }, 'Room created')
            this.eventBus.emit('room:created', { roomId: id, roomType, participants: room.participants })
            return room
        })
    }

    private initialParticipants(roomId: string, type: RoomType, requested: readonly string[]): string[] {
        const unique = [...new Set(requested.map(normalizeParticipant))]

        if (type === 'direct') {
            // the first listed participant is the creator; the coordinator only when nobody is named
            const members = unique.length > 0 ? unique : [this.coordinatorId]
            if (members.length > DIRECT_ROOM_CAPACITY) throw new CapacityError(roomId, DIRECT_ROOM_CAPACITY)
            return members
        }

        return unique.includes(this.coordinatorId) ? unique : [this.coordinatorId, ...unique]
    }

    getRoom(id: string): Room | undefined {
        this.requireReady()
        return this.rooms.get(slugify(id))
    }

    getDefaultRoom(): Room {
        const defaultId = this.requireReady()
        const room = this.rooms.get(defaultId)
        if (!room) throw new RoomNotFoundError(defaultId)
        return room
    }

    getParticipants(id: string): string[] {
        return [...(this.getRoom(id)?.participants ?? [])]
    }

    /** Default room first, then creation order. */
    listRooms(): RoomSummary[] {
        const defaultId = this.requireReady()
        const ordered = [...this.rooms.values()].sort((a, b) => {
            if (a.id === defaultId) return -1
            if (b.id === defaultId) return 1
            return byCreation(a, b)
        })
        return ordered.map((room) => ({
            id: room.id,
            type: room.type,
            participantCount: room.participants.length,
            isDefault: room.isDefault,
        }))
    }

    async inviteParticipant(roomId: string, participantId: string): Promise<Room> {
        this.requireReady()
        const id = slugify(roomId)
        const participant = normalizeParticipant(participantId)

        return this.locks.withLock(id, async () => {
            const room = this.rooms.get(id)
            if (!room) throw new RoomNotFoundError(roomId)
            if (room.participants.includes(participant)) {
                this.logger.debug({ roomId: id, participant }, 'Participant already in room')
                return room
            }
            if (room.type === 'direct' && room.participants.length >= DIRECT_ROOM_CAPACITY) {
                throw new CapacityError(id, DIRECT_ROOM_CAPACITY)
            }

            const updated = freezeRoom({ ...room, participants: [...room.participants, participant] })
            await this.store.save(updated)
            this.rooms.set(id, updated)

            this.logger.info({ roomId: id, participant }, 'Participant invited')
            this.eventBus.emit('room:invited', { roomId: id, participantId: participant })
            return updated
        })
    }

    async getOrCreateDirectRoom(peerId: string): Promise<Room> {
        const peer = normalizeParticipant(peerId)
        const id = normalizeRoomId(`dm-${peer}`)
        const existing = this.getRoom(id)
        if (existing) return existing
        try {
            return await this.createRoom(id, 'direct', [this.coordinatorId, peer])
        } catch (error) {
            if (!(error instanceof DuplicateRoomError)) throw error
            const winner = this.getRoom(id)
            if (!winner) throw error
            return winner
        }
    }

    switchFocus(sessionKey: string, roomId: string): Room {
        this.requireReady()
        const room = this.rooms.get(slugify(roomId))
        if (!room) throw new RoomNotFoundError(roomId)
        this.focus.set(sessionKey, room.id)
        this.logger.debug({ sessionKey, roomId: room.id }, 'Focus switched')
        this.eventBus.emit('focus:switched', { sessionKey, roomId: room.id })
        return room
    }

    getFocus(sessionKey: string): string | undefined {
        return this.focus.get(sessionKey)
    }

    clearFocus(sessionKey: string): void {
        this.focus.delete(sessionKey)
    }
}
