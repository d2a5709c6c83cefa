import { z } from 'zod'

export const RoomTypeSchema = z.enum(['open', 'project', 'direct', 'coordination'])

export type RoomType = z.infer<typeof RoomTypeSchema>

export const ROOM_TYPES: readonly RoomType[] = RoomTypeSchema.options

/** Direct rooms hold their creator and exactly one invited participant. */
export const DIRECT_ROOM_CAPACITY = 2

export const RoomSchema = z.object({
    id: z.string().min(1),
    type: RoomTypeSchema,
    participants: z.array(z.string().min(1)).min(1),
    createdAt: z.string().datetime(),
    isDefault: z.boolean(),
    /** Creation ordinal; records written before it existed read as 0. */
    seq: z.number().int().nonnegative().default(0),
})

export interface Room {
    readonly id: string
    readonly type: RoomType
    readonly participants: readonly string[]
    readonly createdAt: string
    readonly isDefault: boolean
    /** Increases with every room created; `createdAt` alone ties within a millisecond. */
    readonly seq: number
}

export interface RoomSummary {
    id: string
    type: RoomType
    participantCount: number
    isDefault: boolean
}

/** Frozen copy of a room's membership, taken when a work log is opened. */
export interface RoomSnapshot {
    readonly roomId: string
    readonly roomType: RoomType
    readonly participants: readonly string[]
}

export function freezeRoom(room: Room): Room {
    return Object.freeze({ ...room, participants: Object.freeze([...room.participants]) })
}

export function snapshotRoom(room: Room): RoomSnapshot {
    return Object.freeze({
        roomId: room.id,
        roomType: room.type,
        participants: Object.freeze([...room.participants]),
    })
}
