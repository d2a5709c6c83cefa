import { z } from 'zod'
import { RoomNotFoundError } from '../core/errors.js'
import { err, ok, type Result } from '../core/result.js'
import type { RoomManager } from './manager.js'
import { type Room, RoomTypeSchema } from './types.js'

const RecommendedParticipantSchema = z.object({
    name: z.string().trim().min(1),
    reason: z.string().default(''),
})

export const RoomIntentSchema = z.discriminatedUnion('shouldCreateRoom', [
    z.object({
        shouldCreateRoom: z.literal(true),
        roomName: z.string().trim().min(1),
        roomType: RoomTypeSchema.optional(),
        recommendedParticipants: z.array(RecommendedParticipantSchema).default([]),
    }),
    z.object({
        shouldCreateRoom: z.literal(false),
        recommendedParticipants: z.array(RecommendedParticipantSchema).default([]),
    }),
])

export type RoomIntent = z.infer<typeof RoomIntentSchema>

export function parseRoomIntent(raw: unknown): Result<RoomIntent> {
    const parsed = RoomIntentSchema.safeParse(raw)
    if (!parsed.success) {
        return err(parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '))
    }
    return ok(parsed.data)
}

/**
 * Applies a validated intent: creates the suggested room, or brings the
 * recommended participants into the current one.
 */
export async function applyRoomIntent(manager: RoomManager, intent: RoomIntent, currentRoomId: string): Promise<Room> {
    const names = intent.recommendedParticipants.map((p) => p.name)

    if (intent.shouldCreateRoom) {
        return manager.createRoom(intent.roomName, intent.roomType ?? 'project', names)
    }

    let room = manager.getRoom(currentRoomId)
    if (!room) throw new RoomNotFoundError(currentRoomId)
    for (const name of names) {
        room = await manager.inviteParticipant(room.id, name)
    }
    return room
}
