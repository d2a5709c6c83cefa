import type { RoomManager } from './manager.js'
import type { Room } from './types.js'

export interface ResolvedRoom {
    room: Room
    /** True when the requested room did not resolve and the default room was used instead. */
    fellBack: boolean
}

/**
 * Fallback policy for callers: the manager reports what exists, these helpers
 * decide to land on the default room when a reference does not resolve.
 */
export function resolveRoomReference(manager: RoomManager, roomId?: string): ResolvedRoom {
    if (roomId) {
        const room = manager.getRoom(roomId)
        if (room) return { room, fellBack: false }
        return { room: manager.getDefaultRoom(), fellBack: true }
    }
    return { room: manager.getDefaultRoom(), fellBack: false }
}

export function resolveSessionRoom(manager: RoomManager, sessionKey: string): ResolvedRoom {
    return resolveRoomReference(manager, manager.getFocus(sessionKey))
}
