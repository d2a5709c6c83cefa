import type { RoomType } from '../rooms/types.js'
import type { LogLevel } from '../worklog/types.js'

export type EventMap = {
    'room:created': { roomId: string; roomType: RoomType; participants: readonly string[] }
    'room:invited': { roomId: string; participantId: string }
    'focus:switched': { sessionKey: string; roomId: string }
    'worklog:opened': { logId: string; sessionKey: string; roomId: string }
    'worklog:appended': { logId: string; sequence: number; level: LogLevel }
    'worklog:sealed': { logId: string; sessionKey: string; entryCount: number }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers = new Map<string, Set<EventHandler<unknown>>>()

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        let set = this.handlers.get(event)
        if (!set) {
            set = new Set()
            this.handlers.set(event, set)
        }
        set.add(handler as EventHandler<unknown>)
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers.get(event)?.delete(handler as EventHandler<unknown>)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers.get(event)
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers.clear()
    }
}
