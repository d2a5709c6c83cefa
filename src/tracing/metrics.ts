import type { TypedEventEmitter } from '../core/events.js'
import type { LogLevel } from '../worklog/types.js'

interface LevelCounts {
    decision: number
    tool: number
    correction: number
    error: number
    coordination: number
}

interface RoomActivity {
    invitations: number
    focusSwitches: number
    workLogs: number
}

/**
 * Counts room and work-log activity from the event bus for status output.
 */
export class ActivityMetrics {
    private rooms = new Map<string, RoomActivity>()
    private levels: LevelCounts = { decision: 0, tool: 0, correction: 0, error: 0, coordination: 0 }
    private roomsCreated = 0
    private logsOpened = 0
    private logsSealed = 0
    private cleanups: Array<() => void> = []

    constructor(eventBus: TypedEventEmitter) {
        const onCreated = ({ roomId }: { roomId: string }) => {
            this.roomsCreated++
            this.ensureRoom(roomId)
        }
        eventBus.on('room:created', onCreated)
        this.cleanups.push(() => eventBus.off('room:created', onCreated))

        const onInvited = ({ roomId }: { roomId: string }) => {
            this.ensureRoom(roomId).invitations++
        }
        eventBus.on('room:invited', onInvited)
        this.cleanups.push(() => eventBus.off('room:invited', onInvited))

        const onFocus = ({ roomId }: { roomId: string }) => {
            this.ensureRoom(roomId).focusSwitches++
        }
        eventBus.on('focus:switched', onFocus)
        this.cleanups.push(() => eventBus.off('focus:switched', onFocus))

        const onOpened = ({ roomId }: { roomId: string }) => {
            this.logsOpened++
            this.ensureRoom(roomId).workLogs++
        }
        eventBus.on('worklog:opened', onOpened)
        this.cleanups.push(() => eventBus.off('worklog:opened', onOpened))

        const onAppended = ({ level }: { level: LogLevel }) => {
            this.levels[level]++
        }
        eventBus.on('worklog:appended', onAppended)
        this.cleanups.push(() => eventBus.off('worklog:appended', onAppended))

        const onSealed = () => {
            this.logsSealed++
        }
        eventBus.on('worklog:sealed', onSealed)
        this.cleanups.push(() => eventBus.off('worklog:sealed', onSealed))
    }

    dispose(): void {
        for (const cleanup of this.cleanups) cleanup()
        this.cleanups = []
    }

    private ensureRoom(roomId: string): RoomActivity {
        let activity = this.rooms.get(roomId)
        if (!activity) {
            activity = { invitations: 0, focusSwitches: 0, workLogs: 0 }
            this.rooms.set(roomId, activity)
        }
        return activity
    }

    getWorkLogTotals(): { opened: number; sealed: number; entries: number } {
        const entries = Object.values(this.levels).reduce((sum, n) => sum + n, 0)
        return { opened: this.logsOpened, sealed: this.logsSealed, entries }
    }

    getLevelCounts(): LevelCounts {
        return { ...this.levels }
    }

    getRoomActivity(): Map<string, RoomActivity> {
        return new Map(this.rooms)
    }

    formatStatus(): string {
        const totals = this.getWorkLogTotals()
        const lines: string[] = []
        lines.push(`Rooms created: ${this.roomsCreated}`)
        lines.push(`Work logs: ${totals.opened} opened, ${totals.sealed} sealed, ${totals.entries} entries`)

        if (this.rooms.size > 0) {
            lines.push('Room activity:')
            for (const [roomId, a] of this.rooms) {
                lines.push(`  ${roomId}: ${a.workLogs} logs, ${a.invitations} invites, ${a.focusSwitches} focus switches`)
            }
        }

        return lines.join('\n')
    }
}
