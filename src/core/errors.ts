export type ErrorKind = 'transient' | 'permanent'

export type ErrorCode =
    | 'duplicate_room'
    | 'room_not_found'
    | 'invalid_type'
    | 'invalid_room_id'
    | 'invalid_participant'
    | 'capacity'
    | 'sealed_log'
    | 'worklog_not_found'
    | 'invalid_entry'
    | 'persistence'
    | 'not_initialized'

export class RoomLogError extends Error {
    readonly kind: ErrorKind
    readonly code: ErrorCode

    constructor(message: string, kind: ErrorKind, code: ErrorCode, options?: ErrorOptions) {
        super(message, options)
        this.name = 'RoomLogError'
        this.kind = kind
        this.code = code
    }
}

export class TransientError extends RoomLogError {
    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, 'transient', code, options)
        this.name = 'TransientError'
    }
}

export class PermanentError extends RoomLogError {
    constructor(message: string, code: ErrorCode, options?: ErrorOptions) {
        super(message, 'permanent', code, options)
        this.name = 'PermanentError'
    }
}

export class DuplicateRoomError extends PermanentError {
    constructor(readonly roomId: string) {
        super(`Room '${roomId}' already exists`, 'duplicate_room')
        this.name = 'DuplicateRoomError'
    }
}

export class RoomNotFoundError extends PermanentError {
    constructor(readonly roomId: string) {
        super(`Room '${roomId}' not found`, 'room_not_found')
        this.name = 'RoomNotFoundError'
    }
}

export class InvalidTypeError extends PermanentError {
    constructor(readonly roomType: unknown) {
        super(`Invalid room type: ${String(roomType)}`, 'invalid_type')
        this.name = 'InvalidTypeError'
    }
}

export class InvalidRoomIdError extends PermanentError {
    constructor(readonly rawId: string) {
        super(`Invalid room id: '${rawId}'`, 'invalid_room_id')
        this.name = 'InvalidRoomIdError'
    }
}

export class InvalidParticipantError extends PermanentError {
    constructor(readonly participantId: string) {
        super(`Invalid participant id: '${participantId}'`, 'invalid_participant')
        this.name = 'InvalidParticipantError'
    }
}

export class CapacityError extends PermanentError {
    constructor(
        readonly roomId: string,
        readonly capacity: number
    ) {
        super(`Room '${roomId}' is full (max ${capacity} participants)`, 'capacity')
        this.name = 'CapacityError'
    }
}

export class SealedLogError extends PermanentError {
    constructor(readonly logId: string) {
        super(`Work log ${logId} is sealed`, 'sealed_log')
        this.name = 'SealedLogError'
    }
}

export class WorkLogNotFoundError extends PermanentError {
    constructor(readonly logId: string) {
        super(`Work log ${logId} not found`, 'worklog_not_found')
        this.name = 'WorkLogNotFoundError'
    }
}

export class InvalidEntryError extends PermanentError {
    constructor(
        message: string,
        readonly issues: string[] = []
    ) {
        super(message, 'invalid_entry')
        this.name = 'InvalidEntryError'
    }
}

export class PersistenceError extends TransientError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'persistence', options)
        this.name = 'PersistenceError'
    }
}

export class NotInitializedError extends PermanentError {
    constructor(readonly component: string) {
        super(`${component} used before initialize()`, 'not_initialized')
        this.name = 'NotInitializedError'
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message
    return String(error)
}

export function classifyError(error: unknown): ErrorKind {
    if (error instanceof RoomLogError) return error.kind
    if (typeof error === 'object' && error !== null && 'code' in error) {
        // raw Node fs errors
        const code = error.code
        if (code === 'EBUSY' || code === 'EAGAIN' || code === 'EMFILE') return 'transient'
    }
    return 'permanent'
}

/**
 * Message a command layer can print as-is.
 */
export function describeError(error: unknown): string {
    if (error instanceof DuplicateRoomError) return `A room named '${error.roomId}' already exists.`
    if (error instanceof RoomNotFoundError) return `Room '${error.roomId}' not found.`
    if (error instanceof InvalidTypeError) {
        return `Unknown room type '${String(error.roomType)}'. Use open, project, direct or coordination.`
    }
    if (error instanceof InvalidRoomIdError) return `'${error.rawId}' is not a usable room name.`
    if (error instanceof InvalidParticipantError) return `'${error.participantId}' is not a valid participant.`
    if (error instanceof CapacityError) {
        return `Room '${error.roomId}' already has ${error.capacity} participants; direct rooms cannot grow.`
    }
    if (error instanceof SealedLogError) return 'That work log is already closed.'
    if (error instanceof WorkLogNotFoundError) return 'That work log no longer exists.'
    if (error instanceof InvalidEntryError) {
        return `Work log entry rejected: ${error.issues.length > 0 ? error.issues.join('; ') : error.message}`
    }
    if (error instanceof NotInitializedError) return `${error.component} is not ready yet.`
    if (error instanceof PersistenceError) return `Could not access room storage: ${error.message}`
    return `Unexpected error: ${errorMessage(error)}`
}
