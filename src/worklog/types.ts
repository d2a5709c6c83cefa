import { z } from 'zod'
import { RoomTypeSchema, type RoomSnapshot } from '../rooms/types.js'

export const LogLevelSchema = z.enum(['decision', 'tool', 'correction', 'error', 'coordination'])

export type LogLevel = z.infer<typeof LogLevelSchema>

export const LOG_LEVELS: readonly LogLevel[] = LogLevelSchema.options

export const LogEntryInputSchema = z
    .object({
        level: LogLevelSchema,
        message: z.string().trim().min(1),
        botName: z.string().trim().min(1).optional(),
        toolName: z.string().trim().min(1).optional(),
        result: z.string().optional(),
        durationMs: z.number().int().nonnegative().optional(),
        confidence: z.number().min(0).max(1).optional(),
    })
    .strict()
    .superRefine((entry, ctx) => {
        if (entry.level === 'tool') {
            if (entry.toolName === undefined) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['toolName'], message: 'tool entries need a toolName' })
            }
        } else {
            for (const field of ['toolName', 'result', 'durationMs'] as const) {
                if (entry[field] !== undefined) {
                    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: 'only tool entries carry tool fields' })
                }
            }
        }
        if (entry.level !== 'decision' && entry.confidence !== undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['confidence'], message: 'only decision entries carry a confidence' })
        }
    })

export type LogEntryInput = z.input<typeof LogEntryInputSchema>

export interface LogEntry {
    readonly sequence: number
    readonly level: LogLevel
    readonly message: string
    /** Absent means the coordinating agent. */
    readonly botName?: string
    readonly toolName?: string
    readonly result?: string
    readonly durationMs?: number
    readonly confidence?: number
    /** Wall clock, informational only; `sequence` is the ordering key. */
    readonly recordedAt: string
}

export interface WorkLogHandle {
    readonly id: string
    readonly sessionKey: string
}

export interface WorkLog {
    readonly id: string
    readonly sessionKey: string
    readonly query?: string
    readonly roomContext: RoomSnapshot
    readonly entries: readonly LogEntry[]
    readonly startedAt: string
    readonly sealedAt?: string
}

export const LogEntrySchema = z.object({
    sequence: z.number().int().positive(),
    level: LogLevelSchema,
    message: z.string(),
    botName: z.string().optional(),
    toolName: z.string().optional(),
    result: z.string().optional(),
    durationMs: z.number().optional(),
    confidence: z.number().optional(),
    recordedAt: z.string(),
})

export const WorkLogSchema = z.object({
    id: z.string(),
    sessionKey: z.string(),
    query: z.string().optional(),
    roomContext: z.object({
        roomId: z.string(),
        roomType: RoomTypeSchema,
        participants: z.array(z.string()),
    }),
    entries: z.array(LogEntrySchema),
    startedAt: z.string(),
    sealedAt: z.string().optional(),
})
