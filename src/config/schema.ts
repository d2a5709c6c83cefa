import { z } from 'zod'

export const LogLevelSchema = z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])

export const ThinkingModeSchema = z.enum(['always_collapsed', 'always_expanded', 'remember_state', 'user_choice'])

export const ConfigSchema = z.object({
    dataDir: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    coordinatorId: z.string().min(1).optional(),
    defaultRoomId: z.string().min(1).optional(),
    summary: z
        .object({
            maxActions: z.number().int().positive().optional(),
            clauseLength: z.number().int().min(4).optional(),
        })
        .optional(),
    thinking: z
        .object({
            mode: ThinkingModeSchema.optional(),
            defaultExpanded: z.boolean().optional(),
            showStats: z.boolean().optional(),
        })
        .optional(),
    worklog: z
        .object({
            archive: z.boolean().optional(),
            /** Archived logs older than this many days are swept at startup; 0 keeps them forever. */
            retentionDays: z.number().int().nonnegative().optional(),
        })
        .optional(),
})

export type Config = z.infer<typeof ConfigSchema>

export interface ResolvedConfig {
    dataDir: string
    logLevel: z.infer<typeof LogLevelSchema>
    coordinatorId: string
    defaultRoomId: string
    summary: { maxActions: number; clauseLength: number }
    thinking: { mode: z.infer<typeof ThinkingModeSchema>; defaultExpanded: boolean; showStats: boolean }
    worklog: { archive: boolean; retentionDays: number }
    projectDir: string
    configDir: string
}
