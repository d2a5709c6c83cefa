import { errorMessage } from '../core/errors.js'
import type { WorkLogManager } from './manager.js'
import type { LogEntry, WorkLog, WorkLogHandle } from './types.js'

interface Attribution {
    botName?: string
}

interface DecisionOptions extends Attribution {
    confidence?: number
}

interface ToolOptions extends Attribution {
    message?: string
}

function attribution(botName: string | undefined): Attribution {
    return botName !== undefined ? { botName } : {}
}

/**
 * Convenience front for the agent layer: one recorder per processed request.
 */
export class WorkLogRecorder {
    constructor(
        private manager: WorkLogManager,
        readonly handle: WorkLogHandle,
        private now: () => number = Date.now
    ) {}

    decision(message: string, options: DecisionOptions = {}): Promise<LogEntry> {
        return this.manager.append(this.handle, {
            level: 'decision',
            message,
            ...attribution(options.botName),
            ...(options.confidence !== undefined ? { confidence: options.confidence } : {}),
        })
    }

    correction(message: string, botName?: string): Promise<LogEntry> {
        return this.manager.append(this.handle, { level: 'correction', message, ...attribution(botName) })
    }

    error(message: string, botName?: string): Promise<LogEntry> {
        return this.manager.append(this.handle, { level: 'error', message, ...attribution(botName) })
    }

    coordination(message: string, botName?: string): Promise<LogEntry> {
        return this.manager.append(this.handle, { level: 'coordination', message, ...attribution(botName) })
    }

    /**
     * Runs a tool call and records it with its duration. A failing call is
     * recorded (tool entry plus error entry) and rethrown.
     */
    async tool<T>(toolName: string, run: () => Promise<T>, options: ToolOptions = {}): Promise<T> {
        const startedAt = this.now()
        const message = options.message ?? `Executed ${toolName}`
        try {
            const value = await run()
            await this.manager.append(this.handle, {
                level: 'tool',
                message,
                toolName,
                result: 'success',
                durationMs: Math.max(0, this.now() - startedAt),
                ...attribution(options.botName),
            })
            return value
        } catch (error) {
            await this.manager.append(this.handle, {
                level: 'tool',
                message,
                toolName,
                result: 'error',
                durationMs: Math.max(0, this.now() - startedAt),
                ...attribution(options.botName),
            })
            await this.error(`${toolName} failed: ${errorMessage(error)}`, options.botName)
            throw error
        }
    }

    seal(): Promise<WorkLog> {
        return this.manager.seal(this.handle)
    }
}
