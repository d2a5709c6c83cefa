import type { LogEntry, LogLevel, WorkLog } from '../worklog/types.js'

export const EMPTY_SUMMARY = 'no recorded actions'

export const LEVEL_ICONS: Record<LogLevel, string> = {
    decision: '🎯',
    tool: '🔧',
    correction: '🔄',
    error: '❌',
    coordination: '📋',
}

const LEVEL_LABELS: Record<LogLevel, string> = {
    decision: 'Decision',
    tool: 'Tool',
    correction: 'Correction',
    error: 'Error',
    coordination: 'Coordination',
}

const PRIMARY_LEVELS: ReadonlySet<LogLevel> = new Set(['decision', 'tool', 'coordination'])
const FALLBACK_LEVELS: ReadonlySet<LogLevel> = new Set(['error', 'correction'])

export interface ThinkingStats {
    totalSteps: number
    decisions: number
    tools: number
    corrections: number
    errors: number
    coordination: number
    totalDurationMs: number
}

export interface SummaryBuilderOptions {
    coordinatorId?: string
    clauseLength?: number
}

export class ThinkingSummaryBuilder {
    readonly coordinatorId: string
    readonly clauseLength: number

    constructor(options: SummaryBuilderOptions = {}) {
        this.coordinatorId = options.coordinatorId ?? 'leader'
        const clauseLength = options.clauseLength ?? 40
        this.clauseLength = Number.isFinite(clauseLength) ? Math.max(4, Math.floor(clauseLength)) : 40
    }

    /**
     * One line built from the first `maxActions` decision, tool and
     * coordination entries; errors and corrections only show up when the log
     * has none of those.
     */
    generateSummary(log: WorkLog, maxActions = 2): string {
        if (log.entries.length === 0) return EMPTY_SUMMARY

        const ordered = [...log.entries].sort((a, b) => a.sequence - b.sequence)
        let picked = ordered.filter((e) => PRIMARY_LEVELS.has(e.level))
        if (picked.length === 0) picked = ordered.filter((e) => FALLBACK_LEVELS.has(e.level))
        if (picked.length === 0) return EMPTY_SUMMARY

        const limit = Number.isFinite(maxActions) ? Math.max(1, Math.floor(maxActions)) : 2
        return picked
            .slice(0, limit)
            .map((entry) => this.clause(entry))
            .join(', ')
    }

    generateDetails(log: WorkLog, botFilter?: string): string[] {
        const ordered = [...log.entries].sort((a, b) => a.sequence - b.sequence)
        const entries = botFilter === undefined
            ? ordered
            : ordered.filter((e) => (e.botName ?? this.coordinatorId) === botFilter)

        return entries.map((entry, i) => this.detailLine(entry, i + 1))
    }

    getStats(log: WorkLog): ThinkingStats {
        const stats: ThinkingStats = {
            totalSteps: log.entries.length,
            decisions: 0,
            tools: 0,
            corrections: 0,
            errors: 0,
            coordination: 0,
            totalDurationMs: 0,
        }
        for (const entry of log.entries) {
            switch (entry.level) {
                case 'decision':
                    stats.decisions++
                    break
                case 'tool':
                    stats.tools++
                    break
                case 'correction':
                    stats.corrections++
                    break
                case 'error':
                    stats.errors++
                    break
                case 'coordination':
                    stats.coordination++
                    break
            }
            stats.totalDurationMs += entry.durationMs ?? 0
        }
        return stats
    }

    formatFooter(stats: ThinkingStats): string {
        return `[${stats.totalSteps} steps • ${stats.decisions} decisions • ${stats.tools} tools]`
    }

    truncate(text: string): string {
        if (text.length <= this.clauseLength) return text
        return `${text.slice(0, this.clauseLength - 3)}...`
    }

    private clause(entry: LogEntry): string {
        if (entry.level === 'tool' && entry.toolName) return entry.toolName
        return this.truncate(entry.message)
    }

    private detailLine(entry: LogEntry, position: number): string {
        const bot = entry.botName ? ` @${entry.botName}` : ''
        let text: string
        if (entry.level === 'tool' && entry.toolName) {
            text = entry.result ? `${entry.toolName} → ${entry.result}` : entry.toolName
        } else {
            text = entry.message
        }

        let line = `${position}. ${LEVEL_ICONS[entry.level]} ${LEVEL_LABELS[entry.level]}${bot}: ${text}`
        if (entry.confidence !== undefined) line += ` (${Math.round(entry.confidence * 100)}%)`
        if (entry.durationMs !== undefined) line += ` [${entry.durationMs}ms]`
        return line
    }
}
