import type { WorkLog } from '../worklog/types.js'
import type { ThinkingDisplayStateTracker } from './state.js'
import type { ThinkingSummaryBuilder } from './summary.js'

export interface ThinkingView {
    expanded: boolean
    summary: string
    lines: string[]
}

export interface ThinkingViewOptions {
    botFilter?: string
    showStats?: boolean
    maxActions?: number
}

/**
 * Plain-text content for one message's thinking section. Reads only, so a
 * render loop can call it as often as it likes.
 */
export function buildThinkingView(
    log: WorkLog,
    tracker: ThinkingDisplayStateTracker,
    messageIndex: number,
    builder: ThinkingSummaryBuilder,
    options: ThinkingViewOptions = {}
): ThinkingView {
    const summary = builder.generateSummary(log, options.maxActions)
    const expanded = tracker.shouldBeExpanded(messageIndex)

    if (!expanded) {
        return { expanded, summary, lines: [`💭 Thinking: ${summary}`] }
    }

    const header = options.botFilter ? `💭 Thinking (@${options.botFilter})` : '💭 Thinking'
    const lines = [header, ...builder.generateDetails(log, options.botFilter).map((line) => `   ${line}`)]
    if (options.showStats ?? true) {
        lines.push(`   ${builder.formatFooter(builder.getStats(log))}`)
    }
    return { expanded, summary, lines }
}
