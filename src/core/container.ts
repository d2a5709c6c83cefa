import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { createLogger } from '../logger/index.js'
import { RoomManager } from '../rooms/manager.js'
import { FileRoomStore, type RoomStore } from '../rooms/store.js'
import { ThinkingSessions } from '../thinking/state.js'
import { ThinkingSummaryBuilder } from '../thinking/summary.js'
import { buildThinkingView, type ThinkingView } from '../thinking/view.js'
import { ActivityMetrics } from '../tracing/metrics.js'
import { WorkLogArchive } from '../worklog/archive.js'
import { WorkLogManager } from '../worklog/manager.js'
import type { WorkLog } from '../worklog/types.js'
import { TypedEventEmitter } from './events.js'
import { type FileSystem, NodeFileSystem } from './fs.js'

export interface Container {
    config: ResolvedConfig
    logger: Logger
    eventBus: TypedEventEmitter
    fs: FileSystem
    roomStore: RoomStore
    roomManager: RoomManager
    workLogArchive?: WorkLogArchive
    workLogManager: WorkLogManager
    summaryBuilder: ThinkingSummaryBuilder
    thinkingSessions: ThinkingSessions
    metrics: ActivityMetrics
    /** Thinking section for one message of a session, with the configured summary and stats settings. */
    renderThinking(sessionKey: string, log: WorkLog, messageIndex: number, botFilter?: string): ThinkingView
    /** Releases a finished session's logs, thinking state and focus. Archived logs stay. */
    endSession(sessionKey: string): void
    initialize(): Promise<void>
    shutdown(): Promise<void>
}

export interface ContainerOverrides {
    fs?: FileSystem
    logger?: Logger
}

export function createContainer(config: ResolvedConfig, overrides: ContainerOverrides = {}): Container {
    const logger = overrides.logger ?? createLogger(config)
    const eventBus = new TypedEventEmitter()
    const fs = overrides.fs ?? new NodeFileSystem()
    const roomStore = new FileRoomStore(fs, config.dataDir, logger)
    const roomManager = new RoomManager({
        store: roomStore,
        logger,
        eventBus,
        coordinatorId: config.coordinatorId,
        defaultRoomId: config.defaultRoomId,
    })
    const workLogArchive = config.worklog.archive ? new WorkLogArchive(fs, config.dataDir, logger) : undefined
    const workLogManager = new WorkLogManager({
        logger,
        eventBus,
        ...(workLogArchive ? { archive: workLogArchive } : {}),
    })
    const summaryBuilder = new ThinkingSummaryBuilder({
        coordinatorId: config.coordinatorId,
        clauseLength: config.summary.clauseLength,
    })
    const thinkingSessions = new ThinkingSessions({
        mode: config.thinking.mode,
        defaultExpanded: config.thinking.defaultExpanded,
    })
    const metrics = new ActivityMetrics(eventBus)

    const container: Container = {
        config,
        logger,
        eventBus,
        fs,
        roomStore,
        roomManager,
        ...(workLogArchive ? { workLogArchive } : {}),
        workLogManager,
        summaryBuilder,
        thinkingSessions,
        metrics,

        renderThinking(sessionKey, log, messageIndex, botFilter) {
            return buildThinkingView(log, thinkingSessions.get(sessionKey), messageIndex, summaryBuilder, {
                maxActions: config.summary.maxActions,
                showStats: config.thinking.showStats,
                ...(botFilter !== undefined ? { botFilter } : {}),
            })
        },

        endSession(sessionKey) {
            workLogManager.discardSession(sessionKey)
            thinkingSessions.end(sessionKey)
            roomManager.clearFocus(sessionKey)
        },

        async initialize() {
            await roomManager.initialize()
            if (workLogArchive && config.worklog.retentionDays > 0) {
                await workLogArchive.cleanup(config.worklog.retentionDays)
            }
        },

        async shutdown() {
            const errors: Error[] = []
            try {
                metrics.dispose()
                thinkingSessions.clear()
                workLogManager.clear()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            try {
                eventBus.removeAll()
            } catch (e) {
                errors.push(e instanceof Error ? e : new Error(String(e)))
            }
            if (errors.length > 0) {
                logger.warn({ errors: errors.map((e) => e.message) }, 'Errors during shutdown')
            }
        },
    }

    return container
}
