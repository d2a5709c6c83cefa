export { loadConfig } from './config/loader.js'
export { DEFAULT_CONFIG } from './config/defaults.js'
export type { Config, ResolvedConfig } from './config/schema.js'
export { type Container, type ContainerOverrides, createContainer } from './core/container.js'
export * from './core/errors.js'
export { type EventMap, TypedEventEmitter } from './core/events.js'
export { type FileSystem, MockFileSystem, NodeFileSystem, writeAtomic } from './core/fs.js'
export { KeyedMutex } from './core/lock.js'
export { err, ok, type Result } from './core/result.js'
export { createLogger, type Logger } from './logger/index.js'
export { applyRoomIntent, parseRoomIntent, type RoomIntent } from './rooms/intent.js'
export { RoomManager, type RoomManagerOptions } from './rooms/manager.js'
export { type ResolvedRoom, resolveRoomReference, resolveSessionRoom } from './rooms/session.js'
export { normalizeRoomId, slugify } from './rooms/slug.js'
export { FileRoomStore, type RoomStore } from './rooms/store.js'
export { DIRECT_ROOM_CAPACITY, ROOM_TYPES, type Room, type RoomSnapshot, type RoomSummary, type RoomType } from './rooms/types.js'
export {
    type ThinkingDisplayMode,
    type ThinkingDisplayState,
    ThinkingDisplayStateTracker,
    ThinkingSessions,
    type ThinkingTrackerStats,
} from './thinking/state.js'
export { EMPTY_SUMMARY, ThinkingSummaryBuilder, type ThinkingStats } from './thinking/summary.js'
export { buildThinkingView, type ThinkingView } from './thinking/view.js'
export { ActivityMetrics } from './tracing/metrics.js'
export { type RecentLogsQuery, WorkLogArchive } from './worklog/archive.js'
export { WorkLogManager, type WorkLogManagerOptions } from './worklog/manager.js'
export { WorkLogRecorder } from './worklog/recorder.js'
export { LOG_LEVELS, type LogEntry, type LogEntryInput, type LogLevel, type WorkLog, type WorkLogHandle } from './worklog/types.js'
