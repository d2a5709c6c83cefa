import path from 'node:path'
import type { FileSystem } from '../core/fs.js'
import { DEFAULT_CONFIG, CONFIG_DIR, GLOBAL_CONFIG_FILE, LOCAL_CONFIG_FILE } from './defaults.js'
import { type Config, ConfigSchema, LogLevelSchema, type ResolvedConfig } from './schema.js'

interface LoadConfigOptions {
    fs: FileSystem
    overrides?: Partial<Config>
    projectDir?: string
    env?: NodeJS.ProcessEnv
}

async function loadJsonConfig(fs: FileSystem, filePath: string): Promise<Config> {
    try {
        if (await fs.exists(filePath)) {
            const raw = await fs.readJSON(filePath)
            return ConfigSchema.parse(raw)
        }
    } catch {
        // Invalid config file, skip
    }
    return {}
}

function envConfig(env: NodeJS.ProcessEnv): Config {
    const config: Config = {}
    if (env.ROOMLOG_DATA_DIR) config.dataDir = env.ROOMLOG_DATA_DIR
    if (env.ROOMLOG_COORDINATOR) config.coordinatorId = env.ROOMLOG_COORDINATOR
    const level = LogLevelSchema.safeParse(env.ROOMLOG_LOG_LEVEL)
    if (level.success) config.logLevel = level.data
    return config
}

function mergeConfigs(...configs: Config[]): Config {
    const merged: Config = {}
    for (const cfg of configs) {
        if (cfg.dataDir !== undefined) merged.dataDir = cfg.dataDir
        if (cfg.logLevel !== undefined) merged.logLevel = cfg.logLevel
        if (cfg.coordinatorId !== undefined) merged.coordinatorId = cfg.coordinatorId
        if (cfg.defaultRoomId !== undefined) merged.defaultRoomId = cfg.defaultRoomId
        if (cfg.summary) merged.summary = { ...merged.summary, ...cfg.summary }
        if (cfg.thinking) merged.thinking = { ...merged.thinking, ...cfg.thinking }
        if (cfg.worklog) merged.worklog = { ...merged.worklog, ...cfg.worklog }
    }
    return merged
}

export async function loadConfig(options: LoadConfigOptions): Promise<ResolvedConfig> {
    const { fs, overrides = {}, projectDir = process.cwd(), env = process.env } = options

    const globalConfig = await loadJsonConfig(fs, GLOBAL_CONFIG_FILE)
    const localConfig = await loadJsonConfig(fs, path.join(projectDir, LOCAL_CONFIG_FILE))

    // Priority: overrides > env vars > local config > global config > defaults
    const merged = mergeConfigs(globalConfig, localConfig, envConfig(env), overrides)

    return {
        dataDir: merged.dataDir ? path.resolve(projectDir, merged.dataDir) : DEFAULT_CONFIG.dataDir,
        logLevel: merged.logLevel ?? DEFAULT_CONFIG.logLevel,
        coordinatorId: merged.coordinatorId ?? DEFAULT_CONFIG.coordinatorId,
        defaultRoomId: merged.defaultRoomId ?? DEFAULT_CONFIG.defaultRoomId,
        summary: {
            maxActions: merged.summary?.maxActions ?? DEFAULT_CONFIG.summary.maxActions,
            clauseLength: merged.summary?.clauseLength ?? DEFAULT_CONFIG.summary.clauseLength,
        },
        thinking: {
            mode: merged.thinking?.mode ?? DEFAULT_CONFIG.thinking.mode,
            defaultExpanded: merged.thinking?.defaultExpanded ?? DEFAULT_CONFIG.thinking.defaultExpanded,
            showStats: merged.thinking?.showStats ?? DEFAULT_CONFIG.thinking.showStats,
        },
        worklog: {
            archive: merged.worklog?.archive ?? DEFAULT_CONFIG.worklog.archive,
            retentionDays: merged.worklog?.retentionDays ?? DEFAULT_CONFIG.worklog.retentionDays,
        },
        projectDir,
        configDir: CONFIG_DIR,
    }
}
