import path from 'node:path'
import type { ResolvedConfig } from './schema.js'

export const CONFIG_DIR = `${process.env.HOME ?? '~'}/.config/roomlog`
export const GLOBAL_CONFIG_FILE = `${CONFIG_DIR}/config.json`
export const LOCAL_CONFIG_DIR = '.roomlog'
export const LOCAL_CONFIG_FILE = `${LOCAL_CONFIG_DIR}/config.json`

export const DEFAULT_CONFIG: Omit<ResolvedConfig, 'projectDir' | 'configDir'> = {
    dataDir: path.join(CONFIG_DIR, 'data'),
    logLevel: 'info',
    coordinatorId: 'leader',
    defaultRoomId: 'general',
    summary: { maxActions: 2, clauseLength: 40 },
    thinking: { mode: 'remember_state', defaultExpanded: false, showStats: true },
    worklog: { archive: true, retentionDays: 0 },
}
