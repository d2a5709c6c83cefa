import pino from 'pino'
import { TypedEventEmitter } from '../../src/core/events.js'
import { MockFileSystem } from '../../src/core/fs.js'
import type { Logger } from '../../src/logger/index.js'
import { RoomManager } from '../../src/rooms/manager.js'
import { FileRoomStore } from '../../src/rooms/store.js'

export const DATA_DIR = '/data'

export function silentLogger(): Logger {
    return pino({ level: 'silent' })
}

export interface RoomFixture {
    fs: MockFileSystem
    store: FileRoomStore
    eventBus: TypedEventEmitter
    manager: RoomManager
}

export function createRoomFixture(fs = new MockFileSystem()): RoomFixture {
    const logger = silentLogger()
    const eventBus = new TypedEventEmitter()
    const store = new FileRoomStore(fs, DATA_DIR, logger)
    const manager = new RoomManager({
        store,
        logger,
        eventBus,
        coordinatorId: 'leader',
        defaultRoomId: 'general',
    })
    return { fs, store, eventBus, manager }
}

export async function readyRoomFixture(fs = new MockFileSystem()): Promise<RoomFixture> {
    const fixture = createRoomFixture(fs)
    await fixture.manager.initialize()
    return fixture
}
