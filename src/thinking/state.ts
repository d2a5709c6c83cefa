export type ThinkingDisplayMode = 'always_collapsed' | 'always_expanded' | 'remember_state' | 'user_choice'

export interface ThinkingDisplayState {
    messageIndex: number
    expanded: boolean
    /** Diagnostic only. */
    visitCount: number
}

export interface ThinkingTrackerOptions {
    mode?: ThinkingDisplayMode
    defaultExpanded?: boolean
}

export interface ThinkingTrackerStats {
    totalTracked: number
    expanded: number
    collapsed: number
    totalVisits: number
    mode: ThinkingDisplayMode
    globalChoice: boolean | null
}

/**
 * Remembers, per message index, whether the thinking section was expanded.
 * Lives for one interactive session and is never persisted.
 */
export class ThinkingDisplayStateTracker {
    private states = new Map<number, ThinkingDisplayState>()
    private mode: ThinkingDisplayMode
    private defaultExpanded: boolean
    private globalChoice: boolean | null = null

    constructor(options: ThinkingTrackerOptions = {}) {
        this.mode = options.mode ?? 'remember_state'
        this.defaultExpanded = options.defaultExpanded ?? false
    }

    getMode(): ThinkingDisplayMode {
        return this.mode
    }

    shouldBeExpanded(messageIndex: number): boolean {
        switch (this.mode) {
            case 'always_collapsed':
                return false
            case 'always_expanded':
                return true
            case 'remember_state':
                return this.states.get(messageIndex)?.expanded ?? this.defaultExpanded
            case 'user_choice':
                return this.globalChoice ?? this.defaultExpanded
        }
    }

    recordState(messageIndex: number, expanded: boolean): void {
        const state = this.states.get(messageIndex) ?? { messageIndex, expanded, visitCount: 0 }
        state.expanded = expanded
        state.visitCount++
        this.states.set(messageIndex, state)

        // first toggle after entering user_choice sticks for every message
        if (this.mode === 'user_choice' && this.globalChoice === null) {
            this.globalChoice = expanded
        }
    }

    getState(messageIndex: number): ThinkingDisplayState | undefined {
        const state = this.states.get(messageIndex)
        return state ? { ...state } : undefined
    }

    getStats(): ThinkingTrackerStats {
        let expanded = 0
        let totalVisits = 0
        for (const state of this.states.values()) {
            if (state.expanded) expanded++
            totalVisits += state.visitCount
        }
        return {
            totalTracked: this.states.size,
            expanded,
            collapsed: this.states.size - expanded,
            totalVisits,
            mode: this.mode,
            globalChoice: this.globalChoice,
        }
    }

    /** Per-message memory survives mode changes; a user_choice global does not. */
    setMode(mode: ThinkingDisplayMode): void {
        if (mode === this.mode) return
        this.mode = mode
        this.globalChoice = null
    }

    reset(messageIndex?: number): void {
        if (messageIndex === undefined) {
            this.states.clear()
            this.globalChoice = null
            return
        }
        this.states.delete(messageIndex)
    }
}

/**
 * One tracker per session key, created lazily with shared defaults.
 */
export class ThinkingSessions {
    private trackers = new Map<string, ThinkingDisplayStateTracker>()

    constructor(private defaults: ThinkingTrackerOptions = {}) {}

    get(sessionKey: string): ThinkingDisplayStateTracker {
        let tracker = this.trackers.get(sessionKey)
        if (!tracker) {
            tracker = new ThinkingDisplayStateTracker(this.defaults)
            this.trackers.set(sessionKey, tracker)
        }
        return tracker
    }

    has(sessionKey: string): boolean {
        return this.trackers.has(sessionKey)
    }

    end(sessionKey: string): void {
        this.trackers.delete(sessionKey)
    }

    clear(): void {
        this.trackers.clear()
    }

    get size(): number {
        return this.trackers.size
    }
}
