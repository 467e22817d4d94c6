import type {
    AlertOutcome,
    DeauthEvent,
    DetectionStats,
    EngineSettings,
    EngineState,
} from './types/index.js';
import { BROADCAST_ADDRESS } from './types/DeauthEvent.js';
import { InvalidConfigurationError, SessionClosedError } from './errors.js';

export interface DetectionEngineOptions extends EngineSettings {
    /** Source of "now" for uptime, defaults to Date.now */
    clock?: () => number;
}

// Evicted slots are dropped from the backing array once this many pile up
const COMPACTION_THRESHOLD = 1024;

/**
 * Sliding-window detector for deauthentication floods.
 *
 * Events are pushed one at a time through `ingest`; every event whose arrival puts
 * the trailing window at or above the threshold yields an alert, so a sustained
 * flood keeps alerting. The engine performs no I/O and owns no timers.
 */
export class DetectionEngine {
    readonly interfaceId: string;
    readonly threshold: number;
    readonly timeWindow: number;

    private readonly clock: () => number;
    private readonly sessionStart: number;
    private stoppedAt: number | null = null;
    private state: EngineState = 'CREATED';

    private recentTimestamps: number[] = [];
    private windowStart = 0;
    private readonly suspiciousAddresses: Set<string> = new Set();
    private totalEventCount = 0;
    private alertCount = 0;
    private broadcastEventCount = 0;
    private newestTimestamp: number | null = null;

    constructor(options: DetectionEngineOptions) {
        if (!Number.isInteger(options.threshold) || options.threshold <= 0) {
            throw new InvalidConfigurationError(
                `Threshold must be a positive integer, got ${options.threshold}`,
                'threshold',
            );
        }
        if (!Number.isFinite(options.timeWindow) || options.timeWindow <= 0) {
            throw new InvalidConfigurationError(
                `Time window must be a positive duration, got ${options.timeWindow}`,
                'timeWindow',
            );
        }

        this.interfaceId = options.interfaceId;
        this.threshold = options.threshold;
        this.timeWindow = options.timeWindow;
        this.clock = options.clock ?? Date.now;
        this.sessionStart = this.clock();
    }

    getState(): EngineState {
        return this.state;
    }

    /**
     * Explicitly mark the session as running. Ingesting does this implicitly.
     */
    start(): void {
        if (this.state === 'STOPPED') {
            throw new SessionClosedError(this.interfaceId);
        }
        this.state = 'RUNNING';
    }

    /**
     * Terminate the session. Counters stay readable through `statistics`.
     */
    stop(): void {
        if (this.state === 'STOPPED') {
            return;
        }
        this.state = 'STOPPED';
        this.stoppedAt = this.clock();
    }

    /**
     * Feed one event and decide whether it raises an alert.
     * Eviction is driven by the event's own timestamp, not the clock.
     */
    ingest(event: DeauthEvent): AlertOutcome | null {
        if (this.state === 'STOPPED') {
            throw new SessionClosedError(this.interfaceId);
        }
        this.state = 'RUNNING';

        this.totalEventCount++;
        this.suspiciousAddresses.add(event.transmitterAddress);
        if (event.destinationAddress.toUpperCase() === BROADCAST_ADDRESS) {
            this.broadcastEventCount++;
        }
        this.insertTimestamp(event.timestamp);

        this.evictExpired(event.timestamp);

        const windowCount = this.windowCount;
        if (windowCount < this.threshold) {
            return null;
        }

        this.alertCount++;
        return {
            windowCount,
            timeWindow: this.timeWindow,
            triggeringEvent: event,
        };
    }

    /**
     * Snapshot of the session counters
     */
    statistics(): DetectionStats {
        const end = this.stoppedAt ?? this.clock();
        const uptime = Math.max(0, end - this.sessionStart);

        return {
            state: this.state,
            uptime,
            totalEventCount: this.totalEventCount,
            alertCount: this.alertCount,
            broadcastEventCount: this.broadcastEventCount,
            distinctSuspiciousAddresses: this.suspiciousAddresses.size,
            windowCount: this.windowCount,
            averageRate: uptime > 0 ? this.totalEventCount / (uptime / 1000) : 0,
        };
    }

    get windowCount(): number {
        return this.recentTimestamps.length - this.windowStart;
    }

    /**
     * Newest timestamp ingested so far, null before the first event
     */
    get lastTimestamp(): number | null {
        return this.newestTimestamp;
    }

    /**
     * Copy of the timestamps currently inside the window, oldest first
     */
    windowSnapshot(): number[] {
        return this.recentTimestamps.slice(this.windowStart);
    }

    suspiciousAddressList(): string[] {
        return Array.from(this.suspiciousAddresses);
    }

    /**
     * The window is kept sorted: in-order events are appended, late ones are
     * inserted after every timestamp not newer than theirs.
     */
    private insertTimestamp(timestamp: number): void {
        if (this.newestTimestamp === null || timestamp >= this.newestTimestamp) {
            this.recentTimestamps.push(timestamp);
            this.newestTimestamp = timestamp;
            return;
        }

        let low = this.windowStart;
        let high = this.recentTimestamps.length;
        while (low < high) {
            const mid = (low + high) >>> 1;
            if (this.recentTimestamps[mid] <= timestamp) {
                low = mid + 1;
            } else {
                high = mid;
            }
        }
        this.recentTimestamps.splice(low, 0, timestamp);
    }

    private evictExpired(now: number): void {
        while (
            this.windowStart < this.recentTimestamps.length &&
            now - this.recentTimestamps[this.windowStart] > this.timeWindow
        ) {
            this.windowStart++;
        }

        if (this.windowStart >= COMPACTION_THRESHOLD && this.windowStart * 2 >= this.recentTimestamps.length) {
            this.recentTimestamps = this.recentTimestamps.slice(this.windowStart);
            this.windowStart = 0;
        }
    }
}
