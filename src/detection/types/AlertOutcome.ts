import type { DeauthEvent } from './DeauthEvent.js';

/**
 * Result of an ingested event that put the window at or above the threshold
 */
export interface AlertOutcome {
    /** Number of events currently inside the window */
    windowCount: number;
    /** Configured window length (ms) */
    timeWindow: number;
    /** The event that caused the crossing */
    triggeringEvent: DeauthEvent;
}
