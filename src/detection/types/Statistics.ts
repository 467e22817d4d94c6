/**
 * Lifecycle of a detection engine
 */
export type EngineState = 'CREATED' | 'RUNNING' | 'STOPPED';

/**
 * Point-in-time snapshot of a detection session
 */
export interface DetectionStats {
    state: EngineState;
    /** Time since the session started (ms), frozen once stopped */
    uptime: number;
    totalEventCount: number;
    alertCount: number;
    /** Events addressed to FF:FF:FF:FF:FF:FF */
    broadcastEventCount: number;
    distinctSuspiciousAddresses: number;
    /** Events currently inside the sliding window */
    windowCount: number;
    /** Events per second over the whole session */
    averageRate: number;
}
