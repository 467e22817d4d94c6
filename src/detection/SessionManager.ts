import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { DetectionEngine } from './DetectionEngine.js';
import { SessionClosedError, SessionNotFoundError } from './errors.js';
import type {
    AlertOutcome,
    DeauthEvent,
    DetectionStats,
    EngineSettings,
    EngineState,
} from './types/index.js';
import type { SimulationOptions, TrafficSimulator } from '../simulation/TrafficSimulator.js';

/**
 * Public view of a monitoring session
 */
export interface SessionSummary extends EngineSettings {
    id: string;
    state: EngineState;
    /** Clock reading when the session was created (ms) */
    createdAt: number;
}

/**
 * Payload of the `deauth` event, emitted for every ingested frame
 */
export interface DeauthNotice {
    sessionId: string;
    interfaceId: string;
    event: DeauthEvent;
}

/**
 * Payload of the `alert` event
 */
export interface AlertNotice {
    sessionId: string;
    interfaceId: string;
    outcome: AlertOutcome;
}

export interface SessionStoppedNotice {
    session: SessionSummary;
    stats: DetectionStats;
}

interface ActiveSession {
    kind: 'active';
    id: string;
    createdAt: number;
    engine: DetectionEngine;
}

/** What is left of a session once its engine has been released */
interface StoppedSession {
    kind: 'stopped';
    summary: SessionSummary;
    stats: DetectionStats;
    suspiciousAddresses: string[];
}

type MonitoringSession = ActiveSession | StoppedSession;

export const DEFAULT_RETAINED_STOPPED_SESSIONS = 100;

/**
 * Owns the monitoring sessions and fans their activity out to consumers.
 * Stopped sessions keep their final figures until `retainStopped` newer ones
 * have been stopped after them.
 *
 * Events: `sessionStarted` (SessionSummary), `deauth` (DeauthNotice),
 * `alert` (AlertNotice), `sessionStopped` (SessionStoppedNotice).
 */
export class SessionManager extends EventEmitter {
    private readonly sessions: Map<string, MonitoringSession> = new Map();
    private readonly stoppedOrder: string[] = [];

    constructor(
        private readonly defaults: EngineSettings,
        private readonly clock: () => number = Date.now,
        private readonly retainStopped: number = DEFAULT_RETAINED_STOPPED_SESSIONS,
    ) {
        super();
        this.setMaxListeners(20);
    }

    now(): number {
        return this.clock();
    }

    /**
     * Create and start a session; unspecified settings fall back to the defaults
     */
    startSession(overrides: Partial<EngineSettings> = {}): SessionSummary {
        const engine = new DetectionEngine({
            interfaceId: overrides.interfaceId ?? this.defaults.interfaceId,
            threshold: overrides.threshold ?? this.defaults.threshold,
            timeWindow: overrides.timeWindow ?? this.defaults.timeWindow,
            clock: this.clock,
        });
        engine.start();

        const session: ActiveSession = {
            kind: 'active',
            id: randomUUID(),
            createdAt: this.clock(),
            engine,
        };
        this.sessions.set(session.id, session);

        const summary = this.summarize(session);
        console.log(
            `Monitoring started on ${engine.interfaceId} (threshold ${engine.threshold} in ${engine.timeWindow}ms)`,
        );
        this.emit('sessionStarted', summary);
        return summary;
    }

    getSession(id: string): SessionSummary {
        return this.describe(this.require(id));
    }

    listSessions(): SessionSummary[] {
        return Array.from(this.sessions.values()).map((session) => this.describe(session));
    }

    ingest(id: string, event: DeauthEvent): AlertOutcome | null {
        const session = this.requireActive(id);
        const outcome = session.engine.ingest(event);
        const interfaceId = session.engine.interfaceId;

        this.emit('deauth', { sessionId: id, interfaceId, event } satisfies DeauthNotice);
        if (outcome) {
            this.emit('alert', { sessionId: id, interfaceId, outcome } satisfies AlertNotice);
        }

        return outcome;
    }

    /**
     * Ingest events in order, returning the alerts they raised
     */
    ingestBatch(id: string, events: readonly DeauthEvent[]): AlertOutcome[] {
        const alerts: AlertOutcome[] = [];
        for (const event of events) {
            const outcome = this.ingest(id, event);
            if (outcome) {
                alerts.push(outcome);
            }
        }
        return alerts;
    }

    /**
     * Run synthetic traffic through a session, starting after its last event
     */
    simulate(
        id: string,
        simulator: TrafficSimulator,
        options: Omit<SimulationOptions, 'startTimestamp'>,
    ): { generated: number; alerts: AlertOutcome[] } {
        const session = this.requireActive(id);
        const last = session.engine.lastTimestamp;
        const startTimestamp = last === null ? this.clock() : Math.max(last, this.clock());

        const events = simulator.generate({ ...options, startTimestamp });
        return { generated: events.length, alerts: this.ingestBatch(id, events) };
    }

    statistics(id: string): DetectionStats {
        const session = this.require(id);
        return session.kind === 'active' ? session.engine.statistics() : { ...session.stats };
    }

    suspiciousAddresses(id: string): string[] {
        const session = this.require(id);
        return session.kind === 'active'
            ? session.engine.suspiciousAddressList()
            : [...session.suspiciousAddresses];
    }

    /**
     * Stop a session and release its engine. Stopping it again returns the same figures.
     */
    stopSession(id: string): DetectionStats {
        const session = this.require(id);
        if (session.kind === 'stopped') {
            return { ...session.stats };
        }

        const { engine } = session;
        engine.stop();
        const stats = engine.statistics();
        const summary = this.summarize(session);
        this.sessions.set(id, {
            kind: 'stopped',
            summary,
            stats,
            suspiciousAddresses: engine.suspiciousAddressList(),
        });
        this.stoppedOrder.push(id);
        this.pruneStopped();

        console.log(
            `Monitoring stopped on ${engine.interfaceId}: ${stats.totalEventCount} deauth packets, ${stats.alertCount} alerts`,
        );
        this.emit('sessionStopped', { session: summary, stats } satisfies SessionStoppedNotice);
        return { ...stats };
    }

    stopAll(): void {
        for (const [id, session] of Array.from(this.sessions)) {
            if (session.kind === 'active') {
                this.stopSession(id);
            }
        }
    }

    private pruneStopped(): void {
        while (this.stoppedOrder.length > this.retainStopped) {
            const oldest = this.stoppedOrder.shift();
            if (oldest !== undefined) {
                this.sessions.delete(oldest);
            }
        }
    }

    private require(id: string): MonitoringSession {
        const session = this.sessions.get(id);
        if (!session) {
            throw new SessionNotFoundError(id);
        }
        return session;
    }

    private requireActive(id: string): ActiveSession {
        const session = this.require(id);
        if (session.kind === 'stopped') {
            throw new SessionClosedError(session.summary.interfaceId);
        }
        return session;
    }

    private describe(session: MonitoringSession): SessionSummary {
        return session.kind === 'active' ? this.summarize(session) : { ...session.summary };
    }

    private summarize(session: ActiveSession): SessionSummary {
        const { engine } = session;
        return {
            id: session.id,
            interfaceId: engine.interfaceId,
            threshold: engine.threshold,
            timeWindow: engine.timeWindow,
            state: engine.getState(),
            createdAt: session.createdAt,
        };
    }
}
