import fs from 'fs';
import path from 'path';
import type { DeauthEvent } from '../../detection/types/DeauthEvent.js';
import type { AlertOutcome } from '../../detection/types/AlertOutcome.js';
import type {
    AlertNotice,
    DeauthNotice,
    SessionManager,
    SessionStoppedNotice,
    SessionSummary,
} from '../../detection/SessionManager.js';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { isTest } from '../isTest.js';

export interface DetectionLoggerOptions {
    /** Event log file, defaults to data/deauth-events.log (test/data under jest) */
    eventLogPath?: string;
    /** Mirror log lines to the console */
    console?: boolean;
}

function formatTimestamp(timestamp: number): string {
    const date = new Date(timestamp);
    return Number.isNaN(date.getTime()) ? String(timestamp) : date.toISOString();
}

/**
 * Persists the activity of monitoring sessions: one line per deauthentication
 * frame, one per alert, plus session start and stop markers.
 *
 * Lines are buffered and appended once per tick, so a batch of events costs a
 * single write. `read` and `flush` write out whatever is pending first.
 */
export class DetectionLogger {
    readonly logFile: string;
    private readonly mirrorToConsole: boolean;
    private pending: string[] = [];
    private flushScheduled = false;

    constructor(options: DetectionLoggerOptions = {}) {
        const dataDir = path.resolve(process.cwd(), isTest ? 'test/data' : 'data');
        this.logFile = options.eventLogPath ?? path.join(dataDir, 'deauth-events.log');
        this.mirrorToConsole = options.console ?? !isTest;

        ensureDirExistence(this.logFile);
    }

    /**
     * Subscribe to a session manager. Returns a function that unsubscribes.
     */
    attach(manager: SessionManager): () => void {
        const onStarted = (session: SessionSummary) => this.logSessionStart(session);
        const onDeauth = ({ interfaceId, event }: DeauthNotice) => this.logDeauth(interfaceId, event);
        const onAlert = ({ interfaceId, outcome }: AlertNotice) => this.logAlert(interfaceId, outcome);
        const onStopped = ({ session, stats }: SessionStoppedNotice) =>
            this.write(
                'info',
                `[${session.interfaceId}] Monitoring stopped after ${Math.round(stats.uptime / 1000)}s: ` +
                    `${stats.totalEventCount} deauth packets, ${stats.alertCount} alerts, ` +
                    `${stats.distinctSuspiciousAddresses} suspicious MACs`,
                Date.now(),
            );

        manager.on('sessionStarted', onStarted);
        manager.on('deauth', onDeauth);
        manager.on('alert', onAlert);
        manager.on('sessionStopped', onStopped);

        return () => {
            manager.off('sessionStarted', onStarted);
            manager.off('deauth', onDeauth);
            manager.off('alert', onAlert);
            manager.off('sessionStopped', onStopped);
        };
    }

    logSessionStart(session: SessionSummary): void {
        this.write(
            'info',
            `[${session.interfaceId}] Monitoring started (threshold ${session.threshold} in ${session.timeWindow / 1000}s)`,
            session.createdAt,
        );
    }

    logDeauth(interfaceId: string, event: DeauthEvent): void {
        this.write(
            'info',
            `[${interfaceId}] Deauth packet detected from ${event.transmitterAddress} ` +
                `to ${event.destinationAddress} (reason ${event.reasonCode})`,
            event.timestamp,
        );
    }

    logAlert(interfaceId: string, outcome: AlertOutcome): void {
        this.write(
            'warn',
            `[${interfaceId}] ALERT threshold exceeded: ${outcome.windowCount} deauth packets in ${outcome.timeWindow / 1000}s`,
            outcome.triggeringEvent.timestamp,
        );
    }

    /**
     * Contents of the event log, null when nothing has been written yet
     */
    read(): string | null {
        this.flush();
        if (!fs.existsSync(this.logFile)) {
            return null;
        }
        return fs.readFileSync(this.logFile, 'utf-8');
    }

    /**
     * Append the buffered lines to the event log
     */
    flush(): void {
        if (this.pending.length === 0) {
            return;
        }
        const chunk = this.pending.join('');
        this.pending = [];

        try {
            fs.appendFileSync(this.logFile, chunk);
        } catch (error) {
            console.error('Failed to write detection log:', error instanceof Error ? error.message : error);
        }
    }

    private write(level: 'info' | 'warn', message: string, timestamp: number): void {
        const line = `[${formatTimestamp(timestamp)}] ${message}`;

        this.pending.push(line + '\n');
        if (!this.flushScheduled) {
            this.flushScheduled = true;
            setImmediate(() => {
                this.flushScheduled = false;
                this.flush();
            });
        }

        if (this.mirrorToConsole) {
            if (level === 'warn') {
                console.warn(line);
            } else {
                console.log(line);
            }
        }
    }
}
