import type {
    AlertNotice,
    SessionManager,
    SessionStoppedNotice,
} from '../../detection/SessionManager.js';

/**
 * Body POSTed to the alert webhook
 */
export interface AlertWebhookPayload {
    type: 'DEAUTH_FLOOD';
    sessionId: string;
    interfaceId: string;
    windowCount: number;
    timeWindow: number;
    transmitterAddress: string;
    destinationAddress: string;
    reasonCode: number;
    timestamp: string;
}

export interface AlertNotifierOptions {
    webhookUrl?: string;
    /** Minimum delay between two notices for the same session (ms) */
    cooldown: number;
    clock?: () => number;
}

/**
 * Forwards alerts to a webhook. The engine keeps alerting for as long as a flood
 * lasts, so notices are throttled per session: one request in flight at a time,
 * and none within the cooldown of the last delivered one.
 */
export class AlertNotifier {
    private readonly lastSent: Map<string, number> = new Map();
    private readonly inFlight: Set<string> = new Set();
    // Sessions stopped while a request was in flight
    private readonly released: Set<string> = new Set();
    private readonly clock: () => number;

    constructor(private readonly options: AlertNotifierOptions) {
        this.clock = options.clock ?? Date.now;
    }

    attach(manager: SessionManager): () => void {
        const onAlert = (notice: AlertNotice) => {
            this.notify(notice).catch((err: unknown) => {
                console.error('Alert notification failed:', err);
            });
        };
        const onStopped = ({ session }: SessionStoppedNotice) => this.forget(session.id);
        manager.on('alert', onAlert);
        manager.on('sessionStopped', onStopped);
        return () => {
            manager.off('alert', onAlert);
            manager.off('sessionStopped', onStopped);
        };
    }

    /**
     * Drop the throttling state of a session that will not alert again
     */
    forget(sessionId: string): void {
        this.lastSent.delete(sessionId);
        if (this.inFlight.has(sessionId)) {
            this.released.add(sessionId);
        }
    }

    /**
     * Send a notice unless the webhook is disabled or the session is cooling down.
     * Resolves to whether the webhook accepted it.
     */
    async notify(notice: AlertNotice): Promise<boolean> {
        const url = this.options.webhookUrl;
        if (!url) {
            return false;
        }

        const { sessionId } = notice;
        const now = this.clock();
        const last = this.lastSent.get(sessionId);
        if (this.inFlight.has(sessionId) || (last !== undefined && now - last < this.options.cooldown)) {
            return false;
        }

        const { outcome } = notice;
        const payload: AlertWebhookPayload = {
            type: 'DEAUTH_FLOOD',
            sessionId,
            interfaceId: notice.interfaceId,
            windowCount: outcome.windowCount,
            timeWindow: outcome.timeWindow,
            transmitterAddress: outcome.triggeringEvent.transmitterAddress,
            destinationAddress: outcome.triggeringEvent.destinationAddress,
            reasonCode: outcome.triggeringEvent.reasonCode,
            timestamp: new Date(now).toISOString(),
        };

        this.inFlight.add(sessionId);
        try {
            const res = await fetch(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                },
                body: JSON.stringify(payload),
            });

            if (!res.ok) {
                console.error(`Webhook failed: ${res.status} ${res.statusText}`);
                return false;
            }
            this.lastSent.set(sessionId, now);
            console.log(`Webhook alert sent for ${notice.interfaceId}`);
            return true;
        } catch (err: unknown) {
            console.error('Webhook fetch failed:', err instanceof Error ? err.message : err);
            return false;
        } finally {
            this.inFlight.delete(sessionId);
            if (this.released.delete(sessionId)) {
                this.lastSent.delete(sessionId);
            }
        }
    }
}
