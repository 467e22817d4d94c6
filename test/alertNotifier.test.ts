import http from 'http';
import express from 'express';
import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, jest } from '@jest/globals';
import { AlertNotifier, type AlertWebhookPayload } from '../src/utils/logger/alertNotifier.js';
import { SessionManager, type AlertNotice } from '../src/detection/SessionManager.js';

function notice(sessionId = 'session-1'): AlertNotice {
    return {
        sessionId,
        interfaceId: 'wlan0mon',
        outcome: {
            windowCount: 12,
            timeWindow: 5000,
            triggeringEvent: {
                timestamp: 1000,
                transmitterAddress: 'AA:BB:CC:DD:EE:01',
                destinationAddress: 'FF:FF:FF:FF:FF:FF',
                reasonCode: 7,
            },
        },
    };
}

describe('AlertNotifier', () => {
    let webhookServer: http.Server;
    let baseUrl: string;
    let received: unknown[];
    let failuresBeforeSuccess: number;

    beforeAll((done) => {
        const webhookApp = express();
        webhookApp.use(express.json());

        webhookApp.post('/alert', (req, res) => {
            received.push(req.body);
            res.status(200).send('OK');
        });
        webhookApp.post('/broken', (req, res) => {
            res.status(503).send('Unavailable');
        });
        webhookApp.post('/flaky', (req, res) => {
            if (failuresBeforeSuccess > 0) {
                failuresBeforeSuccess--;
                res.status(503).send('Unavailable');
                return;
            }
            received.push(req.body);
            res.status(200).send('OK');
        });

        webhookServer = webhookApp.listen(0, () => {
            const address = webhookServer.address();
            const port = address && typeof address !== 'string' ? address.port : 0;
            baseUrl = `http://127.0.0.1:${port}`;
            done();
        });
    });

    afterAll((done) => {
        webhookServer.close(() => done());
    });

    beforeEach(() => {
        received = [];
        failuresBeforeSuccess = 0;
        jest.spyOn(console, 'log').mockImplementation(() => {});
        jest.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should do nothing without a webhook URL', async () => {
        const notifier = new AlertNotifier({ cooldown: 0 });

        await expect(notifier.notify(notice())).resolves.toBe(false);
        expect(received).toEqual([]);
    });

    it('should post the alert payload', async () => {
        const notifier = new AlertNotifier({
            webhookUrl: `${baseUrl}/alert`,
            cooldown: 0,
            clock: () => Date.UTC(2024, 5, 1, 12),
        });

        await expect(notifier.notify(notice())).resolves.toBe(true);

        const expected: AlertWebhookPayload = {
            type: 'DEAUTH_FLOOD',
            sessionId: 'session-1',
            interfaceId: 'wlan0mon',
            windowCount: 12,
            timeWindow: 5000,
            transmitterAddress: 'AA:BB:CC:DD:EE:01',
            destinationAddress: 'FF:FF:FF:FF:FF:FF',
            reasonCode: 7,
            timestamp: '2024-06-01T12:00:00.000Z',
        };
        expect(received).toEqual([expected]);
    });

    it('should throttle notices per session', async () => {
        let now = 1000;
        const notifier = new AlertNotifier({ webhookUrl: `${baseUrl}/alert`, cooldown: 1000, clock: () => now });

        await expect(notifier.notify(notice())).resolves.toBe(true);
        now = 1500;
        await expect(notifier.notify(notice())).resolves.toBe(false);
        await expect(notifier.notify(notice('session-2'))).resolves.toBe(true);
        now = 2000;
        await expect(notifier.notify(notice())).resolves.toBe(true);

        expect(received).toHaveLength(3);
    });

    it('should report a rejected webhook', async () => {
        const notifier = new AlertNotifier({ webhookUrl: `${baseUrl}/broken`, cooldown: 0 });

        await expect(notifier.notify(notice())).resolves.toBe(false);
        expect(console.error).toHaveBeenCalledWith('Webhook failed: 503 Service Unavailable');
    });

    it('should not start a cooldown after a failed delivery', async () => {
        failuresBeforeSuccess = 1;
        const notifier = new AlertNotifier({ webhookUrl: `${baseUrl}/flaky`, cooldown: 10_000, clock: () => 1000 });

        await expect(notifier.notify(notice())).resolves.toBe(false);
        await expect(notifier.notify(notice())).resolves.toBe(true);
        expect(received).toHaveLength(1);
    });

    it('should keep a single request in flight per session', async () => {
        const notifier = new AlertNotifier({ webhookUrl: `${baseUrl}/alert`, cooldown: 0 });

        const results = await Promise.all([notifier.notify(notice()), notifier.notify(notice())]);

        expect(results).toEqual([true, false]);
        expect(received).toHaveLength(1);
    });

    it('should drop the cooldown of a stopped session', async () => {
        const manager = new SessionManager({ interfaceId: 'wlan0mon', threshold: 100, timeWindow: 1000 });
        const notifier = new AlertNotifier({ webhookUrl: `${baseUrl}/alert`, cooldown: 60_000, clock: () => 1000 });
        const detach = notifier.attach(manager);
        const { id } = manager.startSession();

        await expect(notifier.notify(notice(id))).resolves.toBe(true);
        await expect(notifier.notify(notice(id))).resolves.toBe(false);

        manager.stopSession(id);
        await expect(notifier.notify(notice(id))).resolves.toBe(true);
        expect(received).toHaveLength(2);
        detach();
    });

    it('should forward alerts raised by a session manager', () => {
        const manager = new SessionManager({ interfaceId: 'wlan0mon', threshold: 1, timeWindow: 1000 });
        const notifier = new AlertNotifier({ cooldown: 0 });
        const notify = jest.spyOn(notifier, 'notify').mockResolvedValue(false);
        const detach = notifier.attach(manager);

        const { id } = manager.startSession();
        const event = {
            timestamp: 0,
            transmitterAddress: 'AA:BB:CC:DD:EE:01',
            destinationAddress: 'FF:FF:FF:FF:FF:FF',
            reasonCode: 7,
        };
        manager.ingest(id, event);

        expect(notify).toHaveBeenCalledWith({
            sessionId: id,
            interfaceId: 'wlan0mon',
            outcome: { windowCount: 1, timeWindow: 1000, triggeringEvent: event },
        });

        detach();
        manager.ingest(id, { ...event, timestamp: 10 });
        expect(notify).toHaveBeenCalledTimes(1);
    });
});
