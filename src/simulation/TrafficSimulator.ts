import { BROADCAST_ADDRESS, type DeauthEvent } from '../detection/types/index.js';

export type AttackType = 'broadcast' | 'targeted' | 'flood';

export const ATTACK_TYPES: readonly AttackType[] = ['broadcast', 'targeted', 'flood'];

export interface SimulationOptions {
    /** Timestamp of the first simulated tick (ms) */
    startTimestamp: number;
    /** Length of the simulated capture (ms) */
    durationMs: number;
    /** Background deauth frames per second */
    normalRate?: number;
    /** Attack burst to inject, 'none' for background traffic only */
    attack?: AttackType | 'random' | 'none';
}

const TICK_MS = 100;
const NORMAL_REASONS = [1, 4, 5, 7];
const ATTACK_REASONS: Record<AttackType, number[]> = {
    broadcast: [1, 4, 5, 8],
    targeted: [1, 4, 7],
    flood: [1, 4],
};

/**
 * Stand-in capture source producing plausible deauthentication traffic:
 * sparse background frames plus optional attack bursts.
 */
export class TrafficSimulator {
    constructor(private readonly random: () => number = Math.random) {}

    randomMac(): string {
        const octets: string[] = [];
        for (let i = 0; i < 6; i++) {
            octets.push(this.randomInt(0, 255).toString(16).padStart(2, '0'));
        }
        return octets.join(':').toUpperCase();
    }

    /**
     * Background traffic: each tick emits a frame with probability rate * tick
     */
    normalTraffic(startTimestamp: number, durationMs: number, normalRate: number): DeauthEvent[] {
        const events: DeauthEvent[] = [];
        const probability = normalRate * (TICK_MS / 1000);

        for (let offset = 0; offset < durationMs; offset += TICK_MS) {
            if (this.random() >= probability) {
                continue;
            }
            const transmitterAddress = this.randomMac();
            const destinationAddress = this.random() < 0.5 ? this.randomMac() : BROADCAST_ADDRESS;
            events.push({
                timestamp: startTimestamp + offset,
                transmitterAddress,
                destinationAddress,
                reasonCode: this.pick(NORMAL_REASONS),
            });
        }

        return events;
    }

    /**
     * A burst of 15-50 frames spread evenly over 2-6 seconds
     */
    attack(type: AttackType, startTimestamp: number): DeauthEvent[] {
        const duration = 2000 + this.random() * 4000;
        const packets = this.randomInt(15, 50);
        const spacing = duration / packets;
        const events: DeauthEvent[] = [];

        for (let i = 0; i < packets; i++) {
            const transmitterAddress = this.randomMac();
            const destinationAddress = this.attackDestination(type);
            events.push({
                timestamp: startTimestamp + Math.round(i * spacing),
                transmitterAddress,
                destinationAddress,
                reasonCode: this.pick(ATTACK_REASONS[type]),
            });
        }

        return events;
    }

    generate(options: SimulationOptions): DeauthEvent[] {
        const { startTimestamp, durationMs } = options;
        const events = this.normalTraffic(startTimestamp, durationMs, options.normalRate ?? 0.1);

        const attack = options.attack ?? 'random';
        if (attack !== 'none') {
            const type = attack === 'random' ? this.pick(ATTACK_TYPES) : attack;
            const attackStart = startTimestamp + Math.floor(durationMs / 4);
            events.push(...this.attack(type, attackStart));
        }

        // stable: on equal timestamps background frames stay ahead of the burst
        return events.sort((a, b) => a.timestamp - b.timestamp);
    }

    private attackDestination(type: AttackType): string {
        switch (type) {
            case 'broadcast':
                return BROADCAST_ADDRESS;
            case 'targeted':
                return this.randomMac();
            case 'flood':
                return this.random() < 0.5 ? this.randomMac() : BROADCAST_ADDRESS;
        }
    }

    private randomInt(min: number, max: number): number {
        return Math.floor(this.random() * (max - min + 1)) + min;
    }

    private pick<T>(values: readonly T[]): T {
        return values[Math.floor(this.random() * values.length)];
    }
}
