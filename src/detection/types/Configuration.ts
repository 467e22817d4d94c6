/**
 * Settings of a single monitoring session, immutable for its lifetime
 */
export interface EngineSettings {
    /** Capture interface the events come from, passed through untouched */
    interfaceId: string;
    /** Minimum number of in-window events that raises an alert */
    threshold: number;
    /** Length of the sliding window (ms) */
    timeWindow: number;
}

/**
 * Service-wide configuration
 */
export interface AppConfig {
    /** Defaults for new monitoring sessions */
    detection: EngineSettings;
    /** Start a session with the default settings when the service boots */
    autoStart: boolean;
    /** Stopped sessions whose final statistics stay queryable */
    retainStoppedSessions: number;
    logging: {
        /** File receiving one line per ingested event and per alert */
        eventLogPath: string;
        /** File receiving the tee of console output */
        appLogPath: string;
        /** Days rotated log files are kept */
        retentionDays: number;
    };
    alerts: {
        /** Endpoint alert notices are POSTed to, disabled when unset */
        webhookUrl?: string;
        /** Minimum delay between two notices of the same session (ms) */
        webhookCooldown: number;
    };
    server: {
        port: number;
        rateLimit: {
            windowMs: number;
            max: number;
        };
    };
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
    interfaceId: 'wlan0mon',
    threshold: 10,
    timeWindow: 5000,
};

/**
 * Default configuration values, paths relative to the working directory
 */
export const DEFAULT_APP_CONFIG: AppConfig = {
    detection: { ...DEFAULT_ENGINE_SETTINGS },
    autoStart: true,
    retainStoppedSessions: 100,
    logging: {
        eventLogPath: 'data/deauth-events.log',
        appLogPath: 'data/app.log',
        retentionDays: 7,
    },
    alerts: {
        webhookUrl: undefined,
        webhookCooldown: 30_000,
    },
    server: {
        port: 3000,
        rateLimit: {
            windowMs: 60_000,
            max: 120,
        },
    },
};
