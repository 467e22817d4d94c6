import path from 'path';
import { AppConfig, DEFAULT_APP_CONFIG } from './types/Configuration.js';
import { InvalidConfigurationError } from './errors.js';

function isValidUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

/**
 * Loads the service configuration from environment variables on top of the defaults.
 * The result is validated once and never changes afterwards; sessions with other
 * settings are created explicitly through the session manager.
 */
export class ConfigurationManager {
    private readonly config: AppConfig;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        this.config = this.loadConfiguration();
    }

    /**
     * Get a copy of the loaded configuration
     */
    getConfig(): AppConfig {
        return ConfigurationManager.cloneConfig(this.config);
    }

    private loadConfiguration(): AppConfig {
        const config = ConfigurationManager.cloneConfig(DEFAULT_APP_CONFIG);

        this.loadFromEnvironment(config);
        config.logging.eventLogPath = path.resolve(process.cwd(), config.logging.eventLogPath);
        config.logging.appLogPath = path.resolve(process.cwd(), config.logging.appLogPath);

        this.validateConfiguration(config);
        return config;
    }

    private loadFromEnvironment(config: AppConfig): void {
        const env = this.env;

        // Detection defaults
        if (env.DEAUTH_INTERFACE !== undefined) {
            config.detection.interfaceId = env.DEAUTH_INTERFACE.trim();
        }
        if (env.DEAUTH_THRESHOLD !== undefined) {
            config.detection.threshold = Number(env.DEAUTH_THRESHOLD);
        }
        if (env.DEAUTH_TIME_WINDOW_MS !== undefined) {
            config.detection.timeWindow = Number(env.DEAUTH_TIME_WINDOW_MS);
        }
        if (env.DEAUTH_AUTOSTART !== undefined) {
            config.autoStart = env.DEAUTH_AUTOSTART === 'true';
        }
        if (env.DEAUTH_RETAIN_STOPPED_SESSIONS !== undefined) {
            config.retainStoppedSessions = parseInt(env.DEAUTH_RETAIN_STOPPED_SESSIONS, 10);
        }

        // Logging
        if (env.DEAUTH_EVENT_LOG_PATH) {
            config.logging.eventLogPath = env.DEAUTH_EVENT_LOG_PATH;
        }
        if (env.LOG_FILE_PATH) {
            config.logging.appLogPath = env.LOG_FILE_PATH;
        }
        if (env.LOG_RETENTION_DAYS !== undefined) {
            config.logging.retentionDays = parseInt(env.LOG_RETENTION_DAYS, 10);
        }

        // Alerts
        if (env.WEBHOOK_URL) {
            config.alerts.webhookUrl = env.WEBHOOK_URL;
        }
        if (env.WEBHOOK_COOLDOWN_MS !== undefined) {
            config.alerts.webhookCooldown = Number(env.WEBHOOK_COOLDOWN_MS);
        }

        // HTTP server
        if (env.PORT !== undefined) {
            config.server.port = parseInt(env.PORT, 10);
        }
        if (env.RATE_LIMIT_WINDOW_MS !== undefined) {
            config.server.rateLimit.windowMs = Number(env.RATE_LIMIT_WINDOW_MS);
        }
        if (env.RATE_LIMIT_MAX !== undefined) {
            config.server.rateLimit.max = parseInt(env.RATE_LIMIT_MAX, 10);
        }
    }

    private validateConfiguration(config: AppConfig): void {
        const { detection } = config;
        if (detection.interfaceId.length === 0) {
            throw new InvalidConfigurationError('Interface id must not be empty', 'detection.interfaceId');
        }
        if (!Number.isInteger(detection.threshold) || detection.threshold <= 0) {
            throw new InvalidConfigurationError('Threshold must be a positive integer', 'detection.threshold');
        }
        if (!Number.isFinite(detection.timeWindow) || detection.timeWindow <= 0) {
            throw new InvalidConfigurationError('Time window must be a positive number of milliseconds', 'detection.timeWindow');
        }

        if (!Number.isInteger(config.retainStoppedSessions) || config.retainStoppedSessions < 0) {
            throw new InvalidConfigurationError(
                'Retained stopped sessions must be zero or more',
                'retainStoppedSessions',
            );
        }

        if (!Number.isInteger(config.logging.retentionDays) || config.logging.retentionDays < 1) {
            throw new InvalidConfigurationError('Log retention must be at least one day', 'logging.retentionDays');
        }

        if (config.alerts.webhookUrl !== undefined && !isValidUrl(config.alerts.webhookUrl)) {
            throw new InvalidConfigurationError('Webhook URL is not a valid URL', 'alerts.webhookUrl');
        }
        if (!Number.isFinite(config.alerts.webhookCooldown) || config.alerts.webhookCooldown < 0) {
            throw new InvalidConfigurationError('Webhook cooldown must be zero or more milliseconds', 'alerts.webhookCooldown');
        }

        const { port, rateLimit } = config.server;
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new InvalidConfigurationError('Port must be between 0 and 65535', 'server.port');
        }
        if (!Number.isFinite(rateLimit.windowMs) || rateLimit.windowMs <= 0) {
            throw new InvalidConfigurationError('Rate limit window must be positive', 'server.rateLimit.windowMs');
        }
        if (!Number.isInteger(rateLimit.max) || rateLimit.max <= 0) {
            throw new InvalidConfigurationError('Rate limit must allow at least one request', 'server.rateLimit.max');
        }
    }

    private static cloneConfig(config: AppConfig): AppConfig {
        return {
            detection: { ...config.detection },
            autoStart: config.autoStart,
            retainStoppedSessions: config.retainStoppedSessions,
            logging: { ...config.logging },
            alerts: { ...config.alerts },
            server: {
                port: config.server.port,
                rateLimit: { ...config.server.rateLimit },
            },
        };
    }
}
