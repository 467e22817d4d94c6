/**
 * Error types raised by the detection components
 */
export enum DetectionErrorType {
    INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
    SESSION_CLOSED = 'SESSION_CLOSED',
    SESSION_NOT_FOUND = 'SESSION_NOT_FOUND',
}

/**
 * Base class for every error the detection layer throws on purpose
 */
export class DetectionError extends Error {
    constructor(message: string, public readonly type: DetectionErrorType) {
        super(message);
        this.name = 'DetectionError';
    }
}

/**
 * Raised when a session or the service is configured with unusable values.
 * Fatal to whatever was being created.
 */
export class InvalidConfigurationError extends DetectionError {
    constructor(message: string, public readonly field?: string) {
        super(message, DetectionErrorType.INVALID_CONFIGURATION);
        this.name = 'InvalidConfigurationError';
    }
}

/**
 * Raised when events are fed to a stopped session. State is left untouched.
 */
export class SessionClosedError extends DetectionError {
    constructor(public readonly interfaceId: string) {
        super(`Monitoring session on ${interfaceId} has been stopped`, DetectionErrorType.SESSION_CLOSED);
        this.name = 'SessionClosedError';
    }
}

export class SessionNotFoundError extends DetectionError {
    constructor(public readonly sessionId: string) {
        super(`No monitoring session with id ${sessionId}`, DetectionErrorType.SESSION_NOT_FOUND);
        this.name = 'SessionNotFoundError';
    }
}
