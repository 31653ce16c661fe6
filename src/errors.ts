/**
 * Error types for pairpen.
 *
 * Every failure the session surfaces is one of these; the `code` is the
 * structured error kind carried by the session's `error` event.
 */

export type ErrorCode =
    | 'HOST_START_FAILED'
    | 'CONNECT_FAILED'
    | 'FRAMING_ERROR'
    | 'WRITE_ERROR'
    | 'CONNECTION_LOST'
    | 'PROTOCOL_ANOMALY'
    | 'CONFIGURATION_ERROR';

/**
 * Base class for all pairpen errors.
 */
export class PairpenError extends Error {
    constructor(message: string, public readonly code: ErrorCode, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = 'PairpenError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PairpenError);
        }
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends PairpenError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * The listener could not be started (port in use, permission denied,
 * session already active).
 */
export class HostStartError extends PairpenError {
    constructor(message: string, cause?: Error) {
        super(message, 'HOST_START_FAILED', cause);
        this.name = 'HostStartError';
    }
}

/**
 * Dialing the host failed: invalid address, refused, unreachable or timed out.
 */
export class ConnectError extends PairpenError {
    constructor(message: string, cause?: Error) {
        super(message, 'CONNECT_FAILED', cause);
        this.name = 'ConnectError';
    }
}

/**
 * A frame on the wire could not be decoded.
 *
 * `frameLength` is the number of bytes the broken frame occupies at the front
 * of the buffer. When `recoverable` is false the stream has lost its framing
 * and the link has to be dropped.
 */
export class FramingError extends PairpenError {
    constructor(
        message: string,
        public readonly frameLength: number,
        public readonly recoverable: boolean = true
    ) {
        super(message, 'FRAMING_ERROR');
        this.name = 'FramingError';
    }
}

export class WriteError extends PairpenError {
    constructor(message: string, cause?: Error) {
        super(message, 'WRITE_ERROR', cause);
        this.name = 'WriteError';
    }
}

/**
 * The socket reported an I/O error mid-session.
 */
export class ConnectionLostError extends PairpenError {
    constructor(message: string, cause?: Error) {
        super(message, 'CONNECTION_LOST', cause);
        this.name = 'ConnectionLostError';
    }
}

/**
 * A control message arrived that makes no sense for the local role.
 */
export class ProtocolAnomalyError extends PairpenError {
    constructor(message: string) {
        super(message, 'PROTOCOL_ANOMALY');
        this.name = 'ProtocolAnomalyError';
    }
}
