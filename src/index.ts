/**
 * pairpen - two-party collaborative editing over a single TCP connection.
 *
 * One host and one client share a document. Exactly one of them holds
 * editing control at a time; the holder's edits replace the other side's
 * document wholesale, and control moves by request/grant/revoke/decline.
 *
 * @example
 * ```typescript
 * import { SessionManager, MemoryDocument, bindDocument } from 'pairpen';
 *
 * const doc = new MemoryDocument('print(1)');
 * const host = new SessionManager({ editor: doc, approver: { approveControlRequest: () => true } });
 * bindDocument(host, doc);
 * await host.startHosting(54321);
 * ```
 *
 * @packageDocumentation
 */

export { SessionManager } from './core/SessionManager';
export type { SessionEvents, SessionManagerOptions } from './core/SessionManager';
export { SessionState } from './core/SessionState';
export type { SessionPhase, SessionStateEvents } from './core/SessionState';
export { ControlArbiter } from './core/ControlArbiter';
export type { ControlArbiterDeps } from './core/ControlArbiter';
export { DocumentSync, clampViewState } from './core/DocumentSync';
export type { DocumentSyncDeps } from './core/DocumentSync';

// Transport
export { PeerLink } from './transport/PeerLink';
export type { PeerLinkEvents, PeerLinkOptions, SocketLike } from './transport/PeerLink';
export { HostListener } from './transport/HostListener';
export type { BoundAddress, HostListenerEvents, HostListenerOptions } from './transport/HostListener';
export { dial } from './transport/dial';
export type { DialOptions } from './transport/dial';

// Editor adapters
export { MemoryDocument, bindDocument } from './document/MemoryDocument';
export type { DocumentEvents } from './document/MemoryDocument';
export { FileDocument } from './document/FileDocument';

// Codec
export {
    encodeMessage,
    decodeFrame,
    textUpdate,
    controlMessage,
    FRAME_HEADER_BYTES,
    DEFAULT_MAX_FRAME_BYTES,
} from './codec';
export type { DecodeResult } from './codec';

// Types
export { MessageKind } from './types';
export type {
    Message,
    ControlMessageKind,
    SessionRole,
    LinkState,
    SessionSnapshot,
    CloseReason,
    EditorViewState,
    DocumentEditor,
    LocalEditSink,
    ControlApprover,
} from './types';

// Configuration
export { resolveConfig, configFromEnv, DEFAULT_CONFIG, DEFAULT_PORT } from './config';
export type { SessionConfig } from './config';

// Errors
export {
    PairpenError,
    ConfigurationError,
    HostStartError,
    ConnectError,
    FramingError,
    WriteError,
    ConnectionLostError,
    ProtocolAnomalyError,
} from './errors';
export type { ErrorCode } from './errors';

// Logging
export { Logger, LogLevel, logger, parseLogLevel } from './utils/Logger';
export type { LogLevelName } from './utils/Logger';
