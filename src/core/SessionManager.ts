/**
 * @file SessionManager.ts
 * @brief Owns the session: hosting, dialing, the single peer link, and the
 * routing of every decoded message to control arbitration or document sync.
 *
 * Failures never throw out of the public operations. They resolve to
 * `false`, are logged, and surface once through the `error` event; the
 * session then sits in `idle`, ready for the next attempt.
 *
 * @example
 * ```typescript
 * const session = new SessionManager({ editor, approver: { approveControlRequest: () => true } });
 * session.on('peerConnected', (role) => console.log(`connected as ${role}`));
 * await session.startHosting(54321);
 * ```
 */

import { EventEmitter } from '../utils/EventEmitter';
import { Logger, parseLogLevel } from '../utils/Logger';
import { ConnectError, HostStartError, PairpenError } from '../errors';
import { resolveConfig, type SessionConfig } from '../config';
import { HostListener } from '../transport/HostListener';
import { PeerLink } from '../transport/PeerLink';
import { dial } from '../transport/dial';
import type { Socket } from 'net';
import { SessionState } from './SessionState';
import { ControlArbiter } from './ControlArbiter';
import { DocumentSync } from './DocumentSync';
import {
    MessageKind,
    type CloseReason,
    type ControlApprover,
    type DocumentEditor,
    type LocalEditSink,
    type Message,
    type SessionSnapshot,
} from '../types';

export type SessionEvents = {
    state: [snapshot: SessionSnapshot];
    hostingStarted: [address: string, port: number];
    peerConnected: [role: 'host' | 'client'];
    peerDisconnected: [reason: CloseReason];
    controlChanged: [hasControl: boolean];
    controlDeclined: [];
    error: [error: PairpenError];
};

export interface SessionManagerOptions {
    editor: DocumentEditor;
    approver: ControlApprover;
    config?: Partial<SessionConfig>;
    /** Defaults to a child of the global logger, configured from `config`. */
    logger?: Logger;
}

export class SessionManager extends EventEmitter<SessionEvents> implements LocalEditSink {
    public readonly config: SessionConfig;
    private readonly logger: Logger;
    private readonly baseLogger: Logger;
    private readonly editor: DocumentEditor;
    private readonly state = new SessionState();
    private readonly arbiter: ControlArbiter;
    private readonly sync: DocumentSync;

    private listener: HostListener | null = null;
    private link: PeerLink | null = null;
    private dialAbort: AbortController | null = null;
    private starting = false;

    constructor(options: SessionManagerOptions) {
        super();
        this.config = resolveConfig(options.config);
        const base = options.logger ?? createLogger(this.config);
        this.logger = base.child('session');
        this.baseLogger = base;
        this.editor = options.editor;

        const send = (message: Message) => this.send(message);
        this.arbiter = new ControlArbiter({
            state: this.state,
            send,
            approver: options.approver,
            logger: base.child('control'),
            onDeclined: () => this.emit('controlDeclined'),
            onAnomaly: (error) => this.emit('error', error),
        });
        this.sync = new DocumentSync({
            state: this.state,
            editor: this.editor,
            send,
            logger: base.child('sync'),
        });

        this.state.on('change', (snapshot) => {
            this.editor.setReadOnly(snapshot.linkState === 'connected' && !snapshot.hasControl);
            this.emit('state', snapshot);
        });
        this.state.on('control', (hasControl) => this.emit('controlChanged', hasControl));
    }

    public getSnapshot(): SessionSnapshot {
        return this.state.snapshot();
    }

    public get hasControl(): boolean {
        return this.state.hasControl;
    }

    public get isControlRequestPending(): boolean {
        return this.arbiter.isRequestPending;
    }

    // ---------------------------------------------------------------------------
    // Lifecycle
    // ---------------------------------------------------------------------------

    /**
     * Idle → listening. Resolves to false (and emits `error`) when the
     * session is busy or the port cannot be bound.
     */
    public async startHosting(port: number = this.config.port): Promise<boolean> {
        if (!this.isFree()) {
            this.reportError(new HostStartError('Session is already active (hosting or connected)'));
            return false;
        }

        const listener = new HostListener({
            logger: this.baseLogger.child('host'),
            maxFrameBytes: this.config.maxFrameBytes,
        });
        this.starting = true;
        this.listener = listener;

        let bound: { address: string; port: number };
        try {
            bound = await listener.listen(port, this.config.bindAddress);
        } catch (err) {
            this.starting = false;
            if (this.listener !== listener) {
                this.logger.info('Hosting cancelled before the listener started');
                return false;
            }
            this.listener = null;
            this.reportError(err instanceof PairpenError
                ? err
                : new HostStartError(`Server could not start: ${String(err)}`));
            return false;
        }
        this.starting = false;

        // stopSession() ran between the bind completing and this continuation
        if (this.listener !== listener) {
            listener.close();
            return false;
        }

        listener.on('peer', (link) => this.attachLink(link, 'host'));
        listener.on('error', (error) => this.reportError(error));

        this.state.toListening(bound.address, bound.port);
        this.logger.info(`Hosting on ${bound.address}:${bound.port}`);
        this.emit('hostingStarted', bound.address, bound.port);
        return true;
    }

    /**
     * Idle → connected as client. Resolves to false (and emits `error`) when
     * the session is busy or the host cannot be reached.
     */
    public async connectToHost(address: string, port: number = this.config.port): Promise<boolean> {
        if (!this.isFree()) {
            this.reportError(new ConnectError('Session is already active (hosting or connected)'));
            return false;
        }

        const abort = new AbortController();
        this.dialAbort = abort;
        this.logger.info(`Connecting to ${address}:${port}`);

        let socket: Socket;
        try {
            socket = await dial({ address, port, timeoutMs: this.config.connectTimeoutMs, signal: abort.signal });
        } catch (err) {
            if (this.dialAbort === abort) this.dialAbort = null;
            if (abort.signal.aborted) {
                this.logger.info('Connection attempt cancelled');
                return false;
            }
            this.reportError(err instanceof PairpenError
                ? err
                : new ConnectError(`Could not connect to ${address}:${port}: ${String(err)}`));
            return false;
        }

        if (this.dialAbort !== abort) {
            socket.destroy();
            return false;
        }
        this.dialAbort = null;

        const link = new PeerLink(socket, {
            logger: this.baseLogger.child('link'),
            maxFrameBytes: this.config.maxFrameBytes,
        });
        this.attachLink(link, 'client');
        return true;
    }

    /**
     * Returns to idle from any state, closing the listener, the link and any
     * dial in flight. A no-op when already idle.
     */
    public stopSession(): void {
        if (this.dialAbort) {
            this.dialAbort.abort();
            this.dialAbort = null;
        }
        this.teardown('stopped');
    }

    // ---------------------------------------------------------------------------
    // Control and document operations
    // ---------------------------------------------------------------------------

    /** Client: ask the host for control. */
    public requestControl(): boolean {
        return this.arbiter.requestControl();
    }

    /** Editor reports a local edit. */
    public onLocalDocumentChanged(): void {
        this.sync.onLocalChange();
    }

    /** Editor reports a typing attempt while read-only. Host-only reclaim. */
    public onUserRequestedReclaim(): void {
        this.arbiter.reclaim();
    }

    // ---------------------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------------------

    private isFree(): boolean {
        return this.state.isIdle && !this.starting && this.dialAbort === null && this.listener === null;
    }

    private send(message: Message): boolean {
        const link = this.link;
        if (!link) {
            this.logger.warn(`No peer link; dropping ${message.type}`);
            return false;
        }
        return link.send(message);
    }

    private attachLink(link: PeerLink, role: 'host' | 'client'): void {
        this.link = link;

        link.on('message', (message) => {
            if (this.link === link) this.route(message);
        });
        link.on('frameError', (error) => {
            if (this.link === link) this.emit('error', error);
        });
        link.on('error', (error) => {
            if (this.link === link) this.reportError(error);
        });
        link.on('closed', (reason) => this.handleLinkClosed(link, reason));

        this.arbiter.reset();
        this.sync.reset();
        this.state.toConnected(role, link.peer);
        this.logger.info(`Connected to ${link.peer} as ${role}`);
        this.emit('peerConnected', role);

        if (role === 'host') {
            this.sync.pushDocument();
        }
    }

    private route(message: Message): void {
        if (message.type === MessageKind.TextUpdate) {
            this.sync.applyInbound(message.content);
        } else {
            this.arbiter.handle(message.type);
        }
    }

    private handleLinkClosed(link: PeerLink, reason: CloseReason): void {
        if (this.link !== link) return;

        if (reason === 'preempted') {
            // A newer client replaces this one; the listener announces it next.
            this.link = null;
            this.arbiter.reset();
            this.logger.info(`Peer ${link.peer} preempted by a new connection`);
            this.emit('peerDisconnected', reason);
            return;
        }

        this.teardown(reason);
    }

    private teardown(reason: CloseReason): void {
        const link = this.link;
        const listener = this.listener;
        this.link = null;
        this.listener = null;

        link?.close(reason);
        listener?.close();
        this.arbiter.reset();
        this.sync.reset();

        if (this.state.isIdle) return;

        this.state.toIdle();
        this.logger.info(`Session ended (${reason})`);
        if (link) {
            this.emit('peerDisconnected', reason);
        }
    }

    private reportError(error: PairpenError): void {
        this.logger.error(`${error.code}: ${error.message}`);
        this.emit('error', error);
    }
}

function createLogger(config: SessionConfig): Logger {
    const logger = new Logger('pairpen');
    logger.setLogLevel(parseLogLevel(config.logLevel));
    logger.setJson(config.logJson);
    return logger;
}
