import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as rootLogger, preview } from '../utils/Logger';
import { decodeFrame, encodeMessage, DEFAULT_MAX_FRAME_BYTES, FRAME_HEADER_BYTES, type DecodeResult } from '../codec';
import { ConnectionLostError, FramingError, PairpenError, WriteError } from '../errors';
import type { CloseReason, Message } from '../types';

/**
 * The part of a socket a link uses. `net.Socket` satisfies it; tests pass
 * in-process fakes.
 */
export interface SocketLike {
    readonly destroyed: boolean;
    readonly remoteAddress?: string;
    readonly remotePort?: number;
    write(data: Uint8Array, callback?: (err?: Error | null) => void): boolean;
    destroy(): void;
    on(event: 'data', listener: (chunk: Buffer) => void): unknown;
    on(event: 'close', listener: () => void): unknown;
    on(event: 'error', listener: (err: Error) => void): unknown;
}

export type PeerLinkEvents = {
    message: [message: Message];
    frameError: [error: FramingError];
    error: [error: PairpenError];
    closed: [reason: CloseReason];
};

export interface PeerLinkOptions {
    logger?: Logger;
    maxFrameBytes?: number;
}

/**
 * Owns one live socket: framed writes, buffered reads, and a single
 * `closed` notification however the link ends.
 */
export class PeerLink extends EventEmitter<PeerLinkEvents> {
    private readBuffer: Uint8Array = new Uint8Array(0);
    private closed = false;
    private readonly logger: Logger;
    private readonly maxFrameBytes: number;
    public readonly peer: string;

    constructor(private readonly socket: SocketLike, options: PeerLinkOptions = {}) {
        super();
        this.logger = options.logger ?? rootLogger.child('link');
        this.maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
        this.peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;

        socket.on('data', (chunk) => this.onReadable(chunk));
        socket.on('error', (err) => this.handleSocketError(err));
        socket.on('close', () => this.close('remote'));
    }

    public get isClosed(): boolean {
        return this.closed;
    }

    /**
     * Encodes and writes a message. Returns false (after emitting `error`
     * and closing the link) when the link cannot take the write. A message
     * over `maxFrameBytes` is refused with an `error` and the link stays up.
     */
    public send(message: Message): boolean {
        if (this.closed) {
            this.logger.warn(`Dropping ${message.type}: link to ${this.peer} is closed`);
            return false;
        }
        if (this.socket.destroyed) {
            this.fail(new WriteError(`Cannot send ${message.type}: link to ${this.peer} is not connected`));
            return false;
        }

        const frame = encodeMessage(message);
        const bodyLength = frame.length - FRAME_HEADER_BYTES;
        if (bodyLength > this.maxFrameBytes) {
            // the peer would drop the connection; refuse the message and keep the link
            const error = new WriteError(
                `Cannot send ${message.type}: frame length ${bodyLength} exceeds limit of ${this.maxFrameBytes} bytes`
            );
            this.logger.warn(error.message);
            this.emit('error', error);
            return false;
        }

        this.logger.debug(`Sending ${message.type} to ${this.peer}`, preview(message.content));
        try {
            this.socket.write(frame, (err) => {
                if (err) {
                    this.fail(new WriteError(`Write to ${this.peer} failed: ${err.message}`, err));
                }
            });
        } catch (err) {
            const cause = err instanceof Error ? err : new Error(String(err));
            this.fail(new WriteError(`Write to ${this.peer} failed: ${cause.message}`, cause));
            return false;
        }
        return true;
    }

    /**
     * Appends received bytes and dispatches every complete frame in order.
     */
    public onReadable(chunk: Uint8Array): void {
        if (this.closed) return;
        this.readBuffer = concat(this.readBuffer, chunk);

        while (!this.closed && this.readBuffer.length > 0) {
            const result = this.decodeNext();

            if (result instanceof FramingError) {
                this.logger.warn(`Discarding frame from ${this.peer}: ${result.message}`);
                this.emit('frameError', result);
                if (!result.recoverable) {
                    this.readBuffer = new Uint8Array(0);
                    this.close('framing');
                    return;
                }
                this.readBuffer = this.readBuffer.subarray(result.frameLength);
                continue;
            }

            const { message, bytesConsumed } = result;
            if (!message) break;
            this.readBuffer = this.readBuffer.subarray(bytesConsumed);
            this.logger.debug(`Received ${message.type} from ${this.peer}`, preview(message.content));
            this.emit('message', message);
        }
    }

    private decodeNext(): DecodeResult | FramingError {
        try {
            return decodeFrame(this.readBuffer, this.maxFrameBytes);
        } catch (err) {
            if (err instanceof FramingError) return err;
            throw err;
        }
    }

    /**
     * Number of bytes waiting for the rest of their frame.
     */
    public get pendingBytes(): number {
        return this.readBuffer.length;
    }

    /**
     * Aborts the socket and emits `closed` once. Safe to call repeatedly.
     */
    public close(reason: CloseReason = 'local'): void {
        if (this.closed) return;
        this.closed = true;
        this.readBuffer = new Uint8Array(0);
        if (!this.socket.destroyed) {
            this.socket.destroy();
        }
        this.logger.info(`Link to ${this.peer} closed (${reason})`);
        this.emit('closed', reason);
    }

    private handleSocketError(err: Error): void {
        if (this.closed) return;
        this.fail(new ConnectionLostError(`Connection to ${this.peer} lost: ${err.message}`, err));
    }

    private fail(error: PairpenError): void {
        if (this.closed) return;
        this.logger.error(error.message);
        this.emit('error', error);
        this.close('error');
    }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
    if (a.length === 0) return b;
    const out = new Uint8Array(a.length + b.length);
    out.set(a, 0);
    out.set(b, a.length);
    return out;
}
