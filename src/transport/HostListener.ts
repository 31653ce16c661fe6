import net from 'net';
import { EventEmitter } from '../utils/EventEmitter';
import { Logger, logger as rootLogger } from '../utils/Logger';
import { HostStartError, PairpenError } from '../errors';
import { PeerLink } from './PeerLink';

export type HostListenerEvents = {
    peer: [link: PeerLink];
    error: [error: PairpenError];
};

export interface HostListenerOptions {
    logger?: Logger;
    maxFrameBytes?: number;
}

export interface BoundAddress {
    address: string;
    port: number;
}

/**
 * Accepts peers for the host. Only one peer is kept: accepting a new
 * connection aborts the previous link before the new one is announced.
 */
export class HostListener extends EventEmitter<HostListenerEvents> {
    private server: net.Server | null = null;
    private current: PeerLink | null = null;
    private cancelListen: (() => void) | null = null;
    private readonly logger: Logger;
    private readonly maxFrameBytes?: number;

    constructor(options: HostListenerOptions = {}) {
        super();
        this.logger = options.logger ?? rootLogger.child('host');
        this.maxFrameBytes = options.maxFrameBytes;
    }

    public get isListening(): boolean {
        return this.server?.listening ?? false;
    }

    public get activeLink(): PeerLink | null {
        return this.current;
    }

    /**
     * Binds and starts listening. Port 0 picks a free port.
     * @throws {HostStartError} when the port cannot be bound
     */
    public listen(port: number, address: string): Promise<BoundAddress> {
        if (this.server) {
            return Promise.reject(new HostStartError('Listener is already started'));
        }

        const server = net.createServer((socket) => this.accept(socket));
        this.server = server;

        return new Promise((resolve, reject) => {
            const onListenError = (err: Error) => {
                this.cancelListen = null;
                this.server = null;
                server.close();
                reject(new HostStartError(`Server could not start on ${address}:${port}: ${err.message}`, err));
            };
            this.cancelListen = () => {
                server.off('error', onListenError);
                reject(new HostStartError('Listener closed before it started'));
            };

            server.once('error', onListenError);
            server.listen(port, address, () => {
                this.cancelListen = null;
                server.off('error', onListenError);
                server.on('error', (err) => {
                    this.logger.error(`Listener error: ${err.message}`);
                    this.emit('error', new HostStartError(`Listener failed: ${err.message}`, err));
                });

                const bound = server.address();
                const info: BoundAddress = bound !== null && typeof bound === 'object'
                    ? { address: bound.address, port: bound.port }
                    : { address, port };
                this.logger.info(`Listening on ${info.address}:${info.port}`);
                resolve(info);
            });
        });
    }

    /**
     * Stops accepting connections. The active link, if any, is left to its owner.
     */
    public close(): void {
        const server = this.server;
        if (!server) return;
        this.server = null;
        this.current = null;
        server.close();
        this.cancelListen?.();
        this.cancelListen = null;
        this.logger.info('Listener stopped');
    }

    private accept(socket: net.Socket): void {
        if (!this.server) {
            socket.destroy();
            return;
        }

        const previous = this.current;
        if (previous && !previous.isClosed) {
            this.logger.info(`Disconnecting ${previous.peer} to accept a new peer`);
            previous.close('preempted');
        }

        const link = new PeerLink(socket, {
            logger: this.logger.child('link'),
            maxFrameBytes: this.maxFrameBytes,
        });
        this.current = link;
        link.once('closed', () => {
            if (this.current === link) this.current = null;
        });

        this.logger.info(`Peer connected from ${link.peer}`);
        this.emit('peer', link);
    }
}
