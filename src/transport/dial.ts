import net from 'net';
import { ConnectError } from '../errors';

export interface DialOptions {
    address: string;
    port: number;
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Opens the client socket. Only IP literals are accepted; the attempt is
 * abandoned after `timeoutMs` or when `signal` aborts.
 * @throws {ConnectError}
 */
export function dial(options: DialOptions): Promise<net.Socket> {
    const { address, port, timeoutMs, signal } = options;

    if (net.isIP(address) === 0) {
        return Promise.reject(new ConnectError(
            `Invalid IP address format: ${address}. Use a valid IPv4 (e.g. 127.0.0.1) or IPv6 address.`
        ));
    }
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        return Promise.reject(new ConnectError(`Invalid port: ${port}. Use a port between 1 and 65535.`));
    }
    if (signal?.aborted) {
        return Promise.reject(new ConnectError('Connection attempt cancelled'));
    }

    return new Promise((resolve, reject) => {
        const socket = net.createConnection({ host: address, port });
        let settled = false;

        const cleanup = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
            socket.off('connect', onConnect);
            socket.off('error', onError);
        };

        const fail = (error: ConnectError) => {
            if (settled) return;
            settled = true;
            cleanup();
            socket.destroy();
            reject(error);
        };

        const onConnect = () => {
            if (settled) return;
            settled = true;
            cleanup();
            resolve(socket);
        };
        const onError = (err: Error) => fail(new ConnectError(`Could not connect to ${address}:${port}: ${err.message}`, err));
        const onAbort = () => fail(new ConnectError('Connection attempt cancelled'));

        const timer = setTimeout(
            () => fail(new ConnectError(`Timed out after ${timeoutMs}ms connecting to ${address}:${port}`)),
            timeoutMs
        );

        socket.once('connect', onConnect);
        socket.once('error', onError);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}
