import { EventEmitter } from 'events';
import { vi } from 'vitest';
import type { SocketLike } from '../src/transport/PeerLink';
import { Logger, LogLevel } from '../src/utils/Logger';

/**
 * In-process stand-in for a connected net.Socket.
 */
export class MockSocket extends EventEmitter implements SocketLike {
    destroyed = false;
    remoteAddress = '10.0.0.2';
    remotePort = 40000;
    written: Uint8Array[] = [];
    /** When set, writes complete with this error. */
    writeError: Error | null = null;

    write = vi.fn((data: Uint8Array, callback?: (err?: Error | null) => void) => {
        this.written.push(data);
        const err = this.writeError;
        queueMicrotask(() => callback?.(err));
        return true;
    });

    destroy = vi.fn(() => {
        if (this.destroyed) return;
        this.destroyed = true;
        queueMicrotask(() => this.emit('close'));
    });

    // Helper to simulate bytes arriving from the peer
    simulateData(data: Uint8Array) {
        this.emit('data', Buffer.from(data));
    }

    // Helper to simulate the peer going away
    simulateRemoteClose() {
        this.destroyed = true;
        this.emit('close');
    }
}

/**
 * A frame whose header may disagree with its body.
 */
export function rawFrame(body: string | Uint8Array, declaredLength?: number): Uint8Array {
    const bytes = typeof body === 'string' ? new TextEncoder().encode(body) : body;
    const frame = new Uint8Array(4 + bytes.length);
    new DataView(frame.buffer).setUint32(0, declaredLength ?? bytes.length, false);
    frame.set(bytes, 4);
    return frame;
}

export function silentLogger(): Logger {
    const logger = new Logger('test');
    logger.setLogLevel(LogLevel.NONE);
    return logger;
}

export const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 0));
