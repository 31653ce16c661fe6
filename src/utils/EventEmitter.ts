import { logger } from './Logger';

/**
 * A tiny, type-safe event emitter. Event names and argument tuples are
 * checked at compile time; a throwing listener is logged and does not stop
 * the remaining listeners.
 *
 * @example
 * ```typescript
 * type LinkEvents = { message: [Message]; closed: [CloseReason] };
 * const emitter = new EventEmitter<LinkEvents>();
 * const unsub = emitter.on('message', (msg) => console.log(msg.type));
 * unsub();
 * ```
 */
export class EventEmitter<T extends { [K in keyof T]: unknown[] }> {
    private listeners: { [K in keyof T]?: Set<(...args: T[K]) => void> } = {};

    /**
     * Subscribe to an event.
     * @returns Unsubscribe function
     */
    on<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        let handlers = this.listeners[event];
        if (!handlers) {
            handlers = new Set();
            this.listeners[event] = handlers;
        }
        handlers.add(handler);
        return () => this.off(event, handler);
    }

    off<K extends keyof T>(event: K, handler: (...args: T[K]) => void): void {
        this.listeners[event]?.delete(handler);
    }

    emit<K extends keyof T>(event: K, ...args: T[K]): void {
        const handlers = this.listeners[event];
        if (!handlers) return;

        for (const handler of Array.from(handlers)) {
            try {
                handler(...args);
            } catch (err) {
                logger.error(`Error in listener for ${String(event)}:`, err);
            }
        }
    }

    once<K extends keyof T>(event: K, handler: (...args: T[K]) => void): () => void {
        const wrapper = (...args: T[K]) => {
            this.off(event, wrapper);
            handler(...args);
        };
        return this.on(event, wrapper);
    }

    listenerCount<K extends keyof T>(event: K): number {
        return this.listeners[event]?.size ?? 0;
    }

    removeAllListeners(): void {
        this.listeners = {};
    }
}
