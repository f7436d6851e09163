/**
 * Transport abstraction used by sync sessions
 */

import { TransportError } from './errors';

/**
 * Ordered, reliable, bidirectional message channel to one peer
 * Implementations reject with any error; sessions wrap it in TransportError
 */
export interface SyncTransport {
    send(message: string): Promise<void>;
    receive(): Promise<string>;
    close?(): void;
}

export interface MemoryTransportOptions {
    /** Pending receives reject after this long (no limit by default) */
    receiveTimeoutMs?: number;
}

/**
 * In-process transport endpoint, created in connected pairs
 */
export interface MemoryTransport extends SyncTransport {
    /** Messages sent by this endpoint so far */
    readonly sent: readonly string[];
    close(): void;
}

type Waiter = {
    resolve: (message: string) => void;
    reject: (error: Error) => void;
    timer?: ReturnType<typeof setTimeout>;
};

/**
 * Create two connected in-memory endpoints
 * A message sent on one is received, in order, on the other
 */
export function createMemoryTransportPair(
    options: MemoryTransportOptions = {},
): [MemoryTransport, MemoryTransport] {
    const queues: [string[], string[]] = [[], []];
    const waiters: [Waiter[], Waiter[]] = [[], []];
    let closed = false;

    const endpoint = (self: 0 | 1): MemoryTransport => {
        const other = self === 0 ? 1 : 0;
        const sent: string[] = [];

        return {
            get sent() {
                return sent;
            },

            async send(message) {
                if (closed) {
                    throw new TransportError('Transport closed');
                }
                sent.push(message);
                const waiter = waiters[other].shift();
                if (waiter) {
                    clearTimeout(waiter.timer);
                    waiter.resolve(message);
                } else {
                    queues[other].push(message);
                }
            },

            receive() {
                const queued = queues[self].shift();
                if (queued !== undefined) {
                    return Promise.resolve(queued);
                }
                if (closed) {
                    return Promise.reject(new TransportError('Transport closed'));
                }
                return new Promise<string>((resolve, reject) => {
                    const waiter: Waiter = { resolve, reject };
                    if (options.receiveTimeoutMs !== undefined) {
                        waiter.timer = setTimeout(() => {
                            const index = waiters[self].indexOf(waiter);
                            if (index >= 0) {
                                waiters[self].splice(index, 1);
                            }
                            reject(new TransportError(`No message within ${options.receiveTimeoutMs}ms`));
                        }, options.receiveTimeoutMs);
                    }
                    waiters[self].push(waiter);
                });
            },

            close() {
                if (closed) {
                    return;
                }
                closed = true;
                for (const pending of [...waiters[0], ...waiters[1]]) {
                    clearTimeout(pending.timer);
                    pending.reject(new TransportError('Transport closed'));
                }
                waiters[0].length = 0;
                waiters[1].length = 0;
            },
        };
    };

    return [endpoint(0), endpoint(1)];
}
