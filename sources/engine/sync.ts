/**
 * Merge/sync protocol between two replicas
 *
 * Both peers run the same session over one transport:
 *
 *   summary  ->  (each side) delta_since(peer summary)
 *   delta*   ->  batches of log entries, then `end`
 *   digest   ->  summary and content hash after applying
 *
 * Sending never waits on the peer, so both sides can transmit before either
 * starts receiving. Every step is idempotent: a failed session leaves the
 * store consistent and is retried from idle.
 */

import { DeltaApplier } from './applier';
import { EngineError, SessionStateError, TransportError, WireFormatError } from './errors';
import { defaultLogger, type Logger } from './logger';
import type { ReplicaPersistence } from './storage';
import type { ReplicaStore } from './store';
import type { SyncTransport } from './transport';
import type { LogEntry, ReplicaId, VersionSummary } from './types';
import { decodeFrame, encodeFrame, type SyncFrame } from './wire';

export type SessionState =
    | 'idle'
    | 'exchanging-summaries'
    | 'computing-delta'
    | 'transmitting-delta'
    | 'applying-remote-delta'
    | 'converged'
    | 'failed';

/**
 * Outcome of a converged session
 */
export interface SyncReport {
    peer: ReplicaId;
    /** Log entries sent to the peer */
    sent: number;
    /** Remote entries applied here */
    applied: number;
    /** Remote entries already known here */
    duplicates: number;
    /** Both sides ended with the same active-document digest */
    verified: boolean;
    /** Frontier after the session */
    summary: VersionSummary;
}

export interface SyncSessionOptions {
    /** Advertise an empty summary so the peer re-sends everything */
    full?: boolean;
    /** Saved after every applied entry */
    persistence?: ReplicaPersistence;
    logger?: Logger;
    onStateChange?: (state: SessionState) => void;
}

export interface SyncSession {
    readonly state: SessionState;
    /** Error that failed the session */
    readonly error: Error | undefined;
    /**
     * Run the session to convergence
     * A session runs once; create a new one to retry
     */
    run(): Promise<SyncReport>;
}

function isFrame<T extends SyncFrame['type']>(frame: SyncFrame, type: T): frame is Extract<SyncFrame, { type: T }> {
    return frame.type === type;
}

/**
 * Create a session between `store` and the peer behind `transport`
 */
export function createSyncSession(
    store: ReplicaStore,
    transport: SyncTransport,
    options: SyncSessionOptions = {},
): SyncSession {
    const logger = options.logger ?? defaultLogger;
    const { batchSize, receiveTimeoutMs } = store.config.sync;

    let state: SessionState = 'idle';
    let failure: Error | undefined;

    const transition = (next: SessionState) => {
        logger.debug(`[sync] ${store.replicaId}: ${state} -> ${next}`);
        state = next;
        options.onStateChange?.(next);
    };

    // ========================================================================
    // Transport wrappers
    // ========================================================================

    const send = async (frame: SyncFrame): Promise<void> => {
        try {
            await transport.send(encodeFrame(frame));
        } catch (error) {
            throw error instanceof TransportError ? error : new TransportError('Send failed', error);
        }
    };

    // A receive abandoned on timeout would swallow the next frame; the
    // transport is closed instead
    const receive = async (): Promise<SyncFrame> => {
        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(new TransportError(`No frame within ${receiveTimeoutMs}ms`));
                transport.close?.();
            }, receiveTimeoutMs);
        });
        let message: string;
        try {
            message = await Promise.race([transport.receive(), timeout]);
        } catch (error) {
            throw error instanceof TransportError ? error : new TransportError('Receive failed', error);
        } finally {
            clearTimeout(timer);
        }
        return decodeFrame(message);
    };

    const expect = <T extends SyncFrame['type']>(frame: SyncFrame, type: T): Extract<SyncFrame, { type: T }> => {
        if (!isFrame(frame, type)) {
            throw new SessionStateError(`Expected ${type} frame, received ${frame.type}`);
        }
        return frame;
    };

    // ========================================================================
    // Protocol
    // ========================================================================

    const exchangeSummaries = async (): Promise<{ peer: ReplicaId; summary: VersionSummary }> => {
        transition('exchanging-summaries');
        const advertised = options.full ? {} : store.summary();
        await send({ type: 'summary', replica: store.replicaId, summary: advertised });
        const frame = expect(await receive(), 'summary');
        store.acknowledge(frame.replica, frame.summary);
        return { peer: frame.replica, summary: frame.summary };
    };

    const transmit = async (delta: LogEntry[]): Promise<void> => {
        transition('transmitting-delta');
        for (let start = 0; start < delta.length; start += batchSize) {
            await send({ type: 'delta', entries: delta.slice(start, start + batchSize) });
        }
        await send({ type: 'end', count: delta.length });
    };

    const applyRemote = async (): Promise<DeltaApplier> => {
        transition('applying-remote-delta');
        const persistence = options.persistence;
        const applier = new DeltaApplier(store, {
            afterApply: persistence ? () => persistence.save(store) : undefined,
        });

        let received = 0;
        for (;;) {
            const frame = await receive();
            if (frame.type === 'end') {
                if (frame.count !== received) {
                    throw new WireFormatError(`Peer announced ${frame.count} entries but sent ${received}`);
                }
                break;
            }
            const { entries } = expect(frame, 'delta');
            received += entries.length;
            await applier.pushAll(entries);
        }
        applier.finish();
        return applier;
    };

    const verify = async (peer: ReplicaId): Promise<boolean> => {
        const digest = store.digest();
        await send({ type: 'digest', summary: store.summary(), digest });
        const frame = expect(await receive(), 'digest');
        store.acknowledge(peer, frame.summary);
        if (frame.digest !== digest) {
            logger.warn(`[sync] ${store.replicaId}: digest differs from ${peer} after applying deltas`);
            return false;
        }
        return true;
    };

    return {
        get state() {
            return state;
        },

        get error() {
            return failure;
        },

        async run() {
            if (state !== 'idle') {
                throw new SessionStateError(`Session already ${state}`);
            }
            try {
                const { peer, summary } = await exchangeSummaries();

                transition('computing-delta');
                const delta = store.deltaSince(summary);

                await transmit(delta);
                const applier = await applyRemote();
                if (options.persistence) {
                    await options.persistence.save(store);
                }

                const verified = await verify(peer);
                transition('converged');
                return {
                    peer,
                    sent: delta.length,
                    applied: applier.applied,
                    duplicates: applier.duplicates,
                    verified,
                    summary: store.summary(),
                };
            } catch (error) {
                failure = error instanceof Error ? error : new Error(String(error));
                const code = error instanceof EngineError ? error.code : 'UNEXPECTED';
                logger.warn(`[sync] ${store.replicaId}: session failed (${code}): ${failure.message}`);
                transition('failed');
                throw error;
            }
        },
    };
}

/**
 * Run one session to convergence
 */
export function synchronize(
    store: ReplicaStore,
    transport: SyncTransport,
    options: SyncSessionOptions = {},
): Promise<SyncReport> {
    return createSyncSession(store, transport, options).run();
}
