/**
 * Merge/sync protocol
 * Session state machine, convergence, idempotence and failure handling
 */

import { describe, it, expect } from 'vitest';
import {
    CausalityGapError,
    InvalidMutationError,
    ReplicaStore,
    SessionStateError,
    TransportError,
    createMemoryTransportPair,
    createSyncSession,
    encodeFrame,
    synchronize,
    type SessionState,
    type SyncTransport,
    type VersionSummary,
} from '../index';
import { SeededRandom, activeViews, createTestStore, manualClock, silentLogger, syncPair } from './test-helpers';

function tagsByUrl(store: ReplicaStore): Record<string, string[]> {
    return Object.fromEntries(activeViews(store).map((view) => [view.url, view.tags]));
}

describe('Sync protocol', () => {
    describe('Scenarios', () => {
        it('should merge bookmarks created independently on two replicas', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            a.create({ url: 'https://a.example', tags: ['x'] });
            b.create({ url: 'https://b.example', tags: ['y'] });

            const [reportA, reportB] = await syncPair(a, b);

            expect(activeViews(a)).toHaveLength(2);
            expect(activeViews(a)).toEqual(activeViews(b));
            expect(tagsByUrl(a)).toEqual({ 'https://a.example': ['x'], 'https://b.example': ['y'] });
            expect(reportA).toMatchObject({ peer: 'b', sent: 2, applied: 2, verified: true });
            expect(reportB).toMatchObject({ peer: 'a', sent: 2, applied: 2, verified: true });
        });

        it('should resolve concurrent title edits to the later timestamp', async () => {
            const clockA = manualClock(1_000_000);
            const clockB = manualClock(1_000_000);
            const a = createTestStore('a', { now: clockA.now });
            const b = createTestStore('b', { now: clockB.now });
            const id = a.create({ url: 'https://a.example' });
            await syncPair(a, b);

            clockA.set(2_000_000);
            a.mutate(id, { kind: 'SetTitle', title: 'Foo' });
            clockB.set(3_000_000);
            b.mutate(id, { kind: 'SetTitle', title: 'Bar' });
            await syncPair(a, b);

            expect(a.get(id)?.title.value).toBe('Bar');
            expect(b.get(id)?.title.value).toBe('Bar');
        });

        it('should keep a tag re-added concurrently with its removal', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            const id = a.create({ url: 'https://a.example', tags: ['x'] });
            await syncPair(a, b);

            a.mutate(id, { kind: 'RemoveTag', tag: 'x' });
            b.mutate(id, { kind: 'AddTag', tag: 'x' });
            await syncPair(a, b);

            expect(activeViews(a)[0].tags).toEqual(['x']);
            expect(activeViews(b)[0].tags).toEqual(['x']);
            expect(a.get(id)?.tags.adds.x).toEqual(['a:2', 'b:1']);
        });
    });

    describe('Field values', () => {
        it('should sync boundary values that pass local validation', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            const id = a.create({
                url: 'https://edge.example',
                title: '',
                tags: [' ', 'a:b', 'x'],
                metadata: {
                    ' ': '',
                    empty: {},
                    list: [],
                    nested: Object.fromEntries([['keep', true], ['__proto__', 1]]),
                },
            });
            a.mutate(id, { kind: 'RemoveTag', tag: 'x' });
            a.mutate(id, { kind: 'SetMetadataField', key: 'count', value: 0 });

            const [reportA, reportB] = await syncPair(a, b);

            expect(reportA.verified).toBe(true);
            expect(reportB.verified).toBe(true);
            expect(activeViews(b)).toEqual(activeViews(a));
            const [view] = activeViews(b);
            expect(view.title).toBe('');
            expect(view.tags).toEqual([' ', 'a:b']);
            expect(view.metadata).toEqual({ ' ': '', count: 0, empty: {}, list: [], nested: { keep: true } });
        });

        it('should keep syncing after an invalid local edit was refused', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            const id = a.create({ url: 'https://a.example' });
            const refused = [
                () => a.mutate(id, { kind: 'AddTag', tag: '' }),
                () => a.mutate(id, { kind: 'RemoveTag', tag: '' }),
                () => a.mutate(id, { kind: 'SetMetadataField', key: '', value: 'x' }),
            ];
            for (const edit of refused) {
                expect(edit).toThrow(InvalidMutationError);
            }

            const [reportA] = await syncPair(a, b);

            expect(reportA.sent).toBe(1);
            expect(b.summary()).toEqual({ a: 1 });
        });
    });

    describe('Convergence', () => {
        it('should converge for random histories and sync orders', async () => {
            for (const seed of [1, 2, 3, 4, 5, 6]) {
                const rng = new SeededRandom(seed);
                const clocks = [manualClock(), manualClock(), manualClock()];
                const replicas = ['a', 'b', 'c'].map((name, i) => createTestStore(name, { now: clocks[i].now }));

                for (let step = 0; step < 40; step++) {
                    const index = rng.int(replicas.length);
                    const store = replicas[index];
                    clocks[index].advance(rng.int(3) * 1000);
                    const known = Object.keys(store.snapshot().documents);

                    const action = rng.int(8);
                    if (known.length === 0 || action === 0) {
                        store.create({ url: `https://site${rng.int(5)}.example`, tags: [rng.pick(['x', 'y', 'z'])] });
                    } else if (action === 1) {
                        const other = replicas[(index + 1 + rng.int(2)) % replicas.length];
                        await syncPair(store, other);
                    } else {
                        const id = rng.pick(known);
                        switch (action) {
                            case 2:
                                store.mutate(id, { kind: 'SetTitle', title: rng.pick(['one', 'two', null]) });
                                break;
                            case 3:
                                store.mutate(id, { kind: 'AddTag', tag: rng.pick(['x', 'y', 'z']) });
                                break;
                            case 4:
                                store.mutate(id, { kind: 'RemoveTag', tag: rng.pick(['x', 'y', 'z']) });
                                break;
                            case 5:
                                store.mutate(id, { kind: 'SetMetadataField', key: 'k', value: rng.int(10) });
                                break;
                            case 6:
                                store.mutate(id, { kind: 'SetDeleted', deleted: rng.next() < 0.7 });
                                break;
                            default:
                                store.mutate(id, { kind: 'SetEmbedding', embedding: [rng.next(), rng.next()] });
                        }
                    }
                }

                const [a, b, c] = replicas;
                await syncPair(a, b);
                await syncPair(b, c);
                const [final] = await syncPair(a, b);

                expect(final.verified).toBe(true);
                expect(Array.from(a.listActive())).toEqual(Array.from(b.listActive()));
                expect(Array.from(b.listActive())).toEqual(Array.from(c.listActive()));
                expect(a.digest()).toBe(c.digest());
                expect(a.summary()).toEqual(c.summary());
            }
        });

        it('should emit deltas in causal order', async () => {
            const rng = new SeededRandom(42);
            const a = createTestStore('a');
            const b = createTestStore('b');
            for (let i = 0; i < 20; i++) {
                const store = rng.next() < 0.5 ? a : b;
                const known = Object.keys(store.snapshot().documents);
                if (known.length === 0 || rng.next() < 0.3) {
                    store.create({ url: `https://${i}.example`, title: `${i}` });
                } else {
                    store.mutate(rng.pick(known), { kind: 'AddTag', tag: `t${i}` });
                }
                if (rng.next() < 0.3) {
                    await syncPair(a, b);
                }
            }

            const peers: VersionSummary[] = [{}, { a: 2 }, b.summary()];
            for (const peer of peers) {
                const seen = new Set(Object.entries(peer).flatMap(([replica, seq]) =>
                    Array.from({ length: seq }, (_, i) => `${replica}:${i + 1}`)));
                for (const entry of a.deltaSince(peer)) {
                    if (entry.type === 'operation') {
                        for (const dependency of entry.operation.dependencies) {
                            expect(seen.has(`${dependency.replica}:${dependency.seq}`)).toBe(true);
                        }
                        seen.add(`${entry.operation.id.replica}:${entry.operation.id.seq}`);
                    }
                }
            }
        });
    });

    describe('Idempotence', () => {
        it('should apply nothing when syncing converged replicas again', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            a.create({ url: 'https://a.example', tags: ['x'] });
            b.create({ url: 'https://b.example' });
            await syncPair(a, b);
            const snapshot = a.snapshot();

            const [reportA, reportB] = await syncPair(a, b);

            expect(reportA).toMatchObject({ sent: 0, applied: 0, verified: true });
            expect(reportB).toMatchObject({ sent: 0, applied: 0, verified: true });
            expect(a.snapshot()).toBe(snapshot);
        });

        it('should count re-sent entries as duplicates on a full sync', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            a.create({ url: 'https://a.example', title: 'A' });
            await syncPair(a, b);

            const [, reportB] = await syncPair(a, b, { b: { full: true } });

            expect(reportB).toMatchObject({ applied: 0, duplicates: 2, verified: true });
        });
    });

    describe('Session state machine', () => {
        it('should walk through every state once', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            const states: SessionState[] = [];
            const [left, right] = createMemoryTransportPair();

            const session = createSyncSession(a, left, { logger: silentLogger(), onStateChange: (state) => states.push(state) });
            await Promise.all([session.run(), synchronize(b, right, { logger: silentLogger() })]);

            expect(states).toEqual([
                'exchanging-summaries',
                'computing-delta',
                'transmitting-delta',
                'applying-remote-delta',
                'converged',
            ]);
            expect(session.state).toBe('converged');
            await expect(session.run()).rejects.toBeInstanceOf(SessionStateError);
        });

        it('should split deltas into batches', async () => {
            const a = createTestStore('a', { config: { sync: { batchSize: 2 } } });
            const b = createTestStore('b');
            a.create({ url: 'https://a.example', title: 'A', tags: ['x', 'y', 'z'] });
            const [left, right] = createMemoryTransportPair();

            await Promise.all([
                synchronize(a, left, { logger: silentLogger() }),
                synchronize(b, right, { logger: silentLogger() }),
            ]);

            const frames = left.sent.map((message) => JSON.parse(message).type);
            expect(frames).toEqual(['summary', 'delta', 'delta', 'delta', 'end', 'digest']);
            expect(activeViews(b)).toEqual(activeViews(a));
        });

        it('should fail on frames out of protocol order', async () => {
            const b = createTestStore('b');
            const [left, right] = createMemoryTransportPair();
            const session = createSyncSession(b, right, { logger: silentLogger() });
            const outcome = session.run().then(() => null, (caught: unknown) => caught);

            await left.send(encodeFrame({ type: 'end', count: 0 }));

            expect(await outcome).toBeInstanceOf(SessionStateError);
            expect(session.state).toBe('failed');
        });

        it('should report a digest mismatch without failing', async () => {
            const logger = silentLogger();
            const b = createTestStore('b');
            const [left, right] = createMemoryTransportPair();
            const running = synchronize(b, right, { logger });

            await left.send(encodeFrame({ type: 'summary', replica: 'a', summary: {} }));
            await left.send(encodeFrame({ type: 'end', count: 0 }));
            await left.send(encodeFrame({ type: 'digest', summary: {}, digest: 'bogus' }));

            await expect(running).resolves.toMatchObject({ peer: 'a', verified: false });
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });
    });

    describe('Failures', () => {
        it('should fail with a causality gap and recover with a full sync', async () => {
            const a = createTestStore('a');
            const b = createTestStore('b');
            const id = a.create({ url: 'https://a.example', title: 'A' });
            const [, second] = a.deltaSince({});
            const [left, right] = createMemoryTransportPair();
            const outcome = synchronize(b, right, { logger: silentLogger() })
                .then(() => null, (caught: unknown) => caught);

            await left.send(encodeFrame({ type: 'summary', replica: 'a', summary: a.summary() }));
            await left.send(encodeFrame({ type: 'delta', entries: [second] }));
            await left.send(encodeFrame({ type: 'end', count: 1 }));

            const error = await outcome;
            expect(error).toBeInstanceOf(CausalityGapError);
            if (error instanceof CausalityGapError) {
                expect(error.missing).toEqual([{ replica: 'a', seq: 1 }]);
                expect(error.retryable).toBe(true);
            }
            expect(b.get(id)).toBeUndefined();
            expect(b.summary()).toEqual({});

            await syncPair(a, b, { b: { full: true } });
            expect(activeViews(b)).toEqual(activeViews(a));
        });

        it('should keep applied entries after a transport failure and resend only the rest', async () => {
            const a = createTestStore('a', { config: { sync: { batchSize: 1 } } });
            const b = createTestStore('b');
            a.create({ url: 'https://a.example', title: 'A', tags: ['x', 'y'] });

            const [left, right] = createMemoryTransportPair();
            let sends = 0;
            const flaky: SyncTransport = {
                async send(message) {
                    sends += 1;
                    if (sends === 4) {
                        // Let the peer drain what it already received
                        await new Promise((resolve) => setTimeout(resolve, 10));
                        left.close();
                        throw new Error('link down');
                    }
                    await left.send(message);
                },
                receive: () => left.receive(),
            };

            const [resultA, resultB] = await Promise.allSettled([
                synchronize(a, flaky, { logger: silentLogger() }),
                synchronize(b, right, { logger: silentLogger() }),
            ]);

            expect(resultA.status).toBe('rejected');
            expect(resultB.status).toBe('rejected');
            if (resultA.status === 'rejected') {
                expect(resultA.reason).toBeInstanceOf(TransportError);
                expect(resultA.reason.cause).toEqual(new Error('link down'));
            }
            if (resultB.status === 'rejected') {
                expect(resultB.reason).toBeInstanceOf(TransportError);
            }
            expect(b.summary()).toEqual({ a: 2 });

            const [reportA] = await syncPair(a, b);
            expect(reportA.sent).toBe(2);
            expect(activeViews(b)).toEqual(activeViews(a));
        });

        it('should time out when the peer goes silent', async () => {
            const b = createTestStore('b', { config: { sync: { receiveTimeoutMs: 20 } } });
            const [, right] = createMemoryTransportPair();

            await expect(synchronize(b, right, { logger: silentLogger() })).rejects.toBeInstanceOf(TransportError);
        });

        it('should close the transport after a receive timeout', async () => {
            const b = createTestStore('b', { config: { sync: { receiveTimeoutMs: 20 } } });
            const [left, right] = createMemoryTransportPair();

            const error = await synchronize(b, right, { logger: silentLogger() }).then(
                () => null,
                (caught: unknown) => caught,
            );

            expect(error).toBeInstanceOf(TransportError);
            if (error instanceof TransportError) {
                expect(error.message).toBe('No frame within 20ms');
            }
            await expect(left.send('late')).rejects.toThrow('Transport closed');
            await expect(right.receive()).rejects.toThrow('Transport closed');
        });
    });
});
