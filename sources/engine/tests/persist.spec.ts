/**
 * Persistence
 * Incremental saves, generations after compaction and restore
 */

import { describe, it, expect } from 'vitest';
import {
    MemoryStorage,
    ReplicaPersistence,
    StorageFailureError,
    WireFormatError,
    type KeyValueStorage,
} from '../index';
import { activeViews, createTestStore, silentLogger, syncPair } from './test-helpers';

function createPersistence(storage: KeyValueStorage): ReplicaPersistence {
    return new ReplicaPersistence(storage, { logger: silentLogger() });
}

describe('ReplicaPersistence', () => {
    it('should restore a saved replica', async () => {
        const storage = new MemoryStorage();
        const store = createTestStore('r1');
        const id = store.create({ url: 'https://a.example', title: 'A', tags: ['x'] });
        store.mutate(id, { kind: 'SetMetadataField', key: 'rating', value: 3 });
        await createPersistence(storage).save(store);

        const restored = await createPersistence(storage).load({ logger: silentLogger() });

        expect(restored?.replicaId).toBe('r1');
        expect(restored?.summary()).toEqual({ r1: 4 });
        expect(restored && activeViews(restored)).toEqual(activeViews(store));
        expect(restored?.digest()).toBe(store.digest());
    });

    it('should write only new entries on each save', async () => {
        const storage = new MemoryStorage();
        const persistence = createPersistence(storage);
        const store = createTestStore('r1');
        const id = store.create({ url: 'https://a.example' });
        await persistence.save(store);
        expect(storage.keys()).toEqual(['log/0/0000000000', 'meta']);

        const written: string[] = [];
        const recording: KeyValueStorage = {
            get: (key) => storage.get(key),
            delete: (key) => storage.delete(key),
            scan: (prefix) => storage.scan(prefix),
            put: async (key, value) => {
                written.push(key);
                await storage.put(key, value);
            },
        };
        const incremental = createPersistence(recording);
        await incremental.save(store);
        written.length = 0;

        store.mutate(id, { kind: 'SetTitle', title: 'A' });
        await incremental.save(store);

        expect(written).toEqual(['log/0/0000000001', 'meta']);
    });

    it('should restore acknowledgements', async () => {
        const storage = new MemoryStorage();
        const a = createTestStore('a');
        const b = createTestStore('b');
        a.create({ url: 'https://a.example' });
        await syncPair(a, b);
        await createPersistence(storage).save(a);

        const restored = await createPersistence(storage).load({ logger: silentLogger() });

        expect(restored?.deltaLog.acknowledged()).toEqual({ b: { a: 1 } });
    });

    it('should start a new generation after compaction and drop the old one', async () => {
        const storage = new MemoryStorage();
        const persistence = createPersistence(storage);
        const store = createTestStore('r1');
        const gone = store.create({ url: 'https://gone.example' });
        store.create({ url: 'https://kept.example' });
        store.delete(gone);
        await persistence.save(store);
        expect(storage.keys()).toEqual(['log/0/0000000000', 'log/0/0000000001', 'log/0/0000000002', 'meta']);

        store.compact();
        await persistence.save(store);

        expect(storage.keys()).toEqual(['log/1/0000000000', 'log/1/0000000001', 'meta']);
        const restored = await createPersistence(storage).load({ logger: silentLogger() });
        expect(restored?.get(gone)).toBeUndefined();
        expect(restored && activeViews(restored)).toEqual(activeViews(store));
        expect(restored?.summary()).toEqual({ r1: 4 });
    });

    it('should keep saving into the restored generation', async () => {
        const storage = new MemoryStorage();
        const store = createTestStore('r1');
        const gone = store.create({ url: 'https://gone.example' });
        store.delete(gone);
        store.compact();
        await createPersistence(storage).save(store);

        const persistence = createPersistence(storage);
        const restored = await persistence.load({ logger: silentLogger() });
        if (!restored) {
            throw new Error('expected a restored replica');
        }
        restored.create({ url: 'https://new.example' });
        await persistence.save(restored);

        expect(storage.keys()).toEqual(['log/1/0000000000', 'log/1/0000000001', 'meta']);
    });

    it('should replay a compacted log without compacting again', async () => {
        const storage = new MemoryStorage();
        const config = { compaction: { checkpointInterval: 3 } };
        const store = createTestStore('r1', { config });
        store.delete(store.create({ url: 'https://x.example' }));
        const y = store.create({ url: 'https://y.example' });
        store.delete(y);
        store.create({ url: 'https://z.example' });
        expect(store.summary()).toEqual({ r1: 6 });
        await createPersistence(storage).save(store);

        const persistence = createPersistence(storage);
        const restored = await persistence.load({ config, logger: silentLogger() });
        if (!restored) {
            throw new Error('expected a restored replica');
        }

        expect(activeViews(restored).map((view) => view.url)).toEqual(['https://z.example']);
        expect(restored.summary()).toEqual({ r1: 6 });
        expect(restored.digest()).toBe(store.digest());
        expect(restored.deltaLog.size).toBe(4);

        // Automatic compaction resumes once the replay is done
        restored.create({ url: 'https://w.example' });
        expect(restored.get(y)).toBeUndefined();
        expect(restored.summary()).toEqual({ r1: 8 });
    });

    it('should return undefined when nothing was saved', async () => {
        await expect(createPersistence(new MemoryStorage()).load()).resolves.toBeUndefined();
    });

    it('should wrap storage failures', async () => {
        const failing: KeyValueStorage = {
            get: async () => undefined,
            delete: async () => undefined,
            scan: async () => [],
            put: async () => {
                throw new Error('disk full');
            },
        };
        const store = createTestStore('r1');
        store.create({ url: 'https://a.example' });

        const error = await createPersistence(failing).save(store).then(() => null, (caught: unknown) => caught);

        expect(error).toBeInstanceOf(StorageFailureError);
        if (error instanceof StorageFailureError) {
            expect(error.key).toBe('log/0/0000000000');
            expect(error.retryable).toBe(true);
            expect(error.cause).toEqual(new Error('disk full'));
        }
    });

    it('should reject corrupt metadata', async () => {
        const storage = new MemoryStorage();
        await storage.put('meta', JSON.stringify({ version: 1, replicaId: 'r1', generation: -1 }));

        await expect(createPersistence(storage).load()).rejects.toBeInstanceOf(WireFormatError);

        await storage.put('meta', '{oops');
        await expect(createPersistence(storage).load()).rejects.toBeInstanceOf(WireFormatError);
    });

    it('should save during a sync session', async () => {
        const storage = new MemoryStorage();
        const persistence = createPersistence(storage);
        const a = createTestStore('a');
        const b = createTestStore('b');
        a.create({ url: 'https://a.example', title: 'A' });

        await syncPair(a, b, { b: { persistence } });

        const restored = await createPersistence(storage).load({ logger: silentLogger() });
        expect(restored?.summary()).toEqual({ a: 2 });
        expect(restored && activeViews(restored)).toEqual(activeViews(a));
    });
});
