/**
 * Durable replica state on top of a key-value storage collaborator
 *
 * Layout:
 *   log/<generation>/<index>   one encoded log entry per key
 *   meta                       replica id, generation, entry count, acknowledgements
 *
 * `meta` is written last, so a crash mid-save leaves the previous state
 * readable. Compaction starts a new generation; the old one is removed once
 * the new meta is in place.
 */

import { z } from 'zod';
import { DeltaApplier } from './applier';
import { StorageFailureError, WireFormatError } from './errors';
import { defaultLogger, type Logger } from './logger';
import { ReplicaStore, type ReplicaStoreOptions } from './store';
import { decodeEntry, encodeEntry, replicaIdSchema, summarySchema } from './wire';

/**
 * Storage collaborator: string keys, string values, prefix scans
 */
export interface KeyValueStorage {
    get(key: string): Promise<string | undefined>;
    put(key: string, value: string): Promise<void>;
    delete(key: string): Promise<void>;
    /** Entries whose key starts with `prefix`, sorted by key */
    scan(prefix: string): Promise<Array<[string, string]>>;
}

/**
 * Map-backed storage for tests and ephemeral replicas
 */
export class MemoryStorage implements KeyValueStorage {
    private readonly data = new Map<string, string>();

    async get(key: string): Promise<string | undefined> {
        return this.data.get(key);
    }

    async put(key: string, value: string): Promise<void> {
        this.data.set(key, value);
    }

    async delete(key: string): Promise<void> {
        this.data.delete(key);
    }

    async scan(prefix: string): Promise<Array<[string, string]>> {
        return [...this.data.entries()]
            .filter(([key]) => key.startsWith(prefix))
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    }

    keys(): string[] {
        return [...this.data.keys()].sort();
    }
}

const META_KEY = 'meta';

const metaSchema = z.object({
    version: z.literal(1),
    replicaId: replicaIdSchema,
    generation: z.number().int().nonnegative(),
    length: z.number().int().nonnegative(),
    acknowledged: z.record(summarySchema),
});

type PersistedMeta = z.infer<typeof metaSchema>;

function logPrefix(generation: number): string {
    return `log/${generation}/`;
}

function logKey(generation: number, index: number): string {
    return `${logPrefix(generation)}${String(index).padStart(10, '0')}`;
}

export interface ReplicaPersistenceOptions {
    logger?: Logger;
}

/**
 * Saves a replica's log incrementally and restores replicas from it
 */
export class ReplicaPersistence {
    private readonly logger: Logger;
    private written = 0;
    private writtenGeneration: number | undefined;
    // storage generation matching the store's generation 0
    private generationBase = 0;

    constructor(
        private readonly storage: KeyValueStorage,
        options: ReplicaPersistenceOptions = {},
    ) {
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Write everything appended since the last save
     * @throws StorageFailureError when the storage rejects a write
     */
    async save(store: ReplicaStore): Promise<void> {
        const log = store.deltaLog;
        const generation = this.generationBase + log.generation;
        const previousGeneration = this.writtenGeneration;
        const from = previousGeneration === generation ? this.written : 0;

        const entries = log.readFrom(from);
        for (let i = 0; i < entries.length; i++) {
            await this.put(logKey(generation, from + i), encodeEntry(entries[i]));
        }

        const meta: PersistedMeta = {
            version: 1,
            replicaId: store.replicaId,
            generation,
            length: from + entries.length,
            acknowledged: log.acknowledged(),
        };
        await this.put(META_KEY, JSON.stringify(meta));

        this.written = meta.length;
        this.writtenGeneration = generation;

        if (previousGeneration !== undefined && previousGeneration !== generation) {
            await this.dropGeneration(previousGeneration);
        }
    }

    /**
     * Rebuild the replica saved in storage, or undefined when nothing was saved
     * @throws StorageFailureError when the storage rejects a read
     * @throws WireFormatError when stored data does not decode
     */
    async load(options: Omit<ReplicaStoreOptions, 'replicaId'> = {}): Promise<ReplicaStore | undefined> {
        const raw = await this.read(META_KEY);
        if (raw === undefined) {
            return undefined;
        }
        const meta = this.parseMeta(raw);

        const store = new ReplicaStore({ ...options, replicaId: meta.replicaId });
        const stored = await this.scan(logPrefix(meta.generation));

        // Checkpoint ids come from the log counter, which is still behind
        // the stored entries until the replay ends
        const resume = store.suspendCompaction();
        try {
            const applier = new DeltaApplier(store);
            for (const [, encoded] of stored.slice(0, meta.length)) {
                await applier.push(decodeEntry(encoded));
            }
            applier.finish();

            for (const [replica, summary] of Object.entries(meta.acknowledged)) {
                store.acknowledge(replica, summary);
            }
        } finally {
            resume();
        }

        this.generationBase = meta.generation;
        this.writtenGeneration = meta.generation;
        this.written = store.deltaLog.size === meta.length ? meta.length : 0;
        this.logger.info(`[storage] restored replica ${meta.replicaId} with ${meta.length} log entries`);
        return store;
    }

    private parseMeta(raw: string): PersistedMeta {
        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new WireFormatError(`Stored meta is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
        }
        const parsed = metaSchema.safeParse(json);
        if (!parsed.success) {
            throw new WireFormatError('Invalid stored meta', parsed.error.issues);
        }
        return parsed.data;
    }

    private async dropGeneration(generation: number): Promise<void> {
        for (const [key] of await this.scan(logPrefix(generation))) {
            try {
                await this.storage.delete(key);
            } catch (error) {
                throw new StorageFailureError(key, error);
            }
        }
    }

    private async put(key: string, value: string): Promise<void> {
        try {
            await this.storage.put(key, value);
        } catch (error) {
            throw new StorageFailureError(key, error);
        }
    }

    private async read(key: string): Promise<string | undefined> {
        try {
            return await this.storage.get(key);
        } catch (error) {
            throw new StorageFailureError(key, error);
        }
    }

    private async scan(prefix: string): Promise<Array<[string, string]>> {
        try {
            return await this.storage.scan(prefix);
        } catch (error) {
            throw new StorageFailureError(prefix, error);
        }
    }
}
