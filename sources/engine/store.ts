/**
 * Replica store: every bookmark document held by one replica
 *
 * The documents live in one immutable snapshot produced with Immer. Each
 * applied operation swaps the snapshot, so readers always observe a
 * consistent state, and every change is announced synchronously to
 * subscribers in the order it happened.
 */

import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '@noble/hashes/utils';
import { produce } from 'immer';
import { HybridClock } from './clock';
import { resolveConfig, type EngineConfig, type EngineConfigInput } from './config';
import { orSetLiveTags } from './crdt';
import { applyOperation, createDocument, isDeleted, mergeDocuments, type ApplyOutcome } from './document';
import { NotFoundError } from './errors';
import { canonicalJson, compareStrings, createItemId, createReplicaId } from './helpers';
import { DeltaLog, entryId } from './log';
import { parseMutation } from './wire';
import { defaultLogger, type Logger } from './logger';
import type {
    BookmarkDocument,
    Checkpoint,
    ItemId,
    LocalMutation,
    LogEntry,
    Mutation,
    Operation,
    OperationId,
    ReplicaId,
    Timestamp,
    Value,
    Vector,
    VersionSummary,
} from './types';

/**
 * Immutable snapshot of a replica's documents
 */
export interface StoreState {
    /** Live documents, including tombstones not yet compacted */
    documents: Record<ItemId, BookmarkDocument>;
    /** Documents folded into a checkpoint: hidden for good */
    sealed: Record<ItemId, BookmarkDocument>;
    /** Last operation applied to each document */
    heads: Record<ItemId, OperationId>;
}

/**
 * Change notification
 * `document` is null once the document is sealed by a checkpoint
 */
export interface DocumentChange {
    documentId: ItemId;
    document: BookmarkDocument | null;
    origin: 'local' | 'remote' | 'compaction';
}

export type ChangeListener = (change: DocumentChange) => void;

/**
 * Initial fields of a new bookmark
 */
export interface BookmarkInit {
    url: string;
    title?: string | null;
    tags?: string[];
    metadata?: Record<string, Value>;
    embedding?: Vector | null;
}

/**
 * Result of a local mutation: the operation recorded and the value it replaced
 */
export interface MutationReceipt {
    operation: Operation;
    previous: unknown;
}

/**
 * Result of integrating a remote log entry
 */
export type IntegrateResult =
    | { status: 'applied' }
    | { status: 'duplicate' }
    | { status: 'blocked'; missing: OperationId[] };

export interface CompactionReport {
    /** Documents sealed by this pass */
    sealed: ItemId[];
    /** Log entries replaced by checkpoints */
    foldedEntries: number;
}

export interface ReplicaStoreOptions {
    /** Stable identity of this replica (generated when omitted) */
    replicaId?: ReplicaId;
    config?: EngineConfigInput;
    logger?: Logger;
    /** Physical time source for the hybrid clock */
    now?: () => Timestamp;
}

export class ReplicaStore {
    readonly replicaId: ReplicaId;
    readonly config: EngineConfig;
    private readonly clock: HybridClock;
    private readonly log: DeltaLog;
    private readonly logger: Logger;
    private readonly listeners = new Set<ChangeListener>();
    private state: StoreState = { documents: {}, sealed: {}, heads: {} };
    private compactionHolds = 0;

    constructor(options: ReplicaStoreOptions = {}) {
        this.replicaId = options.replicaId ?? createReplicaId();
        this.config = resolveConfig(options.config);
        this.logger = options.logger ?? defaultLogger;
        this.clock = new HybridClock(this.replicaId, {
            now: options.now,
            maxDriftMs: this.config.clock.maxDriftMs,
            logger: this.logger,
        });
        this.log = new DeltaLog(this.replicaId);
    }

    // ========================================================================
    // Reads
    // ========================================================================

    /**
     * Document by id; undefined for unknown and for compacted tombstones
     * Tombstones not yet compacted are returned with `deleted` set
     */
    get(id: ItemId): BookmarkDocument | undefined {
        const documents = this.state.documents;
        return Object.hasOwn(documents, id) ? documents[id] : undefined;
    }

    /**
     * Documents not deleted, ordered by id
     * The returned sequence reads the snapshot taken at call time and can be iterated again
     */
    listActive(): Iterable<BookmarkDocument> {
        const documents = this.state.documents;
        return {
            *[Symbol.iterator]() {
                for (const id of Object.keys(documents).sort(compareStrings)) {
                    const document = documents[id];
                    if (!isDeleted(document)) {
                        yield document;
                    }
                }
            },
        };
    }

    /**
     * Current immutable snapshot
     */
    snapshot(): StoreState {
        return this.state;
    }

    /**
     * Causal frontier of this replica
     */
    summary(): VersionSummary {
        return this.log.summary();
    }

    /**
     * The replica's delta log (read access for persistence and inspection)
     */
    get deltaLog(): DeltaLog {
        return this.log;
    }

    /**
     * SHA-256 over the canonical form of every active document
     * Two replicas that converged report the same digest
     */
    digest(): string {
        const active = Array.from(this.listActive());
        return bytesToHex(sha256(utf8ToBytes(canonicalJson(active))));
    }

    /**
     * Subscribe to change notifications; returns the unsubscribe function
     */
    subscribe(listener: ChangeListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ========================================================================
    // Local mutations
    // ========================================================================

    /**
     * Create a bookmark
     * SetUrl is the creating operation; each initial field follows as its own operation
     * @throws InvalidMutationError when any field fails validation; nothing is recorded then
     */
    create(init: BookmarkInit): ItemId {
        const mutations: Mutation[] = [{ kind: 'SetUrl', url: init.url }];
        if (init.title !== undefined) {
            mutations.push({ kind: 'SetTitle', title: init.title });
        }
        for (const tag of new Set(init.tags ?? [])) {
            mutations.push({ kind: 'AddTag', tag });
        }
        for (const [key, value] of Object.entries(init.metadata ?? {})) {
            mutations.push({ kind: 'SetMetadataField', key, value });
        }
        if (init.embedding !== undefined) {
            mutations.push({ kind: 'SetEmbedding', embedding: init.embedding });
        }

        const valid = mutations.map((mutation) => parseMutation(mutation));
        const id = createItemId();
        for (const mutation of valid) {
            this.commitLocal(id, mutation);
        }
        return id;
    }

    /**
     * Apply a mutation to an existing document
     * @throws NotFoundError when the id is unknown or compacted
     * @throws InvalidMutationError when a peer could not decode the mutation
     */
    mutate(id: ItemId, mutation: LocalMutation): MutationReceipt {
        const document = this.get(id);
        if (!document) {
            throw new NotFoundError(id);
        }
        const full: Mutation = mutation.kind === 'RemoveTag'
            ? { kind: 'RemoveTag', tag: mutation.tag, observed: orSetLiveTags(document.tags, mutation.tag) }
            : mutation;
        return this.commitLocal(id, parseMutation(full));
    }

    /**
     * Mark a document deleted (a tombstone, kept until compaction)
     */
    delete(id: ItemId): MutationReceipt {
        return this.mutate(id, { kind: 'SetDeleted', deleted: true });
    }

    private commitLocal(documentId: ItemId, mutation: Mutation): MutationReceipt {
        const id: OperationId = { replica: this.replicaId, seq: this.log.nextSequence() };
        const dependencies: OperationId[] = [];
        if (id.seq > 1) {
            dependencies.push({ replica: this.replicaId, seq: id.seq - 1 });
        }
        const head = this.state.heads[documentId];
        if (head && head.replica !== this.replicaId) {
            dependencies.push(head);
        }

        const operation: Operation = {
            id,
            timestamp: this.clock.now(),
            documentId,
            mutation,
            dependencies,
        };
        const outcome = this.applyOperationEntry(operation, 'local');
        return { operation, previous: outcome?.previous };
    }

    // ========================================================================
    // Remote entries
    // ========================================================================

    /**
     * Integrate a log entry received from a peer (or replayed from storage)
     * Entries already observed are reported as duplicates and ignored
     */
    integrate(entry: LogEntry): IntegrateResult {
        if (this.log.has(entryId(entry))) {
            return { status: 'duplicate' };
        }

        if (entry.type === 'checkpoint') {
            this.clock.observe(entry.checkpoint.timestamp);
            this.applyCheckpoint(entry.checkpoint);
            return { status: 'applied' };
        }

        const missing = this.log.missingDependencies(entry.operation);
        if (missing.length > 0) {
            return { status: 'blocked', missing };
        }
        this.clock.observe(entry.operation.timestamp);
        this.applyOperationEntry(entry.operation, 'remote');
        return { status: 'applied' };
    }

    /**
     * Log entries the peer has not observed, in causal order
     */
    deltaSince(peer: VersionSummary): LogEntry[] {
        return this.log.deltaSince(peer);
    }

    /**
     * Record a peer's summary as evidence for compaction
     */
    acknowledge(replica: ReplicaId, summary: VersionSummary): void {
        this.log.acknowledge(replica, summary);
    }

    private applyOperationEntry(operation: Operation, origin: DocumentChange['origin']): ApplyOutcome | undefined {
        const documentId = operation.documentId;

        // Sealed documents record the operation but never change again
        if (Object.hasOwn(this.state.sealed, documentId)) {
            this.log.append({ type: 'operation', operation });
            this.maybeCompact();
            return undefined;
        }

        const current = this.get(documentId) ?? createDocument(documentId);
        const outcome = applyOperation(current, operation);
        if (outcome.status === 'passthrough') {
            this.logger.warn(`[store] ${outcome.error.message} (document ${documentId})`);
        }

        this.state = produce(this.state, (draft) => {
            draft.documents[documentId] = outcome.document;
            draft.heads[documentId] = operation.id;
        });
        this.log.append({ type: 'operation', operation });
        this.notify({ documentId, document: this.state.documents[documentId], origin });
        this.maybeCompact();
        return outcome;
    }

    private applyCheckpoint(checkpoint: Checkpoint): void {
        const documentId = checkpoint.documentId;
        const existing = this.get(documentId)
            ?? (Object.hasOwn(this.state.sealed, documentId) ? this.state.sealed[documentId] : undefined);
        const merged = existing ? mergeDocuments(existing, checkpoint.document) : checkpoint.document;
        const wasVisible = this.get(documentId) !== undefined;

        this.seal([[documentId, merged]]);
        this.log.append({ type: 'checkpoint', checkpoint });
        if (wasVisible) {
            this.notify({ documentId, document: null, origin: 'remote' });
        }
        this.maybeCompact();
    }

    private seal(documents: Array<[ItemId, BookmarkDocument]>): void {
        this.state = produce(this.state, (draft) => {
            for (const [documentId, document] of documents) {
                delete draft.documents[documentId];
                draft.sealed[documentId] = document;
            }
        });
    }

    // ========================================================================
    // Compaction
    // ========================================================================

    /**
     * Hold automatic compaction until the returned function is called
     * Explicit compact() calls still run
     */
    suspendCompaction(): () => void {
        this.compactionHolds += 1;
        let released = false;
        return () => {
            if (!released) {
                released = true;
                this.compactionHolds -= 1;
            }
        };
    }

    private maybeCompact(): void {
        if (this.compactionHolds > 0) {
            return;
        }
        if (this.config.compaction.enabled && this.log.shouldCompact(this.config.compaction)) {
            this.compact();
        }
    }

    /**
     * Fold the history of deleted documents into checkpoints
     *
     * A document qualifies once it is deleted and every known replica has
     * acknowledged every entry of its history. The checkpoint keeps the exact
     * merged document; the document is sealed and disappears from reads.
     */
    compact(): CompactionReport {
        const checkpoints: Checkpoint[] = [];
        let foldedEntries = 0;
        let seq = this.log.nextSequence();

        for (const [documentId, entries] of this.log.entriesByDocument()) {
            const live = this.get(documentId);
            const document = live
                ?? (Object.hasOwn(this.state.sealed, documentId) ? this.state.sealed[documentId] : undefined);
            if (!document || (live && !isDeleted(live))) {
                continue;
            }
            if (entries.length === 1 && entries[0].type === 'checkpoint') {
                continue;
            }
            const covers = DeltaLog.coveredIds(entries);
            if (!covers.every((id) => this.log.observedEverywhere(id))) {
                continue;
            }

            checkpoints.push({
                id: { replica: this.replicaId, seq },
                timestamp: this.clock.now(),
                documentId,
                document,
                covers,
            });
            seq += 1;
            foldedEntries += entries.length;
        }

        if (checkpoints.length === 0) {
            this.log.markChecked();
            return { sealed: [], foldedEntries: 0 };
        }

        const newlySealed = checkpoints
            .map((checkpoint) => checkpoint.documentId)
            .filter((documentId) => this.get(documentId) !== undefined);

        this.seal(checkpoints.map((checkpoint) => [checkpoint.documentId, checkpoint.document]));
        this.log.fold(checkpoints);
        this.logger.info(
            `[store] compacted ${foldedEntries} log entries into ${checkpoints.length} checkpoints`,
        );
        for (const documentId of newlySealed) {
            this.notify({ documentId, document: null, origin: 'compaction' });
        }
        return { sealed: newlySealed, foldedEntries };
    }

    private notify(change: DocumentChange): void {
        for (const listener of this.listeners) {
            listener(change);
        }
    }
}
