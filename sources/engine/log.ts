/**
 * Delta log: append-only record of operations and checkpoints
 *
 * The log owns the replica's causal frontier (its VersionSummary), the
 * summaries peers have acknowledged, and the bookkeeping that decides when a
 * deleted document's history may be folded into a checkpoint.
 */

import { summaryCovers } from './clock';
import { compareOperationIds, getEntry, operationKey, setEntry } from './helpers';
import type { Checkpoint, ItemId, LogEntry, Operation, OperationId, ReplicaId, VersionSummary } from './types';

/**
 * Identity shared by operations and checkpoints
 */
export function entryId(entry: LogEntry): OperationId {
    return entry.type === 'operation' ? entry.operation.id : entry.checkpoint.id;
}

export function entryDocumentId(entry: LogEntry): ItemId {
    return entry.type === 'operation' ? entry.operation.documentId : entry.checkpoint.documentId;
}

/**
 * Ids an entry makes known when applied: itself, plus everything a checkpoint folded
 */
export function entryCoveredIds(entry: LogEntry): OperationId[] {
    return entry.type === 'operation'
        ? [entry.operation.id]
        : [entry.checkpoint.id, ...entry.checkpoint.covers];
}

export interface CompactionThresholds {
    maxLogEntries: number;
    checkpointInterval: number;
}

export class DeltaLog {
    private entries: LogEntry[] = [];
    private frontier: VersionSummary = {};
    // counters observed past the frontier (delivered inside checkpoints)
    private ahead = new Map<ReplicaId, Set<number>>();
    private acknowledgements = new Map<ReplicaId, VersionSummary>();
    private appendedSinceCheckpoint = 0;
    private generationCounter = 0;

    constructor(readonly owner: ReplicaId) {}

    /**
     * Number of entries currently held
     */
    get size(): number {
        return this.entries.length;
    }

    /**
     * Incremented whenever compaction rewrites the log
     */
    get generation(): number {
        return this.generationCounter;
    }

    /**
     * Snapshot of the entries in log order
     */
    read(): readonly LogEntry[] {
        return [...this.entries];
    }

    /**
     * Entries appended at or after `position` in the current generation
     */
    readFrom(position: number): readonly LogEntry[] {
        return this.entries.slice(position);
    }

    /**
     * Copy of the causal frontier
     */
    summary(): VersionSummary {
        return { ...this.frontier };
    }

    /**
     * Counter the next local entry must use
     */
    nextSequence(): number {
        return (getEntry(this.frontier, this.owner) ?? 0) + 1;
    }

    /**
     * Whether an operation (or checkpoint) with this id was already observed
     */
    has(id: OperationId): boolean {
        return summaryCovers(this.frontier, id) || (this.ahead.get(id.replica)?.has(id.seq) ?? false);
    }

    /**
     * Dependencies of an operation not yet observed
     */
    missingDependencies(operation: Operation): OperationId[] {
        return operation.dependencies.filter((dependency) => !this.has(dependency));
    }

    /**
     * Record an entry; callers apply it to the documents before appending
     */
    append(entry: LogEntry): void {
        this.entries.push(entry);
        this.appendedSinceCheckpoint += 1;
        for (const id of entryCoveredIds(entry)) {
            this.observe(id);
        }
    }

    private observe(id: OperationId): void {
        if (this.has(id)) {
            return;
        }
        const frontier = getEntry(this.frontier, id.replica) ?? 0;
        if (id.seq !== frontier + 1) {
            const pending = this.ahead.get(id.replica) ?? new Set<number>();
            pending.add(id.seq);
            this.ahead.set(id.replica, pending);
            return;
        }

        // Advance the frontier, then absorb counters that were waiting for it
        let next = id.seq;
        const pending = this.ahead.get(id.replica);
        while (pending?.has(next + 1)) {
            pending.delete(next + 1);
            next += 1;
        }
        if (pending && pending.size === 0) {
            this.ahead.delete(id.replica);
        }
        setEntry(this.frontier, id.replica, next);
    }

    /**
     * Entries the peer has not observed, in causal order
     *
     * Checkpoints come first: they are merged as state and carry no
     * dependencies. Operations follow in log order, which is the order they
     * were applied here, so every dependency is either known to the peer or
     * emitted earlier in the sequence.
     */
    deltaSince(peer: VersionSummary): LogEntry[] {
        const checkpoints: LogEntry[] = [];
        const operations: LogEntry[] = [];
        for (const entry of this.entries) {
            const unseen = entryCoveredIds(entry).some((id) => !summaryCovers(peer, id));
            if (!unseen) {
                continue;
            }
            if (entry.type === 'checkpoint') {
                checkpoints.push(entry);
            } else {
                operations.push(entry);
            }
        }
        return [...checkpoints, ...operations];
    }

    // ========================================================================
    // Acknowledgements and compaction
    // ========================================================================

    /**
     * Record what a peer has observed; acknowledgements only grow
     */
    acknowledge(replica: ReplicaId, summary: VersionSummary): void {
        if (replica === this.owner) {
            return;
        }
        const known = this.acknowledgements.get(replica) ?? {};
        const merged: VersionSummary = { ...known };
        for (const [author, seq] of Object.entries(summary)) {
            setEntry(merged, author, Math.max(getEntry(merged, author) ?? 0, seq));
        }
        this.acknowledgements.set(replica, merged);
    }

    /**
     * Copy of every acknowledged peer summary
     */
    acknowledged(): Record<ReplicaId, VersionSummary> {
        const out: Record<ReplicaId, VersionSummary> = {};
        for (const [replica, summary] of this.acknowledgements) {
            setEntry(out, replica, { ...summary });
        }
        return out;
    }

    /**
     * Replicas whose observation must be proven before history is dropped:
     * every author in the frontier and every acknowledged peer, except this one
     */
    knownReplicas(): ReplicaId[] {
        const replicas = new Set<ReplicaId>([...Object.keys(this.frontier), ...this.acknowledgements.keys()]);
        replicas.delete(this.owner);
        return [...replicas].sort();
    }

    /**
     * Whether every known replica has acknowledged the given id
     */
    observedEverywhere(id: OperationId): boolean {
        return this.knownReplicas().every((replica) => {
            const acknowledged = this.acknowledgements.get(replica);
            return acknowledged !== undefined && summaryCovers(acknowledged, id);
        });
    }

    shouldCompact(thresholds: CompactionThresholds): boolean {
        return this.entries.length > thresholds.maxLogEntries
            || this.appendedSinceCheckpoint >= thresholds.checkpointInterval;
    }

    /**
     * Entries grouped by document, in log order
     */
    entriesByDocument(): Map<ItemId, LogEntry[]> {
        const grouped = new Map<ItemId, LogEntry[]>();
        for (const entry of this.entries) {
            const documentId = entryDocumentId(entry);
            const list = grouped.get(documentId) ?? [];
            list.push(entry);
            grouped.set(documentId, list);
        }
        return grouped;
    }

    /**
     * Replace the given entries with checkpoints
     * Each checkpoint takes the position of the first entry it folds
     */
    fold(checkpoints: Checkpoint[]): void {
        const folded = new Map<string, Checkpoint>();
        for (const checkpoint of checkpoints) {
            for (const id of checkpoint.covers) {
                folded.set(operationKey(id), checkpoint);
            }
        }

        const placed = new Set<Checkpoint>();
        const rewritten: LogEntry[] = [];
        for (const entry of this.entries) {
            const checkpoint = folded.get(operationKey(entryId(entry)));
            if (!checkpoint) {
                rewritten.push(entry);
                continue;
            }
            if (!placed.has(checkpoint)) {
                placed.add(checkpoint);
                rewritten.push({ type: 'checkpoint', checkpoint });
            }
        }

        this.entries = rewritten;
        for (const checkpoint of checkpoints) {
            this.observe(checkpoint.id);
        }
        this.appendedSinceCheckpoint = 0;
        this.generationCounter += 1;
    }

    /**
     * Reset the trigger counter after a compaction pass that folded nothing
     */
    markChecked(): void {
        this.appendedSinceCheckpoint = 0;
    }

    /**
     * Sorted ids of everything an entry list covers
     */
    static coveredIds(entries: readonly LogEntry[]): OperationId[] {
        return entries.flatMap(entryCoveredIds).sort(compareOperationIds);
    }
}
