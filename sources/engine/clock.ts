/**
 * Causality clock: hybrid logical clock plus version summary helpers
 */

import { compareStrings, getEntry, setEntry } from './helpers';
import { defaultLogger, type Logger } from './logger';
import type { HybridTimestamp, OperationId, ReplicaId, Timestamp, VersionSummary } from './types';

/**
 * Bottom element of the timestamp order: loses against every real reading
 */
export const ZERO_TIMESTAMP: HybridTimestamp = Object.freeze({ wall: 0, logical: 0, replica: '' });

/**
 * Total order on hybrid timestamps: wall, then logical, then replica
 */
export function compareTimestamps(a: HybridTimestamp, b: HybridTimestamp): number {
    if (a.wall !== b.wall) {
        return a.wall - b.wall;
    }
    if (a.logical !== b.logical) {
        return a.logical - b.logical;
    }
    return compareStrings(a.replica, b.replica);
}

export interface HybridClockOptions {
    /** Physical time source (defaults to Date.now) */
    now?: () => Timestamp;
    /** Remote readings further ahead of local physical time are logged */
    maxDriftMs?: number;
    logger?: Logger;
}

/**
 * Hybrid logical clock for one replica
 *
 * Readings never go backwards even if the physical clock does, and observing
 * a remote reading moves the clock past it.
 */
export class HybridClock {
    readonly replica: ReplicaId;
    private wall: Timestamp = 0;
    private logical = 0;
    private readonly physicalNow: () => Timestamp;
    private readonly maxDriftMs: number;
    private readonly logger: Logger;

    constructor(replica: ReplicaId, options: HybridClockOptions = {}) {
        this.replica = replica;
        this.physicalNow = options.now ?? Date.now;
        this.maxDriftMs = options.maxDriftMs ?? Number.POSITIVE_INFINITY;
        this.logger = options.logger ?? defaultLogger;
    }

    /**
     * Latest reading, without advancing
     */
    peek(): HybridTimestamp {
        return { wall: this.wall, logical: this.logical, replica: this.replica };
    }

    /**
     * Produce a reading for a local event
     */
    now(): HybridTimestamp {
        const physical = this.physicalNow();
        if (physical > this.wall) {
            this.wall = physical;
            this.logical = 0;
        } else {
            this.logical += 1;
        }
        return this.peek();
    }

    /**
     * Merge a remote reading into the clock
     */
    observe(remote: HybridTimestamp): void {
        const physical = this.physicalNow();
        if (remote.wall - physical > this.maxDriftMs) {
            this.logger.warn(
                `[clock] reading from ${remote.replica} is ${remote.wall - physical}ms ahead of local time`,
            );
        }

        const wall = Math.max(this.wall, remote.wall, physical);
        if (wall === this.wall && wall === remote.wall) {
            this.logical = Math.max(this.logical, remote.logical) + 1;
        } else if (wall === this.wall) {
            this.logical += 1;
        } else if (wall === remote.wall) {
            this.logical = remote.logical + 1;
        } else {
            this.logical = 0;
        }
        this.wall = wall;
    }
}

// ============================================================================
// Version summaries
// ============================================================================

/**
 * Whether the summary covers the given operation
 */
export function summaryCovers(summary: VersionSummary, id: OperationId): boolean {
    return (getEntry(summary, id.replica) ?? 0) >= id.seq;
}

/**
 * Pointwise maximum of two summaries
 */
export function mergeSummaries(a: VersionSummary, b: VersionSummary): VersionSummary {
    const out: VersionSummary = { ...a };
    for (const [replica, seq] of Object.entries(b)) {
        setEntry(out, replica, Math.max(getEntry(out, replica) ?? 0, seq));
    }
    return out;
}

/**
 * Whether `a` has observed everything `b` has
 */
export function summaryDominates(a: VersionSummary, b: VersionSummary): boolean {
    return Object.entries(b).every(([replica, seq]) => (getEntry(a, replica) ?? 0) >= seq);
}
