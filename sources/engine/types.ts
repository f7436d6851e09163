/**
 * Core types for the bookmark sync engine
 */

// ============================================================================
// Identity
// ============================================================================

/**
 * Globally unique identifier of a bookmark document
 * CUID2 format, assigned once at creation and never reused
 */
export type ItemId = string;

/**
 * Stable identifier of a synchronizing device
 * Must not contain ':' (it separates replica and counter in operation keys)
 */
export type ReplicaId = string;

/**
 * Physical time in milliseconds since epoch
 */
export type Timestamp = number;

// ============================================================================
// Causality
// ============================================================================

/**
 * Hybrid logical clock reading
 * Ordered by (wall, logical) with the replica as the final tiebreaker,
 * so two readings from different writes never compare equal
 */
export interface HybridTimestamp {
    /** Physical-time hint (ms since epoch) */
    wall: Timestamp;
    /** Logical counter disambiguating readings within the same wall time */
    logical: number;
    /** Replica that produced this reading */
    replica: ReplicaId;
}

/**
 * Identity of an operation: the authoring replica plus its per-replica counter
 */
export interface OperationId {
    replica: ReplicaId;
    /** Strictly increasing and gap-free per replica, starting at 1 */
    seq: number;
}

/**
 * Causal frontier: for every replica, the highest counter up to which
 * all of its operations have been observed
 */
export type VersionSummary = Record<ReplicaId, number>;

// ============================================================================
// Values
// ============================================================================

/**
 * Closed metadata value variant
 */
export type Value = string | number | boolean | null | Value[] | { [key: string]: Value };

/**
 * Fixed-length embedding vector
 */
export type Vector = number[];

// ============================================================================
// CRDT Value Types
// ============================================================================

/**
 * Last-writer-wins register
 */
export interface LWWRegister<T> {
    value: T;
    timestamp: HybridTimestamp;
}

/**
 * Observed-remove set over string elements
 * Every add is tagged with a unique tag; removes tombstone the tags they observed
 */
export interface ORSet {
    /** element -> sorted add-tags */
    adds: Record<string, string[]>;
    /** sorted remove-tags */
    removes: string[];
}

/**
 * Last-writer-wins map: every key behaves as an independent register
 */
export type LWWMap<V> = Record<string, LWWRegister<V>>;

// ============================================================================
// Bookmark Document
// ============================================================================

/**
 * Composite CRDT holding the mutable state of one bookmark
 */
export interface BookmarkDocument {
    id: ItemId;
    url: LWWRegister<string>;
    title: LWWRegister<string | null>;
    tags: ORSet;
    metadata: LWWMap<Value>;
    deleted: LWWRegister<boolean>;
    embedding: LWWRegister<Vector | null>;
    /** Greatest physical time of any applied operation (max-register) */
    updatedAt: Timestamp;
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Mutation carried by an operation
 *
 * `Unknown` holds a mutation kind produced by a newer version of the engine;
 * its raw payload is kept verbatim so it round-trips through the wire format
 */
export type Mutation =
    | { kind: 'SetUrl'; url: string }
    | { kind: 'SetTitle'; title: string | null }
    | { kind: 'AddTag'; tag: string }
    | { kind: 'RemoveTag'; tag: string; observed: string[] }
    | { kind: 'SetMetadataField'; key: string; value: Value }
    | { kind: 'SetDeleted'; deleted: boolean }
    | { kind: 'SetEmbedding'; embedding: Vector | null }
    | { kind: 'Unknown'; type: string; payload: { [key: string]: Value } };

export type MutationKind = Mutation['kind'];

/**
 * Mutation as requested by a local caller
 * RemoveTag does not name observed tags: the store fills them in
 */
export type LocalMutation =
    | Exclude<Mutation, { kind: 'RemoveTag' } | { kind: 'Unknown' }>
    | { kind: 'RemoveTag'; tag: string };

/**
 * Atomic, immutable mutation record
 */
export interface Operation {
    id: OperationId;
    timestamp: HybridTimestamp;
    documentId: ItemId;
    mutation: Mutation;
    /** Operations that must be applied before this one */
    dependencies: OperationId[];
}

// ============================================================================
// Delta Log
// ============================================================================

/**
 * Folded history of one document
 *
 * A checkpoint consumes a counter of the replica that compacted, carries the
 * exact merged document, and lists every entry it replaced
 */
export interface Checkpoint {
    id: OperationId;
    timestamp: HybridTimestamp;
    documentId: ItemId;
    document: BookmarkDocument;
    covers: OperationId[];
}

/**
 * Entry of the append-only delta log
 */
export type LogEntry =
    | { type: 'operation'; operation: Operation }
    | { type: 'checkpoint'; checkpoint: Checkpoint };
