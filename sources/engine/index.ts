/**
 * Sync Engine - Export all public APIs
 */

// Types
export type {
    ItemId,
    ReplicaId,
    Timestamp,
    HybridTimestamp,
    OperationId,
    VersionSummary,
    Value,
    Vector,
    LWWRegister,
    ORSet,
    LWWMap,
    BookmarkDocument,
    Mutation,
    MutationKind,
    LocalMutation,
    Operation,
    Checkpoint,
    LogEntry,
} from './types';

// Identifiers
export { createItemId, createReplicaId, operationKey, canonicalJson } from './helpers';

// Causality
export { HybridClock, ZERO_TIMESTAMP, compareTimestamps, summaryCovers, mergeSummaries, summaryDominates } from './clock';
export type { HybridClockOptions } from './clock';

// CRDT value types
export {
    createRegister,
    registerSet,
    registerMerge,
    createORSet,
    orSetAdd,
    orSetRemove,
    orSetMerge,
    orSetHas,
    orSetValues,
    orSetLiveTags,
    mapGet,
    mapSet,
    mapMerge,
    mapEntries,
} from './crdt';
export type { Applied } from './crdt';

// Bookmark document
export { createDocument, applyOperation, mergeDocuments, isDeleted, viewDocument, UNKNOWN_FIELD_PREFIX } from './document';
export type { ApplyOutcome, BookmarkView } from './document';

// Replica store and delta log
export { ReplicaStore } from './store';
export type {
    StoreState,
    DocumentChange,
    ChangeListener,
    BookmarkInit,
    MutationReceipt,
    IntegrateResult,
    CompactionReport,
    ReplicaStoreOptions,
} from './store';
export { DeltaLog, entryId, entryDocumentId } from './log';
export { DeltaApplier } from './applier';
export type { DeltaApplierOptions } from './applier';

// Sync protocol
export { createSyncSession, synchronize } from './sync';
export type { SessionState, SyncReport, SyncSession, SyncSessionOptions } from './sync';
export { createMemoryTransportPair } from './transport';
export type { SyncTransport, MemoryTransport, MemoryTransportOptions } from './transport';
export {
    WIRE_VERSION,
    encodeOperation,
    decodeOperation,
    encodeEntry,
    decodeEntry,
    encodeSummary,
    decodeSummary,
    encodeFrame,
    decodeFrame,
    parseMutation,
} from './wire';
export type { SyncFrame } from './wire';

// Storage
export { MemoryStorage, ReplicaPersistence } from './storage';
export type { KeyValueStorage, ReplicaPersistenceOptions } from './storage';

// Configuration, errors and logging
export { resolveConfig, loadConfig, engineConfigSchema } from './config';
export type { EngineConfig, EngineConfigInput, SearchWeights } from './config';
export {
    EngineError,
    NotFoundError,
    InvalidMutationError,
    UnknownFieldError,
    CausalityGapError,
    StorageFailureError,
    FatalMismatchError,
    TransportError,
    WireFormatError,
    SessionStateError,
} from './errors';
export type { EngineErrorCode } from './errors';
export { defaultLogger } from './logger';
export type { Logger } from './logger';
