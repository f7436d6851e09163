/**
 * Error taxonomy for the sync engine
 */

import type { z } from 'zod';
import type { ItemId, OperationId } from './types';

export type EngineErrorCode =
    | 'NOT_FOUND'
    | 'INVALID_MUTATION'
    | 'UNKNOWN_FIELD'
    | 'CAUSALITY_GAP'
    | 'STORAGE_FAILURE'
    | 'FATAL_MISMATCH'
    | 'TRANSPORT_FAILURE'
    | 'WIRE_FORMAT'
    | 'SESSION_STATE';

/**
 * Base class for every error raised by the engine
 * `retryable` tells callers whether re-invoking the same call can succeed
 */
export abstract class EngineError extends Error {
    abstract readonly code: EngineErrorCode;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Mutation or lookup on an identifier this replica does not hold
 */
export class NotFoundError extends EngineError {
    readonly code = 'NOT_FOUND';
    readonly retryable = false;

    constructor(readonly documentId: ItemId) {
        super(`Document ${documentId} not found`);
    }
}

/**
 * Local mutation whose values peers could not decode
 * Rejected before anything is recorded
 */
export class InvalidMutationError extends EngineError {
    readonly code = 'INVALID_MUTATION';
    readonly retryable = false;

    constructor(readonly kind: string, readonly issues: z.ZodIssue[]) {
        super(`Invalid ${kind} mutation: ${issues.map((issue) => issue.message).join('; ')}`);
    }
}

/**
 * Mutation targeting a field outside the schema
 * Reported alongside the applied result: the payload is kept as opaque metadata
 */
export class UnknownFieldError extends EngineError {
    readonly code = 'UNKNOWN_FIELD';
    readonly retryable = false;

    constructor(readonly field: string) {
        super(`Unknown field "${field}" stored as opaque metadata`);
    }
}

/**
 * Delta stream ended while some operations still wait for dependencies
 * The session is aborted; a full sync fills the gap
 */
export class CausalityGapError extends EngineError {
    readonly code = 'CAUSALITY_GAP';
    readonly retryable = true;

    constructor(readonly missing: OperationId[]) {
        super(`Delta ended with ${missing.length} unsatisfied dependencies`);
    }
}

/**
 * Storage collaborator failed
 */
export class StorageFailureError extends EngineError {
    readonly code = 'STORAGE_FAILURE';
    readonly retryable = true;

    constructor(readonly key: string, cause: unknown) {
        super(`Storage failure on key "${key}"`, { cause });
    }
}

/**
 * Two documents with different identifiers were merged
 * A programming error: never caught by the engine
 */
export class FatalMismatchError extends EngineError {
    readonly code = 'FATAL_MISMATCH';
    readonly retryable = false;

    constructor(readonly left: ItemId, readonly right: ItemId) {
        super(`Cannot merge document ${left} with document ${right}`);
    }
}

/**
 * Transport collaborator failed or timed out
 */
export class TransportError extends EngineError {
    readonly code = 'TRANSPORT_FAILURE';
    readonly retryable = true;

    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

/**
 * Bytes received from a peer or storage do not decode
 */
export class WireFormatError extends EngineError {
    readonly code = 'WIRE_FORMAT';
    readonly retryable = false;

    constructor(message: string, readonly issues: z.ZodIssue[] = []) {
        super(message);
    }
}

/**
 * Sync session used out of protocol order
 */
export class SessionStateError extends EngineError {
    readonly code = 'SESSION_STATE';
    readonly retryable = false;
}
