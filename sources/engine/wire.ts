/**
 * Wire format for operations, checkpoints, summaries and sync frames
 *
 * Everything travels as JSON validated by zod at the boundary. The format is
 * versioned (`v`) and forward compatible: mutation kinds this version does not
 * know are decoded into an `Unknown` mutation and re-encoded verbatim.
 */

import { z } from 'zod';
import { InvalidMutationError, WireFormatError } from './errors';
import type {
    BookmarkDocument,
    Checkpoint,
    LogEntry,
    Mutation,
    Operation,
    Value,
    VersionSummary,
} from './types';

export const WIRE_VERSION = 1;

// ============================================================================
// Schemas
// ============================================================================

// Strings used as keys of CRDT records: tags, metadata keys, replica and item ids
export const recordKeySchema = z.string().min(1).refine((key) => key !== '__proto__', {
    message: '"__proto__" is reserved',
});

export const replicaIdSchema = recordKeySchema.refine((id) => !id.includes(':'), {
    message: 'Replica ids must not contain ":"',
});
export const itemIdSchema = recordKeySchema;

export const timestampSchema = z.object({
    wall: z.number().int().nonnegative(),
    logical: z.number().int().nonnegative(),
    // the bottom timestamp carries an empty replica
    replica: z.string(),
});

export const operationIdSchema = z.object({
    replica: replicaIdSchema,
    seq: z.number().int().positive(),
});

export const summarySchema = z.record(z.number().int().nonnegative());

export const valueSchema: z.ZodType<Value> = z.lazy(() =>
    z.union([
        z.string(),
        z.number().finite(),
        z.boolean(),
        z.null(),
        z.array(valueSchema),
        z.record(valueSchema),
    ]),
);

export const vectorSchema = z.array(z.number().finite());

function registerSchema<T extends z.ZodTypeAny>(inner: T) {
    return z.object({ value: inner, timestamp: timestampSchema });
}

export const documentSchema = z.object({
    id: itemIdSchema,
    url: registerSchema(z.string()),
    title: registerSchema(z.string().nullable()),
    tags: z.object({
        adds: z.record(z.array(z.string())),
        removes: z.array(z.string()),
    }),
    metadata: z.record(registerSchema(valueSchema)),
    deleted: registerSchema(z.boolean()),
    embedding: registerSchema(vectorSchema.nullable()),
    updatedAt: z.number().nonnegative(),
});

const knownMutationSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('SetUrl'), url: z.string() }),
    z.object({ kind: z.literal('SetTitle'), title: z.string().nullable() }),
    z.object({ kind: z.literal('AddTag'), tag: recordKeySchema }),
    z.object({ kind: z.literal('RemoveTag'), tag: recordKeySchema, observed: z.array(z.string()) }),
    z.object({ kind: z.literal('SetMetadataField'), key: recordKeySchema, value: valueSchema }),
    z.object({ kind: z.literal('SetDeleted'), deleted: z.boolean() }),
    z.object({ kind: z.literal('SetEmbedding'), embedding: vectorSchema.nullable() }),
]);

const KNOWN_MUTATION_KINDS: ReadonlySet<string> = new Set(
    knownMutationSchema.options.map((option) => option.shape.kind.value),
);

// Any mutation, known or not: a kind plus JSON fields
const rawMutationSchema = z.object({ kind: z.string().min(1) }).catchall(valueSchema);

const wireOperationSchema = z.object({
    v: z.literal(WIRE_VERSION),
    id: operationIdSchema,
    timestamp: timestampSchema,
    documentId: itemIdSchema,
    mutation: rawMutationSchema,
    dependencies: z.array(operationIdSchema),
});

const wireCheckpointSchema = z.object({
    v: z.literal(WIRE_VERSION),
    id: operationIdSchema,
    timestamp: timestampSchema,
    documentId: itemIdSchema,
    document: documentSchema,
    covers: z.array(operationIdSchema),
});

const wireEntrySchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('operation'), operation: wireOperationSchema }),
    z.object({ type: z.literal('checkpoint'), checkpoint: wireCheckpointSchema }),
]);

export const frameSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('summary'), replica: replicaIdSchema, summary: summarySchema }),
    z.object({ type: z.literal('delta'), entries: z.array(wireEntrySchema) }),
    z.object({ type: z.literal('end'), count: z.number().int().nonnegative() }),
    z.object({ type: z.literal('digest'), summary: summarySchema, digest: z.string() }),
]);

type RawMutation = z.infer<typeof rawMutationSchema>;
type WireOperation = z.infer<typeof wireOperationSchema>;
type WireCheckpoint = z.infer<typeof wireCheckpointSchema>;
type WireEntry = z.infer<typeof wireEntrySchema>;
type WireFrame = z.infer<typeof frameSchema>;

/**
 * Sync protocol frame
 */
export type SyncFrame =
    | { type: 'summary'; replica: string; summary: VersionSummary }
    | { type: 'delta'; entries: LogEntry[] }
    | { type: 'end'; count: number }
    | { type: 'digest'; summary: VersionSummary; digest: string };

// ============================================================================
// Conversions
// ============================================================================

function decodeMutation(raw: RawMutation): Mutation {
    if (!KNOWN_MUTATION_KINDS.has(raw.kind)) {
        return { kind: 'Unknown', type: raw.kind, payload: { ...raw } };
    }
    const parsed = knownMutationSchema.safeParse(raw);
    if (!parsed.success) {
        throw new WireFormatError(`Malformed ${raw.kind} mutation`, parsed.error.issues);
    }
    return parsed.data;
}

/**
 * Validate a locally built mutation against the rules peers decode with
 * Returns the mutation as it will read after a round trip
 * @throws InvalidMutationError when a peer would reject it
 */
export function parseMutation(mutation: Mutation): Mutation {
    if (mutation.kind === 'Unknown') {
        return mutation;
    }
    const parsed = knownMutationSchema.safeParse(mutation);
    if (!parsed.success) {
        throw new InvalidMutationError(mutation.kind, parsed.error.issues);
    }
    return parsed.data;
}

function encodeMutation(mutation: Mutation): RawMutation {
    if (mutation.kind === 'Unknown') {
        return { ...mutation.payload, kind: mutation.type };
    }
    return mutation;
}

function toWireOperation(operation: Operation): WireOperation {
    return {
        v: WIRE_VERSION,
        id: operation.id,
        timestamp: operation.timestamp,
        documentId: operation.documentId,
        mutation: encodeMutation(operation.mutation),
        dependencies: operation.dependencies,
    };
}

function fromWireOperation(wire: WireOperation): Operation {
    return {
        id: wire.id,
        timestamp: wire.timestamp,
        documentId: wire.documentId,
        mutation: decodeMutation(wire.mutation),
        dependencies: wire.dependencies,
    };
}

function toWireCheckpoint(checkpoint: Checkpoint): WireCheckpoint {
    return { v: WIRE_VERSION, ...checkpoint };
}

function fromWireCheckpoint(wire: WireCheckpoint): Checkpoint {
    const document: BookmarkDocument = wire.document;
    return {
        id: wire.id,
        timestamp: wire.timestamp,
        documentId: wire.documentId,
        document,
        covers: wire.covers,
    };
}

function toWireEntry(entry: LogEntry): WireEntry {
    return entry.type === 'operation'
        ? { type: 'operation', operation: toWireOperation(entry.operation) }
        : { type: 'checkpoint', checkpoint: toWireCheckpoint(entry.checkpoint) };
}

function fromWireEntry(wire: WireEntry): LogEntry {
    return wire.type === 'operation'
        ? { type: 'operation', operation: fromWireOperation(wire.operation) }
        : { type: 'checkpoint', checkpoint: fromWireCheckpoint(wire.checkpoint) };
}

function toWireFrame(frame: SyncFrame): WireFrame {
    if (frame.type === 'delta') {
        return { type: 'delta', entries: frame.entries.map(toWireEntry) };
    }
    return frame;
}

function fromWireFrame(wire: WireFrame): SyncFrame {
    if (wire.type === 'delta') {
        return { type: 'delta', entries: wire.entries.map(fromWireEntry) };
    }
    return wire;
}

// ============================================================================
// Codec
// ============================================================================

function parseJson(text: string, what: string): unknown {
    try {
        return JSON.parse(text);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new WireFormatError(`${what} is not valid JSON: ${reason}`);
    }
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, text: string, what: string): z.infer<S> {
    const parsed = schema.safeParse(parseJson(text, what));
    if (!parsed.success) {
        throw new WireFormatError(`Invalid ${what}`, parsed.error.issues);
    }
    return parsed.data;
}

export function encodeOperation(operation: Operation): string {
    return JSON.stringify(toWireOperation(operation));
}

export function decodeOperation(text: string): Operation {
    return fromWireOperation(decodeWith(wireOperationSchema, text, 'operation'));
}

export function encodeEntry(entry: LogEntry): string {
    return JSON.stringify(toWireEntry(entry));
}

export function decodeEntry(text: string): LogEntry {
    return fromWireEntry(decodeWith(wireEntrySchema, text, 'log entry'));
}

export function encodeSummary(summary: VersionSummary): string {
    return JSON.stringify(summary);
}

export function decodeSummary(text: string): VersionSummary {
    return decodeWith(summarySchema, text, 'version summary');
}

export function encodeFrame(frame: SyncFrame): string {
    return JSON.stringify(toWireFrame(frame));
}

export function decodeFrame(text: string): SyncFrame {
    return fromWireFrame(decodeWith(frameSchema, text, 'sync frame'));
}
