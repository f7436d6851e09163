/**
 * Bookmark document: composite CRDT assembled from the value types
 */

import {
    createORSet,
    createRegister,
    mapEntries,
    mapMerge,
    mapSet,
    orSetAdd,
    orSetMerge,
    orSetRemove,
    orSetValues,
    registerMerge,
    registerSet,
} from './crdt';
import { FatalMismatchError, UnknownFieldError } from './errors';
import { operationKey } from './helpers';
import type { BookmarkDocument, ItemId, Operation, Timestamp, Value, Vector } from './types';

/**
 * Metadata key prefix under which unknown mutation kinds are kept
 */
export const UNKNOWN_FIELD_PREFIX = '@unknown/';

/**
 * Document for a fresh identifier: every register at the bottom timestamp
 */
export function createDocument(id: ItemId): BookmarkDocument {
    return {
        id,
        url: createRegister(''),
        title: createRegister<string | null>(null),
        tags: createORSet(),
        metadata: {},
        deleted: createRegister(false),
        embedding: createRegister<Vector | null>(null),
        updatedAt: 0,
    };
}

/**
 * Outcome of applying an operation to a document
 *
 * `passthrough` means the mutation targeted a field this version does not
 * know; it was stored as opaque metadata and `error` describes it.
 */
export type ApplyOutcome =
    | { status: 'applied'; document: BookmarkDocument; previous: unknown }
    | { status: 'passthrough'; document: BookmarkDocument; previous: unknown; error: UnknownFieldError };

/**
 * Apply one operation by dispatching to the field's CRDT
 */
export function applyOperation(document: BookmarkDocument, operation: Operation): ApplyOutcome {
    if (document.id !== operation.documentId) {
        throw new FatalMismatchError(document.id, operation.documentId);
    }

    const { mutation, timestamp } = operation;
    const updatedAt = Math.max(document.updatedAt, timestamp.wall);

    switch (mutation.kind) {
        case 'SetUrl': {
            const { state, previous } = registerSet(document.url, mutation.url, timestamp);
            return { status: 'applied', document: { ...document, url: state, updatedAt }, previous };
        }
        case 'SetTitle': {
            const { state, previous } = registerSet(document.title, mutation.title, timestamp);
            return { status: 'applied', document: { ...document, title: state, updatedAt }, previous };
        }
        case 'AddTag': {
            const { state, previous } = orSetAdd(document.tags, mutation.tag, operationKey(operation.id));
            return { status: 'applied', document: { ...document, tags: state, updatedAt }, previous };
        }
        case 'RemoveTag': {
            const { state, previous } = orSetRemove(document.tags, mutation.tag, mutation.observed);
            return { status: 'applied', document: { ...document, tags: state, updatedAt }, previous };
        }
        case 'SetMetadataField': {
            const { state, previous } = mapSet(document.metadata, mutation.key, mutation.value, timestamp);
            return { status: 'applied', document: { ...document, metadata: state, updatedAt }, previous };
        }
        case 'SetDeleted': {
            const { state, previous } = registerSet(document.deleted, mutation.deleted, timestamp);
            return { status: 'applied', document: { ...document, deleted: state, updatedAt }, previous };
        }
        case 'SetEmbedding': {
            const { state, previous } = registerSet(document.embedding, mutation.embedding, timestamp);
            return { status: 'applied', document: { ...document, embedding: state, updatedAt }, previous };
        }
        case 'Unknown': {
            const key = `${UNKNOWN_FIELD_PREFIX}${mutation.type}`;
            const { state, previous } = mapSet<Value>(document.metadata, key, mutation.payload, timestamp);
            return {
                status: 'passthrough',
                document: { ...document, metadata: state, updatedAt },
                previous,
                error: new UnknownFieldError(mutation.type),
            };
        }
    }
}

/**
 * Merge every field independently
 * Merging documents with different identifiers is a programming error
 */
export function mergeDocuments(a: BookmarkDocument, b: BookmarkDocument): BookmarkDocument {
    if (a.id !== b.id) {
        throw new FatalMismatchError(a.id, b.id);
    }
    return {
        id: a.id,
        url: registerMerge(a.url, b.url),
        title: registerMerge(a.title, b.title),
        tags: orSetMerge(a.tags, b.tags),
        metadata: mapMerge(a.metadata, b.metadata),
        deleted: registerMerge(a.deleted, b.deleted),
        embedding: registerMerge(a.embedding, b.embedding),
        updatedAt: Math.max(a.updatedAt, b.updatedAt),
    };
}

export function isDeleted(document: BookmarkDocument): boolean {
    return document.deleted.value;
}

/**
 * Plain, resolved view of a document
 */
export interface BookmarkView {
    id: ItemId;
    url: string;
    title: string | null;
    tags: string[];
    metadata: Record<string, Value>;
    deleted: boolean;
    embedding: Vector | null;
    updatedAt: Timestamp;
}

export function viewDocument(document: BookmarkDocument): BookmarkView {
    return {
        id: document.id,
        url: document.url.value,
        title: document.title.value,
        tags: orSetValues(document.tags),
        metadata: Object.fromEntries(mapEntries(document.metadata)),
        deleted: document.deleted.value,
        embedding: document.embedding.value,
        updatedAt: document.updatedAt,
    };
}
