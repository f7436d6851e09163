/**
 * Helper functions for the sync engine
 */

import { init } from '@paralleldrive/cuid2';
import type { ItemId, OperationId, ReplicaId } from './types';

// 26 base36 characters carry more than 128 bits
const createLongId = init({ length: 26 });

/**
 * Create a new bookmark identifier
 */
export function createItemId(): ItemId {
    return createLongId();
}

/**
 * Create a new replica identifier
 */
export function createReplicaId(): ReplicaId {
    return createLongId();
}

/**
 * Stable string form of an operation id, also used as an OR-Set tag
 */
export function operationKey(id: OperationId): string {
    return `${id.replica}:${id.seq}`;
}

/**
 * Code-unit string comparison (locale independent)
 */
export function compareStrings(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order on operation ids: replica, then counter
 */
export function compareOperationIds(a: OperationId, b: OperationId): number {
    return compareStrings(a.replica, b.replica) || a.seq - b.seq;
}

/**
 * Own entry of a record; inherited properties never count
 */
export function getEntry<V>(record: Readonly<Record<string, V>>, key: string): V | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Write an own enumerable entry, including keys such as "__proto__"
 * that plain assignment would treat as the prototype
 */
export function setEntry<V>(record: Record<string, V>, key: string, value: V): void {
    Object.defineProperty(record, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Deterministic JSON encoding with object keys sorted
 * Two structurally equal values always encode to the same string
 */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(sortKeys);
    }
    if (value !== null && typeof value === 'object') {
        const entries: Array<[string, unknown]> = Object.entries(value);
        entries.sort(([a], [b]) => compareStrings(a, b));
        const sorted: Record<string, unknown> = {};
        for (const [key, inner] of entries) {
            setEntry(sorted, key, sortKeys(inner));
        }
        return sorted;
    }
    return value;
}

/**
 * Sorted union of two sorted, duplicate-free string arrays
 */
export function unionSorted(a: readonly string[], b: readonly string[]): string[] {
    const out: string[] = [];
    let i = 0;
    let j = 0;
    while (i < a.length || j < b.length) {
        if (j >= b.length || (i < a.length && a[i] < b[j])) {
            out.push(a[i++]);
        } else if (i >= a.length || b[j] < a[i]) {
            out.push(b[j++]);
        } else {
            out.push(a[i]);
            i++;
            j++;
        }
    }
    return out;
}
