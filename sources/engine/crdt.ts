/**
 * CRDT value types: LWW register, observed-remove set, LWW map
 *
 * All functions are pure: inputs are never modified (they may be frozen
 * snapshots), and every merge is commutative, associative and idempotent.
 */

import { compareTimestamps, ZERO_TIMESTAMP } from './clock';
import { canonicalJson, compareStrings, setEntry, unionSorted } from './helpers';
import type { HybridTimestamp, LWWMap, LWWRegister, ORSet } from './types';

/**
 * Result of applying a local or remote write: the new state plus the
 * value observed before the write (for undo and audit)
 */
export interface Applied<S, P> {
    state: S;
    previous: P;
}

// ============================================================================
// LWW Register
// ============================================================================

/**
 * Create a register holding `value` at `timestamp` (bottom by default)
 */
export function createRegister<T>(value: T, timestamp: HybridTimestamp = ZERO_TIMESTAMP): LWWRegister<T> {
    return { value, timestamp };
}

// Equal timestamps only arise from corrupted clocks; the value comparison
// keeps the winner deterministic even then
function registerWins<T>(candidate: LWWRegister<T>, current: LWWRegister<T>): boolean {
    const order = compareTimestamps(candidate.timestamp, current.timestamp);
    if (order !== 0) {
        return order > 0;
    }
    return compareStrings(canonicalJson(candidate.value), canonicalJson(current.value)) > 0;
}

/**
 * Write a value; it takes effect only if its timestamp wins
 */
export function registerSet<T>(
    register: LWWRegister<T>,
    value: T,
    timestamp: HybridTimestamp,
): Applied<LWWRegister<T>, T> {
    const candidate = { value, timestamp };
    return {
        state: registerWins(candidate, register) ? candidate : register,
        previous: register.value,
    };
}

/**
 * Keep the register with the greater timestamp
 */
export function registerMerge<T>(a: LWWRegister<T>, b: LWWRegister<T>): LWWRegister<T> {
    return registerWins(b, a) ? b : a;
}

// ============================================================================
// Observed-Remove Set
// ============================================================================

export function createORSet(): ORSet {
    return { adds: {}, removes: [] };
}

/**
 * Add-tags of an element not covered by a remove
 */
export function orSetLiveTags(set: ORSet, element: string): string[] {
    const tags = Object.hasOwn(set.adds, element) ? set.adds[element] : [];
    if (set.removes.length === 0) {
        return [...tags];
    }
    const removed = new Set(set.removes);
    return tags.filter((tag) => !removed.has(tag));
}

export function orSetHas(set: ORSet, element: string): boolean {
    return orSetLiveTags(set, element).length > 0;
}

/**
 * Present elements, sorted
 */
export function orSetValues(set: ORSet): string[] {
    return Object.keys(set.adds)
        .filter((element) => orSetHas(set, element))
        .sort(compareStrings);
}

/**
 * Add an element under a fresh, globally unique tag
 * Returns whether the element was present before
 */
export function orSetAdd(set: ORSet, element: string, tag: string): Applied<ORSet, boolean> {
    const previous = orSetHas(set, element);
    const current = Object.hasOwn(set.adds, element) ? set.adds[element] : [];
    return {
        state: {
            adds: { ...set.adds, [element]: unionSorted(current, [tag]) },
            removes: set.removes,
        },
        previous,
    };
}

/**
 * Remove an element by tombstoning the add-tags the remover observed
 * Adds whose tags were not observed survive; removing an absent element is a no-op
 */
export function orSetRemove(set: ORSet, element: string, observed: readonly string[]): Applied<ORSet, boolean> {
    const previous = orSetHas(set, element);
    return {
        state: {
            adds: set.adds,
            removes: unionSorted(set.removes, [...observed].sort(compareStrings)),
        },
        previous,
    };
}

/**
 * Union of add-tags and union of remove-tags
 */
export function orSetMerge(a: ORSet, b: ORSet): ORSet {
    const adds: Record<string, string[]> = { ...a.adds };
    for (const [element, tags] of Object.entries(b.adds)) {
        setEntry(adds, element, Object.hasOwn(adds, element) ? unionSorted(adds[element], tags) : tags);
    }
    return { adds, removes: unionSorted(a.removes, b.removes) };
}

// ============================================================================
// LWW Map
// ============================================================================

export function mapGet<V>(map: LWWMap<V>, key: string): V | undefined {
    return Object.hasOwn(map, key) ? map[key].value : undefined;
}

/**
 * Write one key; other keys are untouched
 */
export function mapSet<V>(
    map: LWWMap<V>,
    key: string,
    value: V,
    timestamp: HybridTimestamp,
): Applied<LWWMap<V>, V | undefined> {
    if (!Object.hasOwn(map, key)) {
        return { state: { ...map, [key]: { value, timestamp } }, previous: undefined };
    }
    const applied = registerSet(map[key], value, timestamp);
    return {
        state: applied.state === map[key] ? map : { ...map, [key]: applied.state },
        previous: applied.previous,
    };
}

/**
 * Per-key register merge; keys present on one side only are kept
 */
export function mapMerge<V>(a: LWWMap<V>, b: LWWMap<V>): LWWMap<V> {
    const out: LWWMap<V> = { ...a };
    for (const [key, register] of Object.entries(b)) {
        setEntry(out, key, Object.hasOwn(out, key) ? registerMerge(out[key], register) : register);
    }
    return out;
}

/**
 * Plain key -> value view, keys sorted
 */
export function mapEntries<V>(map: LWWMap<V>): Array<[string, V]> {
    return Object.keys(map)
        .sort(compareStrings)
        .map((key) => [key, map[key].value]);
}
