/**
 * Approximate nearest-neighbour index over embeddings
 *
 * A layered proximity graph (HNSW): every node lives on layer 0 and on each
 * higher layer with geometrically decreasing probability. Searches descend
 * greedily from the sparse top layer and widen to `ef` candidates on the
 * dense bottom layer. Neighbour lists are replaced, never edited in place,
 * so a reader holding a list always sees a complete one.
 */

import { compareStrings } from '../engine/helpers';
import { defaultLogger, type Logger } from '../engine/logger';
import type { ItemId, Vector } from '../engine/types';

export interface VectorIndexOptions {
    /** Links per node on upper layers (twice as many on layer 0) */
    m: number;
    /** Candidate list size while inserting */
    efConstruction: number;
    /** Default candidate list size while searching */
    efSearch: number;
    /** Uniform source in [0, 1) for level assignment */
    random?: () => number;
    logger?: Logger;
}

export interface VectorMatch {
    id: ItemId;
    /** Cosine similarity in [-1, 1] */
    similarity: number;
}

interface GraphNode {
    readonly id: ItemId;
    readonly vector: Vector;
    readonly level: number;
    /** Neighbour ids per layer, 0..level */
    neighbors: ReadonlyArray<readonly ItemId[]>;
}

type Candidate = { id: ItemId; distance: number };

/**
 * Cosine similarity; 0 when either vector has no magnitude
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
    const length = Math.min(a.length, b.length);
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return Math.max(-1, Math.min(1, dot / (Math.sqrt(normA) * Math.sqrt(normB))));
}

function compareCandidates(a: Candidate, b: Candidate): number {
    return a.distance - b.distance || compareStrings(a.id, b.id);
}

function insertSorted(list: Candidate[], candidate: Candidate): void {
    let index = list.findIndex((existing) => compareCandidates(candidate, existing) < 0);
    if (index < 0) {
        index = list.length;
    }
    list.splice(index, 0, candidate);
}

export class VectorIndex {
    private readonly nodes = new Map<ItemId, GraphNode>();
    private entryPoint: ItemId | undefined;
    private topLevel = -1;
    private dims: number | undefined;
    private readonly levelFactor: number;
    private readonly random: () => number;
    private readonly logger: Logger;

    constructor(private readonly options: VectorIndexOptions) {
        this.levelFactor = 1 / Math.log(options.m);
        this.random = options.random ?? Math.random;
        this.logger = options.logger ?? defaultLogger;
    }

    get size(): number {
        return this.nodes.size;
    }

    /**
     * Dimensionality fixed by the first inserted vector
     */
    get dimension(): number | undefined {
        return this.dims;
    }

    has(id: ItemId): boolean {
        return this.nodes.has(id);
    }

    /**
     * Insert or replace a node
     * Returns false (and leaves the id unindexed) for vectors of the wrong dimensionality
     */
    upsert(id: ItemId, vector: Vector): boolean {
        this.remove(id);
        if (vector.length === 0) {
            return false;
        }
        if (this.nodes.size === 0) {
            this.dims = vector.length;
        } else if (vector.length !== this.dims) {
            this.logger.warn(
                `[search] embedding of ${id} has ${vector.length} dimensions, index expects ${this.dims}`,
            );
            return false;
        }
        this.insert(id, [...vector]);
        return true;
    }

    remove(id: ItemId): void {
        const node = this.nodes.get(id);
        if (!node) {
            return;
        }
        this.nodes.delete(id);

        for (const other of this.nodes.values()) {
            if (other.neighbors.some((layer) => layer.includes(id))) {
                other.neighbors = other.neighbors.map((layer) => layer.filter((neighbor) => neighbor !== id));
            }
        }

        // Reconnect the removed node's neighbours among themselves
        for (let layer = 0; layer <= node.level; layer++) {
            const former = node.neighbors[layer].filter((neighbor) => this.nodes.has(neighbor));
            for (const neighborId of former) {
                const neighbor = this.nodes.get(neighborId);
                if (!neighbor || neighbor.level < layer) {
                    continue;
                }
                const replacements = former
                    .filter((candidate) => candidate !== neighborId && !neighbor.neighbors[layer].includes(candidate))
                    .map((candidate) => this.candidate(candidate, neighbor.vector))
                    .sort(compareCandidates);
                for (const replacement of replacements) {
                    if (neighbor.neighbors[layer].length >= this.maxLinks(layer)) {
                        break;
                    }
                    this.link(neighborId, replacement.id, layer);
                }
            }
        }

        if (this.entryPoint === id) {
            this.electEntryPoint();
        }
    }

    /**
     * Approximate k nearest neighbours by cosine similarity, most similar first
     */
    search(query: Vector, k: number, ef: number = this.options.efSearch): VectorMatch[] {
        if (this.entryPoint === undefined || k <= 0) {
            return [];
        }
        if (query.length !== this.dims) {
            this.logger.warn(`[search] query vector has ${query.length} dimensions, index expects ${this.dims}`);
            return [];
        }

        let entry = [this.candidate(this.entryPoint, query)];
        for (let layer = this.topLevel; layer > 0; layer--) {
            entry = this.searchLayer(query, entry, 1, layer);
        }
        return this.searchLayer(query, entry, Math.max(ef, k), 0)
            .slice(0, k)
            .map(({ id, distance }) => ({ id, similarity: 1 - distance }));
    }

    // ========================================================================
    // Graph maintenance
    // ========================================================================

    private insert(id: ItemId, vector: Vector): void {
        const level = this.randomLevel();
        const node: GraphNode = {
            id,
            vector,
            level,
            neighbors: Array.from({ length: level + 1 }, () => []),
        };
        this.nodes.set(id, node);

        if (this.entryPoint === undefined) {
            this.entryPoint = id;
            this.topLevel = level;
            return;
        }

        let entry = [this.candidate(this.entryPoint, vector)];
        for (let layer = this.topLevel; layer > level; layer--) {
            entry = this.searchLayer(vector, entry, 1, layer);
        }

        for (let layer = Math.min(level, this.topLevel); layer >= 0; layer--) {
            const found = this.searchLayer(vector, entry, this.options.efConstruction, layer)
                .filter((candidate) => candidate.id !== id);
            const selected = found.slice(0, this.options.m).map((candidate) => candidate.id);
            node.neighbors = node.neighbors.map((links, index) => (index === layer ? selected : links));
            for (const neighborId of selected) {
                this.link(neighborId, id, layer);
            }
            if (found.length > 0) {
                entry = found;
            }
        }

        if (level > this.topLevel) {
            this.entryPoint = id;
            this.topLevel = level;
        }
    }

    // Add a directed link, pruning to the closest neighbours when over capacity
    private link(fromId: ItemId, toId: ItemId, layer: number): void {
        const from = this.nodes.get(fromId);
        if (!from || from.level < layer || from.neighbors[layer].includes(toId)) {
            return;
        }
        let links = [...from.neighbors[layer], toId];
        if (links.length > this.maxLinks(layer)) {
            links = links
                .map((neighbor) => this.candidate(neighbor, from.vector))
                .sort(compareCandidates)
                .slice(0, this.maxLinks(layer))
                .map((candidate) => candidate.id);
        }
        from.neighbors = from.neighbors.map((existing, index) => (index === layer ? links : existing));
    }

    private searchLayer(query: Vector, entry: readonly Candidate[], ef: number, layer: number): Candidate[] {
        const visited = new Set(entry.map((candidate) => candidate.id));
        const candidates = [...entry].sort(compareCandidates);
        const results = [...candidates];

        while (candidates.length > 0) {
            const current = candidates.shift();
            if (!current) {
                break;
            }
            const furthest = results[results.length - 1];
            if (results.length >= ef && current.distance > furthest.distance) {
                break;
            }
            const node = this.nodes.get(current.id);
            for (const neighborId of node?.neighbors[layer] ?? []) {
                if (visited.has(neighborId) || !this.nodes.has(neighborId)) {
                    continue;
                }
                visited.add(neighborId);
                const next = this.candidate(neighborId, query);
                if (results.length < ef || compareCandidates(next, results[results.length - 1]) < 0) {
                    insertSorted(candidates, next);
                    insertSorted(results, next);
                    if (results.length > ef) {
                        results.pop();
                    }
                }
            }
        }
        return results;
    }

    private electEntryPoint(): void {
        this.entryPoint = undefined;
        this.topLevel = -1;
        for (const node of this.nodes.values()) {
            if (
                this.entryPoint === undefined
                || node.level > this.topLevel
                || (node.level === this.topLevel && compareStrings(node.id, this.entryPoint) < 0)
            ) {
                this.entryPoint = node.id;
                this.topLevel = node.level;
            }
        }
        if (this.nodes.size === 0) {
            this.dims = undefined;
        }
    }

    private candidate(id: ItemId, query: Vector): Candidate {
        const node = this.nodes.get(id);
        return { id, distance: node ? 1 - cosineSimilarity(query, node.vector) : Number.POSITIVE_INFINITY };
    }

    private maxLinks(layer: number): number {
        return layer === 0 ? this.options.m * 2 : this.options.m;
    }

    private randomLevel(): number {
        return Math.floor(-Math.log(1 - this.random()) * this.levelFactor);
    }
}
