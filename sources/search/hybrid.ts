/**
 * Hybrid index: lexical relevance, vector similarity and recency in one ranking
 *
 * The index follows a replica store through its change notifications, so
 * every mutation is reflected before the mutating call returns.
 */

import { resolveConfig, type EngineConfig, type EngineConfigInput, type SearchWeights } from '../engine/config';
import { isDeleted, viewDocument } from '../engine/document';
import { compareStrings } from '../engine/helpers';
import { defaultLogger, type Logger } from '../engine/logger';
import type { DocumentChange, ReplicaStore } from '../engine/store';
import type { BookmarkDocument, ItemId, Timestamp, Vector } from '../engine/types';
import { LexicalIndex } from './lexical';
import { bookmarkTokens, tokenize } from './tokenizer';
import { cosineSimilarity, VectorIndex } from './vector';

/**
 * One ranked result with its component scores
 */
export interface SearchHit {
    id: ItemId;
    score: number;
    lexical: number;
    vector: number;
    recency: number;
}

export interface HybridIndexOptions {
    config?: EngineConfigInput;
    logger?: Logger;
    /** Clock for recency scoring */
    now?: () => Timestamp;
    /** Uniform source in [0, 1) for graph level assignment */
    random?: () => number;
}

interface IndexedDocument {
    updatedAt: Timestamp;
    embedding: Vector | null;
}

/**
 * Weights after moving the share of absent components onto the supplied ones,
 * in proportion to their configured weights
 * The result sums to 1, so fused scores stay in [0, 1]
 */
export function effectiveWeights(
    weights: SearchWeights,
    supplied: { lexical: boolean; vector: boolean },
): SearchWeights {
    const active = {
        lexical: supplied.lexical ? weights.lexical : 0,
        vector: supplied.vector ? weights.vector : 0,
        recency: weights.recency,
    };
    const activeTotal = active.lexical + active.vector + active.recency;
    if (activeTotal === 0) {
        // Every supplied component is weighted 0: share equally among them
        const count = Number(supplied.lexical) + Number(supplied.vector) + 1;
        return {
            lexical: supplied.lexical ? 1 / count : 0,
            vector: supplied.vector ? 1 / count : 0,
            recency: 1 / count,
        };
    }
    return {
        lexical: active.lexical / activeTotal,
        vector: active.vector / activeTotal,
        recency: active.recency / activeTotal,
    };
}

/**
 * Exponential decay with the configured half-life; 1 for documents updated now or later
 */
export function recencyScore(updatedAt: Timestamp, now: Timestamp, halfLifeMs: number): number {
    const age = Math.max(0, now - updatedAt);
    return Math.exp((-Math.LN2 * age) / halfLifeMs);
}

export class HybridIndex {
    private readonly settings: EngineConfig['search'];
    private readonly lexical = new LexicalIndex();
    private readonly vectors: VectorIndex;
    private readonly documents = new Map<ItemId, IndexedDocument>();
    private readonly logger: Logger;
    private readonly now: () => Timestamp;

    constructor(options: HybridIndexOptions = {}) {
        this.settings = resolveConfig(options.config).search;
        this.logger = options.logger ?? defaultLogger;
        this.now = options.now ?? Date.now;
        this.vectors = new VectorIndex({
            ...this.settings.hnsw,
            random: options.random,
            logger: this.logger,
        });
    }

    /**
     * Number of indexed documents
     */
    get size(): number {
        return this.documents.size;
    }

    has(id: ItemId): boolean {
        return this.documents.has(id);
    }

    /**
     * Index the store's active documents and follow its changes
     * Returns the function that stops following
     */
    attach(store: ReplicaStore): () => void {
        for (const document of store.listActive()) {
            this.upsert(document);
        }
        return store.subscribe((change) => this.apply(change));
    }

    /**
     * Reflect one change notification
     */
    apply(change: DocumentChange): void {
        if (change.document === null || isDeleted(change.document)) {
            this.remove(change.documentId);
        } else {
            this.upsert(change.document);
        }
    }

    upsert(document: BookmarkDocument): void {
        const view = viewDocument(document);
        this.lexical.upsert(view.id, bookmarkTokens(view));
        const embedding = view.embedding !== null && view.embedding.length > 0 && this.vectors.upsert(view.id, view.embedding)
            ? view.embedding
            : null;
        if (embedding === null) {
            this.vectors.remove(view.id);
        }
        this.documents.set(view.id, { updatedAt: view.updatedAt, embedding });
    }

    remove(id: ItemId): void {
        this.lexical.remove(id);
        this.vectors.remove(id);
        this.documents.delete(id);
    }

    /**
     * Rank documents by `α·lexical + β·vector + γ·recency`
     *
     * Descending score, ties by id. A missing text or vector hands its weight
     * to the supplied components; with neither, documents rank by recency.
     * The sequence is computed when first read and cannot be restarted.
     */
    *search(text?: string | null, vector?: Vector | null, limit = 10): Generator<SearchHit> {
        if (limit <= 0) {
            return;
        }
        const tokens = text ? tokenize(text) : [];
        const hasText = tokens.length > 0;
        const query = vector && vector.length > 0 && this.vectorUsable(vector) ? vector : null;
        const hasVector = query !== null;
        const weights = effectiveWeights(this.settings.weights, { lexical: hasText, vector: hasVector });

        const lexicalScores = hasText ? this.lexical.score(tokens) : new Map<ItemId, number>();
        let candidates: Iterable<ItemId>;
        if (!hasText && !hasVector) {
            candidates = this.documents.keys();
        } else {
            const ids = new Set(lexicalScores.keys());
            if (query !== null) {
                const k = Math.max(limit, this.settings.hnsw.efSearch);
                for (const match of this.vectors.search(query, k)) {
                    ids.add(match.id);
                }
            }
            candidates = ids;
        }

        const now = this.now();
        const hits: SearchHit[] = [];
        for (const id of candidates) {
            const indexed = this.documents.get(id);
            if (!indexed) {
                continue;
            }
            const lexical = lexicalScores.get(id) ?? 0;
            const similarity = query !== null && indexed.embedding ? (1 + cosineSimilarity(query, indexed.embedding)) / 2 : 0;
            const recency = recencyScore(indexed.updatedAt, now, this.settings.recencyHalfLifeMs);
            hits.push({
                id,
                score: weights.lexical * lexical + weights.vector * similarity + weights.recency * recency,
                lexical,
                vector: similarity,
                recency,
            });
        }

        hits.sort((a, b) => b.score - a.score || compareStrings(a.id, b.id));
        yield* hits.slice(0, limit);
    }

    private vectorUsable(vector: Vector): boolean {
        const dimension = this.vectors.dimension;
        if (dimension !== undefined && vector.length !== dimension) {
            this.logger.warn(`[search] query vector has ${vector.length} dimensions, index expects ${dimension}`);
            return false;
        }
        return true;
    }
}
