/**
 * Inverted index with TF-IDF cosine scoring
 */

import type { ItemId } from '../engine/types';

/**
 * Term -> posting list, plus per-document term frequencies
 *
 * Weights are (1 + ln tf) * idf with idf = ln(1 + N / df). A document's
 * score is the cosine between its weight vector and the query's, so it
 * lies in [0, 1]; idf is read at query time, so scores always reflect the
 * current collection.
 */
export class LexicalIndex {
    private readonly postings = new Map<string, Map<ItemId, number>>();
    private readonly documents = new Map<ItemId, Map<string, number>>();

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
     * Replace a document's postings
     */
    upsert(id: ItemId, tokens: readonly string[]): void {
        this.remove(id);
        const frequencies = countTerms(tokens);
        this.documents.set(id, frequencies);
        for (const [term, frequency] of frequencies) {
            const posting = this.postings.get(term) ?? new Map<ItemId, number>();
            posting.set(id, frequency);
            this.postings.set(term, posting);
        }
    }

    remove(id: ItemId): void {
        const frequencies = this.documents.get(id);
        if (!frequencies) {
            return;
        }
        for (const term of frequencies.keys()) {
            const posting = this.postings.get(term);
            posting?.delete(id);
            if (posting && posting.size === 0) {
                this.postings.delete(term);
            }
        }
        this.documents.delete(id);
    }

    /**
     * Number of documents containing the term
     */
    documentFrequency(term: string): number {
        return this.postings.get(term)?.size ?? 0;
    }

    idf(term: string): number {
        const df = this.documentFrequency(term);
        return df === 0 ? 0 : Math.log(1 + this.documents.size / df);
    }

    /**
     * Cosine scores of every document sharing a term with the query
     * Query terms absent from the index carry no weight
     */
    score(queryTokens: readonly string[]): Map<ItemId, number> {
        const scores = new Map<ItemId, number>();
        const queryWeights = new Map<string, number>();
        for (const [term, frequency] of countTerms(queryTokens)) {
            const idf = this.idf(term);
            if (idf > 0) {
                queryWeights.set(term, tf(frequency) * idf);
            }
        }
        const queryNorm = norm(queryWeights.values());
        if (queryNorm === 0) {
            return scores;
        }

        const dots = new Map<ItemId, number>();
        for (const [term, queryWeight] of queryWeights) {
            const idf = this.idf(term);
            for (const [id, frequency] of this.postings.get(term) ?? []) {
                dots.set(id, (dots.get(id) ?? 0) + queryWeight * tf(frequency) * idf);
            }
        }

        for (const [id, dot] of dots) {
            const documentNorm = this.documentNorm(id);
            if (documentNorm > 0) {
                scores.set(id, Math.min(1, dot / (queryNorm * documentNorm)));
            }
        }
        return scores;
    }

    private documentNorm(id: ItemId): number {
        const frequencies = this.documents.get(id);
        if (!frequencies) {
            return 0;
        }
        const weights: number[] = [];
        for (const [term, frequency] of frequencies) {
            weights.push(tf(frequency) * this.idf(term));
        }
        return norm(weights);
    }
}

function countTerms(tokens: readonly string[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const token of tokens) {
        counts.set(token, (counts.get(token) ?? 0) + 1);
    }
    return counts;
}

function tf(frequency: number): number {
    return 1 + Math.log(frequency);
}

function norm(weights: Iterable<number>): number {
    let sum = 0;
    for (const weight of weights) {
        sum += weight * weight;
    }
    return Math.sqrt(sum);
}
