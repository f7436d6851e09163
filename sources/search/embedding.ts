/**
 * Helpers around the embedding collaborator
 *
 * Embeddings come from an opaque async function. A failing or malformed
 * embedding never fails the caller's operation: the bookmark simply has no
 * vector and search falls back to the remaining components.
 */

import { viewDocument } from '../engine/document';
import { NotFoundError } from '../engine/errors';
import { defaultLogger, type Logger } from '../engine/logger';
import type { ReplicaStore } from '../engine/store';
import type { ItemId, Vector } from '../engine/types';
import { vectorSchema } from '../engine/wire';
import type { HybridIndex, SearchHit } from './hybrid';

/**
 * Produces a fixed-length vector for a text
 */
export type Embedder = (text: string) => Promise<Vector>;

/**
 * Text a bookmark is embedded from: title, url, then tags
 */
export function bookmarkText(store: ReplicaStore, id: ItemId): string {
    const document = store.get(id);
    if (!document) {
        throw new NotFoundError(id);
    }
    const view = viewDocument(document);
    return [view.title ?? '', view.url, ...view.tags].filter((part) => part.length > 0).join('\n');
}

async function tryEmbed(embedder: Embedder, text: string, logger: Logger): Promise<Vector | null> {
    let raw: unknown;
    try {
        raw = await embedder(text);
    } catch (error) {
        logger.warn(`[search] embedder failed: ${error instanceof Error ? error.message : String(error)}`);
        return null;
    }
    const parsed = vectorSchema.min(1).safeParse(raw);
    if (!parsed.success) {
        logger.warn('[search] embedder returned a malformed vector');
        return null;
    }
    return parsed.data;
}

/**
 * Compute a bookmark's embedding and record it as a SetEmbedding operation
 * Returns false when the embedder failed; the bookmark is left unchanged
 * @throws NotFoundError when the bookmark is unknown or compacted
 */
export async function embedBookmark(
    store: ReplicaStore,
    id: ItemId,
    embedder: Embedder,
    logger: Logger = defaultLogger,
): Promise<boolean> {
    const embedding = await tryEmbed(embedder, bookmarkText(store, id), logger);
    if (embedding === null) {
        return false;
    }
    store.mutate(id, { kind: 'SetEmbedding', embedding });
    return true;
}

/**
 * Search with the query text embedded by the collaborator
 * Falls back to lexical and recency ranking when embedding fails
 */
export async function searchWithEmbedder(
    index: HybridIndex,
    text: string,
    embedder: Embedder,
    limit = 10,
    logger: Logger = defaultLogger,
): Promise<SearchHit[]> {
    const vector = await tryEmbed(embedder, text, logger);
    return Array.from(index.search(text, vector, limit));
}
