// lib/store/itemStore.ts
import { Item, ItemFilter, NewItem } from '../../types/item';
import { ChunkRecord } from '../../types/chunk';

/**
 * Record store for ingested items and their chunk metadata.
 * Embeddings are never stored here.
 */
export interface ItemStore {
    create(item: NewItem): Promise<Item>;
    get(id: string): Promise<Item | null>;
    /** Newest first */
    list(filter?: ItemFilter): Promise<Item[]>;
    /** Also removes the item's chunk records; false when the item is unknown */
    delete(id: string): Promise<boolean>;
    saveChunks(itemId: string, chunks: ChunkRecord[]): Promise<void>;
    listChunks(itemId: string): Promise<ChunkRecord[]>;
    count(): Promise<number>;
}
