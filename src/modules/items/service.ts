// modules/items/service.ts
import { fixedChunk } from '../../lib/chunking/fixedChunker';
import { EmbeddingService } from '../../lib/ai/embeddingService';
import { IndexEntry, VectorIndex } from '../../lib/ai/vectorIndex';
import { PageExtractor } from '../../lib/parsers/urlParser';
import { ItemStore } from '../../lib/store/itemStore';
import { InvalidContentError, ItemNotFoundError } from '../../lib/errors';
import helpers from '../../lib/helpers';
import { ddl } from '../../lib/dd';
import { IChunkingOptions, ChunkRecord, IndexedChunk } from '../../types/chunk';
import { IngestInput, Item, ItemFilter, NewItem } from '../../types/item';

export interface ItemServiceOptions extends IChunkingOptions {
    maxNoteLength: number;
}

export interface IngestResult {
    item: Item;
    chunkCount: number;
}

export interface RebuildResult {
    items: number;
    chunks: number;
}

export class ItemService {
    // Items between store.create and index insert, and those deleted meanwhile
    private readonly ingesting = new Set<string>();
    private readonly deletedWhileIngesting = new Set<string>();

    constructor(
        private readonly store: ItemStore,
        private readonly index: VectorIndex,
        private readonly embeddingService: EmbeddingService,
        private readonly pageExtractor: PageExtractor,
        private readonly options: ItemServiceOptions
    ) {}

    /**
     * Store, chunk, embed and index one item.
     * Either every step succeeds or the item is gone from store and index.
     */
    async ingest(input: IngestInput): Promise<IngestResult> {
        const draft = await this.resolveDraft(input);
        const item = await this.store.create(draft);
        this.ingesting.add(item.id);

        try {
            const entries = await this.buildEntries(item);
            this.assertNotDeleted(item.id);
            await this.store.saveChunks(
                item.id,
                entries.map(({ chunk }) => this.toChunkRecord(chunk))
            );
            this.assertNotDeleted(item.id);
            this.index.insertMany(entries);

            ddl('item ingested ->', item.id, `${entries.length} chunks`);
            return { item, chunkCount: entries.length };
        } catch (error) {
            await this.rollback(item.id);
            throw error;
        } finally {
            this.ingesting.delete(item.id);
            this.deletedWhileIngesting.delete(item.id);
        }
    }

    async get(itemId: string): Promise<Item> {
        const item = await this.store.get(itemId);
        if (!item) {
            throw new ItemNotFoundError(itemId);
        }
        return item;
    }

    async list(filter: ItemFilter = {}): Promise<Item[]> {
        return this.store.list(filter);
    }

    async listChunks(itemId: string): Promise<ChunkRecord[]> {
        await this.get(itemId);
        return this.store.listChunks(itemId);
    }

    /**
     * Store first: if it fails the index is untouched and the call can be retried.
     * The index is cleared even when the store no longer has the item.
     */
    async delete(itemId: string): Promise<void> {
        const deleted = await this.store.delete(itemId);
        if (this.ingesting.has(itemId)) {
            this.deletedWhileIngesting.add(itemId);
        }
        const removed = this.index.removeByItem(itemId);
        if (!deleted) {
            throw new ItemNotFoundError(itemId);
        }
        ddl('item deleted ->', itemId, `${removed} chunks unindexed`);
    }

    /**
     * Re-embed every stored item into an empty index, oldest first
     */
    async rebuildIndex(): Promise<RebuildResult> {
        this.index.clear();

        const items = (await this.store.list()).reverse();
        let chunks = 0;

        for (const item of items) {
            const entries = await this.buildEntries(item);
            this.index.insertMany(entries);
            chunks += entries.length;
        }

        return { items: items.length, chunks };
    }

    private async resolveDraft(input: IngestInput): Promise<NewItem> {
        switch (input.kind) {
            case 'note':
                return {
                    source: { kind: 'note' },
                    rawText: this.validateNote(input.text),
                };
            case 'url': {
                const url = this.validateUrl(input.url);
                const rawText = await this.pageExtractor.extract(url);
                return { source: { kind: 'url', originUrl: url }, rawText };
            }
            default: {
                const unknownInput: never = input;
                throw new InvalidContentError(
                    `Unsupported source: ${JSON.stringify(unknownInput)}`
                );
            }
        }
    }

    private validateNote(text: string): string {
        if (!text.trim()) {
            throw new InvalidContentError('Note content must not be empty');
        }
        if (text.length > this.options.maxNoteLength) {
            throw new InvalidContentError(
                `Note content exceeds maximum length of ${this.options.maxNoteLength} characters`
            );
        }
        return text;
    }

    private validateUrl(raw: string): string {
        const url = raw.trim();
        if (!url.startsWith('http://') && !url.startsWith('https://')) {
            throw new InvalidContentError(
                'URL must start with http:// or https://'
            );
        }
        try {
            new URL(url);
        } catch {
            throw new InvalidContentError(`Invalid URL: ${url}`);
        }
        return url;
    }

    private async buildEntries(item: Item): Promise<IndexEntry[]> {
        const spans = fixedChunk(item.rawText, {
            chunkSize: this.options.chunkSize,
            chunkOverlap: this.options.chunkOverlap,
        });
        const embeddings = await this.embeddingService.embed(
            spans.map((span) => span.text)
        );

        return spans.map((span, chunkIndex) => {
            const chunk: IndexedChunk = {
                chunkId: `${item.id}:${chunkIndex}`,
                itemId: item.id,
                chunkIndex,
                text: span.text,
                startOffset: span.startOffset,
                endOffset: span.endOffset,
                source: item.source,
            };
            return { chunk, embedding: embeddings[chunkIndex] };
        });
    }

    private assertNotDeleted(itemId: string): void {
        if (this.deletedWhileIngesting.has(itemId)) {
            throw new ItemNotFoundError(itemId);
        }
    }

    private toChunkRecord(chunk: IndexedChunk): ChunkRecord {
        return {
            chunkId: chunk.chunkId,
            itemId: chunk.itemId,
            chunkIndex: chunk.chunkIndex,
            text: chunk.text,
            startOffset: chunk.startOffset,
            endOffset: chunk.endOffset,
        };
    }

    private async rollback(itemId: string): Promise<void> {
        this.index.removeByItem(itemId);
        try {
            await this.store.delete(itemId);
        } catch (error) {
            console.error(
                `❌ Rollback failed for item ${itemId}:`,
                helpers.errorMessage(error)
            );
        }
    }
}
