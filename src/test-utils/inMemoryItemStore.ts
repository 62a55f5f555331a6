import { ItemStore } from '../lib/store/itemStore';
import { ChunkRecord } from '../types/chunk';
import { Item, ItemFilter, NewItem } from '../types/item';

type StoreOperation = keyof ItemStore;

/**
 * ItemStore held in memory; any operation can be made to fail
 */
export class InMemoryItemStore implements ItemStore {
    private readonly items = new Map<string, Item>();
    private readonly chunks = new Map<string, ChunkRecord[]>();
    private readonly failures = new Map<StoreOperation, Error>();
    private nextId = 1;
    private clock = Date.UTC(2024, 0, 1);

    failOn(operation: StoreOperation, error = new Error(`${operation} failed`)): void {
        this.failures.set(operation, error);
    }

    async create(draft: NewItem): Promise<Item> {
        this.check('create');
        const item: Item = {
            id: `item-${this.nextId++}`,
            source: draft.source,
            rawText: draft.rawText,
            createdAt: new Date(this.clock++),
        };
        this.items.set(item.id, item);
        return item;
    }

    async get(id: string): Promise<Item | null> {
        this.check('get');
        return this.items.get(id) ?? null;
    }

    async list(filter: ItemFilter = {}): Promise<Item[]> {
        this.check('list');
        return [...this.items.values()]
            .filter((item) => !filter.sourceKind || item.source.kind === filter.sourceKind)
            .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    }

    async delete(id: string): Promise<boolean> {
        this.check('delete');
        this.chunks.delete(id);
        return this.items.delete(id);
    }

    async saveChunks(itemId: string, chunks: ChunkRecord[]): Promise<void> {
        this.check('saveChunks');
        this.chunks.set(itemId, [...(this.chunks.get(itemId) ?? []), ...chunks]);
    }

    async listChunks(itemId: string): Promise<ChunkRecord[]> {
        this.check('listChunks');
        return this.chunks.get(itemId) ?? [];
    }

    async count(): Promise<number> {
        this.check('count');
        return this.items.size;
    }

    private check(operation: StoreOperation): void {
        const error = this.failures.get(operation);
        if (error) {
            throw error;
        }
    }
}
