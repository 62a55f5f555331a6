// lib/store/mongoItemStore.ts
import { ItemModel } from '../../models/item';
import { ChunkModel } from '../../models/chunk';
import { IItemDocument, Item, ItemFilter, ItemSource, NewItem } from '../../types/item';
import { ChunkRecord, IChunkDocument } from '../../types/chunk';
import { ItemNotFoundError } from '../errors';
import helpers from '../helpers';
import { ddl } from '../dd';
import { ItemStore } from './itemStore';

/**
 * MongoDB-backed item store
 */
export class MongoItemStore implements ItemStore {
    async create(item: NewItem): Promise<Item> {
        const doc = await ItemModel.create({
            sourceKind: item.source.kind,
            originUrl:
                item.source.kind === 'url' ? item.source.originUrl : undefined,
            rawText: item.rawText,
        });
        ddl('item created ->', doc._id.toString());
        return this.toItem(doc);
    }

    async get(id: string): Promise<Item | null> {
        const objectId = helpers.toObjectId(id);
        if (!objectId) {
            return null;
        }
        const doc = await ItemModel.findById(objectId);
        return doc ? this.toItem(doc) : null;
    }

    async list(filter: ItemFilter = {}): Promise<Item[]> {
        const query = filter.sourceKind ? { sourceKind: filter.sourceKind } : {};
        const docs = await ItemModel.find(query).sort({ createdAt: -1, _id: -1 });
        return docs.map((doc) => this.toItem(doc));
    }

    async delete(id: string): Promise<boolean> {
        const objectId = helpers.toObjectId(id);
        if (!objectId) {
            return false;
        }
        await ChunkModel.deleteMany({ itemId: objectId });
        const result = await ItemModel.deleteOne({ _id: objectId });
        if (result.deletedCount === 0) {
            return false;
        }
        ddl('item deleted ->', id);
        return true;
    }

    async saveChunks(itemId: string, chunks: ChunkRecord[]): Promise<void> {
        const objectId = helpers.toObjectId(itemId);
        if (!objectId) {
            throw new ItemNotFoundError(itemId);
        }
        if (chunks.length === 0) {
            return;
        }
        await ChunkModel.insertMany(
            chunks.map((chunk) => ({
                itemId: objectId,
                chunkId: chunk.chunkId,
                chunkIndex: chunk.chunkIndex,
                text: chunk.text,
                startOffset: chunk.startOffset,
                endOffset: chunk.endOffset,
            }))
        );
    }

    async listChunks(itemId: string): Promise<ChunkRecord[]> {
        const objectId = helpers.toObjectId(itemId);
        if (!objectId) {
            return [];
        }
        const docs = await ChunkModel.find({ itemId: objectId }).sort({
            chunkIndex: 1,
        });
        return docs.map((doc) => this.toChunkRecord(doc));
    }

    async count(): Promise<number> {
        return ItemModel.countDocuments();
    }

    private toItem(doc: IItemDocument): Item {
        return {
            id: doc._id.toString(),
            source: this.toSource(doc),
            rawText: doc.rawText,
            createdAt: doc.createdAt,
        };
    }

    private toSource(doc: IItemDocument): ItemSource {
        switch (doc.sourceKind) {
            case 'note':
                return { kind: 'note' };
            case 'url':
                if (!doc.originUrl) {
                    throw new Error(
                        `Item ${doc._id.toString()} is a url item without an origin url`
                    );
                }
                return { kind: 'url', originUrl: doc.originUrl };
            default: {
                const unknownKind: never = doc.sourceKind;
                throw new Error(`Unknown source kind: ${String(unknownKind)}`);
            }
        }
    }

    private toChunkRecord(doc: IChunkDocument): ChunkRecord {
        return {
            chunkId: doc.chunkId,
            itemId: doc.itemId.toString(),
            chunkIndex: doc.chunkIndex,
            text: doc.text,
            startOffset: doc.startOffset,
            endOffset: doc.endOffset,
        };
    }
}
