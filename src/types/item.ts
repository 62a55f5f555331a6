import { Document, Types } from 'mongoose';

export type SourceKind = 'note' | 'url';

/**
 * Where an item's text came from. Only url items carry an origin URL.
 */
export type ItemSource = { kind: 'note' } | { kind: 'url'; originUrl: string };

/**
 * Ingestion input: a typed note, or a URL whose page text is extracted
 */
export type IngestInput =
    | { kind: 'note'; text: string }
    | { kind: 'url'; url: string };

export interface Item {
    id: string;
    source: ItemSource;
    rawText: string;
    createdAt: Date;
}

export type NewItem = Omit<Item, 'id' | 'createdAt'>;

export interface ItemFilter {
    sourceKind?: SourceKind;
}

// Persistence shape
export interface IItem {
    sourceKind: SourceKind;
    originUrl?: string;
    rawText: string;
    createdAt: Date;
    updatedAt: Date;
}

export interface IItemDocument extends IItem, Document {
    _id: Types.ObjectId;
}
