import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import { ddl } from '../../lib/dd';
import { validate } from '../../middleware/validate';
import { IngestInput, Item } from '../../types/item';
import { ItemService } from './service';
import { createItemSchema, itemParamsSchema, listItemsSchema } from './schema';

const toItemResponse = (item: Item) => ({
    id: item.id,
    sourceKind: item.source.kind,
    url: item.source.kind === 'url' ? item.source.originUrl : null,
    content: item.rawText,
    createdAt: item.createdAt,
});

export class ItemController {
    constructor(private readonly itemService: ItemService) {}

    create = async (req: Request, res: Response) => {
        ddl('route: POST /api/v1/items');
        const { body } = validate(createItemSchema, req);

        const input: IngestInput =
            body.sourceKind === 'note'
                ? { kind: 'note', text: body.content }
                : { kind: 'url', url: body.content };

        const { item, chunkCount } = await this.itemService.ingest(input);

        return sendSuccess(req, res, { ...toItemResponse(item), chunkCount }, 201);
    };

    list = async (req: Request, res: Response) => {
        const { query } = validate(listItemsSchema, req);
        const items = await this.itemService.list({
            sourceKind: query.sourceKind,
        });

        return sendSuccess(req, res, items.map(toItemResponse), 200, {
            total: items.length,
        });
    };

    getOne = async (req: Request, res: Response) => {
        const { params } = validate(itemParamsSchema, req);
        const item = await this.itemService.get(params.itemId);

        return sendSuccess(req, res, toItemResponse(item));
    };

    getChunks = async (req: Request, res: Response) => {
        const { params } = validate(itemParamsSchema, req);
        const chunks = await this.itemService.listChunks(params.itemId);

        return sendSuccess(req, res, chunks, 200, { total: chunks.length });
    };

    delete = async (req: Request, res: Response) => {
        ddl('route: DELETE /api/v1/items/:itemId');
        const { params } = validate(itemParamsSchema, req);
        await this.itemService.delete(params.itemId);

        return sendSuccess(req, res, {
            id: params.itemId,
            message: 'Item deleted successfully',
        });
    };
}
