import { Router } from 'express';
import { asyncHandler } from '../../lib/asyncHandler';
import { ItemController } from './controller';

export const createItemRoutes = (controller: ItemController): Router => {
    const router = Router();

    router.post('/', asyncHandler(controller.create));
    router.get('/', asyncHandler(controller.list));
    router.get('/:itemId', asyncHandler(controller.getOne));
    router.get('/:itemId/chunks', asyncHandler(controller.getChunks));
    router.delete('/:itemId', asyncHandler(controller.delete));

    return router;
};
