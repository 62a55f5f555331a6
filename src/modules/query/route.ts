import { Router } from 'express';
import { asyncHandler } from '../../lib/asyncHandler';
import { QueryController } from './controller';

export const createQueryRoutes = (controller: QueryController): Router => {
    const router = Router();

    router.post('/', asyncHandler(controller.ask));

    return router;
};
