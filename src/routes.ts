import { Router } from 'express';
import { Services } from './services';
import { ItemController } from './modules/items/controller';
import { createItemRoutes } from './modules/items/route';
import { QueryController } from './modules/query/controller';
import { createQueryRoutes } from './modules/query/route';
import env from './config/env';

export const createRoutes = (services: Services): Router => {
    const router = Router();

    router.use('/items', createItemRoutes(new ItemController(services.itemService)));
    router.use(
        '/query',
        createQueryRoutes(new QueryController(services.ragService, env.MAX_RESULTS))
    );

    return router;
};
