import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import env from './config/env';
import { errorHandler, notFoundHandler } from './middleware/error';
import { requestIdMiddleware } from './middleware/requestId';
import { asyncHandler } from './lib/asyncHandler';
import { Services } from './services';

// Route imports
import { createRoutes } from './routes';

export const createApp = (services: Services): Express => {
    const app = express();

    // Request ID middleware (should be early in the chain)
    app.use(requestIdMiddleware);

    // Security and performance middleware
    app.use(helmet());
    app.use(
        cors({
            origin: env.CORS_ORIGIN,
            credentials: true,
        })
    );
    app.use(compression());

    // Body parsing middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Logging middleware
    if (env.NODE_ENV === 'development') {
        app.use(morgan('dev'));
    } else if (env.NODE_ENV === 'production') {
        app.use(morgan('combined'));
    }

    // Health check endpoint
    app.get(
        '/health',
        asyncHandler(async (req, res) => {
            const itemCount = await services.store.count();
            res.json({
                status: 'ok',
                items: itemCount,
                index: services.index.stats(),
                providers: {
                    embedding: services.embeddingService.providerName,
                    llm: `${services.llmService.providerName}/${services.llmService.model}`,
                },
                timestamp: new Date().toISOString(),
            });
        })
    );

    // API routes
    app.use('/api/v1', createRoutes(services));

    // Error handling
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
};
