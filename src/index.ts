import { createApp } from './app';
import env from './config/env';
import database from './lib/database';
import helpers from './lib/helpers';
import { createServices } from './services';

const main = async () => {
    try {
        await database.connect();
        console.log('Database connected successfully');

        const services = createServices();

        // Searches must see every stored item before the first request
        const rebuilt = await services.itemService.rebuildIndex();
        console.log(
            `📚 Vector index rebuilt: ${rebuilt.items} items, ${rebuilt.chunks} chunks`
        );

        const app = createApp(services);

        // Start Express server
        const server = app.listen(env.PORT, () => {
            console.log(`🚀 API server running on port ${env.PORT}`);
            console.log(`📊 Environment: ${env.NODE_ENV}`);
            console.log(`🔗 Health check: http://localhost:${env.PORT}/health`);
        });

        let shuttingDown = false;

        // Graceful shutdown handlers
        const gracefulShutdown = (signal: string) => {
            if (shuttingDown) {
                return;
            }
            shuttingDown = true;
            console.log(`\n${signal} received. Starting graceful shutdown...`);

            // Stop accepting new connections
            server.close(() => {
                console.log('✅ HTTP server closed');

                // Disconnect from MongoDB
                database
                    .disconnect()
                    .then(() => {
                        console.log('✅ Graceful shutdown completed');
                        process.exit(0);
                    })
                    .catch((error: unknown) => {
                        console.error('❌ Error during shutdown:', error);
                        process.exit(1);
                    });
            });

            // Force shutdown after 30 seconds
            setTimeout(() => {
                console.error('⚠️ Forced shutdown after timeout');
                process.exit(1);
            }, 30000).unref();
        };

        // Listen for termination signals
        process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
        process.on('SIGINT', () => gracefulShutdown('SIGINT'));

        // Handle uncaught exceptions
        process.on('uncaughtException', (error) => {
            console.error('❌ Uncaught Exception:', error);
            gracefulShutdown('UNCAUGHT_EXCEPTION');
        });

        // Handle unhandled promise rejections
        process.on('unhandledRejection', (reason) => {
            console.error('❌ Unhandled Rejection:', reason);
            gracefulShutdown('UNHANDLED_REJECTION');
        });
    } catch (error) {
        console.error('❌ Failed to start server:', helpers.errorMessage(error));
        await database.disconnect().catch((disconnectError: unknown) => {
            console.error('❌ Error during shutdown:', disconnectError);
        });
        process.exit(1);
    }
};

void main();
