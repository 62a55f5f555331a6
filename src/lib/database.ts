import mongoose from 'mongoose';
import { dbConfig } from '../config/database';
import env from '../config/env';
import helpers from './helpers';

/**
 * Database Connection Class
 */
class Database {
    private connection: mongoose.Connection | null = null;
    private isConnected = false;
    private connectionAttempts = 0;

    /**
     * Connect to MongoDB with retry logic
     */
    async connect(): Promise<mongoose.Connection> {
        const uri = dbConfig.mongoURI;
        const dbName = dbConfig.databaseName;
        const { options, retry } = dbConfig;

        // Mask password in logs
        const maskedUri = uri.replace(/:([^@/]+)@/, ':****@');

        console.log(`📦 Connecting to MongoDB: ${maskedUri}`);

        for (;;) {
            try {
                this.connectionAttempts++;

                await mongoose.connect(uri, { ...options, dbName });
                this.connection = mongoose.connection;
                this.isConnected = true;

                console.log(`✅ MongoDB connected successfully`);
                console.log(`   Host: ${this.connection.host}`);
                console.log(`   Database: ${this.connection.name}`);
                console.log(`   Pool Size: ${options.maxPoolSize}`);

                this.setupEventListeners();

                // Reset attempts on successful connection
                this.connectionAttempts = 0;

                return this.connection;
            } catch (error) {
                console.error(
                    `❌ MongoDB connection attempt ${this.connectionAttempts} failed:`,
                    helpers.errorMessage(error)
                );

                if (this.connectionAttempts >= retry.maxAttempts) {
                    console.error(
                        '🚨 Max connection attempts reached. Giving up.'
                    );
                    throw error;
                }

                // Exponential backoff
                const delay = Math.min(
                    retry.initialDelayMs *
                        Math.pow(2, this.connectionAttempts - 1),
                    retry.maxDelayMs
                );

                console.log(`⏳ Retrying in ${delay / 1000} seconds...`);
                await helpers.sleep(delay);
            }
        }
    }

    /**
     * Setup Mongoose event listeners
     */
    private setupEventListeners(): void {
        const db = mongoose.connection;

        db.on('disconnected', () => {
            this.isConnected = false;
            console.log('📕 MongoDB disconnected');
        });

        db.on('reconnected', () => {
            this.isConnected = true;
            console.log('📘 MongoDB reconnected');
        });

        db.on('error', (error: Error) => {
            this.isConnected = false;
            console.error('📙 MongoDB error:', error.message);
        });

        if (env.NODE_ENV === 'development') {
            db.on('close', () => {
                console.log('📁 MongoDB connection closed');
            });
        }
    }

    /**
     * Graceful disconnect
     */
    async disconnect(): Promise<void> {
        if (!this.isConnected) {
            console.log('MongoDB already disconnected');
            return;
        }

        try {
            await mongoose.connection.close();
            this.isConnected = false;
            console.log('✅ MongoDB disconnected gracefully');
        } catch (error) {
            console.error(
                '❌ Error disconnecting from MongoDB:',
                helpers.errorMessage(error)
            );
            throw error;
        }
    }
}

// Create singleton instance
const database = new Database();

export default database;
