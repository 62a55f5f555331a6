import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

dotenv.config({ path: path.resolve(__dirname, '../../.env') });

const envSchema = z
    .object({
        PORT: z.coerce.number().int().positive().default(3000),
        NODE_ENV: z
            .enum(['development', 'production', 'test'])
            .default('development'),
        CORS_ORIGIN: z.string().default('http://localhost:5173'),

        MONGO_URI: z
            .string()
            .default('mongodb://localhost:27017/knowledge_inbox'),
        MONGO_DB_NAME: z.string().default('knowledge_inbox'),
        MONGO_MAX_POOL_SIZE: z.string().default('10'),
        MONGO_MIN_POOL_SIZE: z.string().default('2'),

        ENABLE_LOGS: z.string().default('true'),

        // AI providers
        EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
        LLM_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
        OPENAI_API_KEY: z.string().default(''),
        OPENAI_BASE_URL: z.string().default('https://api.openai.com/v1'),
        OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
        OPENAI_LLM_MODEL: z.string().default('gpt-4o-mini'),
        OLLAMA_BASE_URL: z.string().default('http://localhost:11434'),
        OLLAMA_EMBEDDING_MODEL: z.string().default('nomic-embed-text'),
        OLLAMA_LLM_MODEL: z.string().default('llama3.1'),
        EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),

        // Upper bounds on external calls
        EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
        LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
        EXTRACTION_TIMEOUT_MS: z.coerce
            .number()
            .int()
            .positive()
            .default(10000),

        // Retrieval
        CHUNK_SIZE: z.coerce.number().int().positive().default(500),
        CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(50),
        MAX_RESULTS: z.coerce.number().int().min(1).max(10).default(5),
        MAX_CONTEXT_TOKENS: z.coerce.number().int().positive().default(4000),
        MAX_NOTE_LENGTH: z.coerce.number().int().positive().default(50000),

        // Generation
        TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
        MAX_ANSWER_TOKENS: z.coerce.number().int().positive().default(800),
    })
    .refine((value) => value.CHUNK_OVERLAP < value.CHUNK_SIZE, {
        message: 'CHUNK_OVERLAP must be smaller than CHUNK_SIZE',
        path: ['CHUNK_OVERLAP'],
    });

const env = envSchema.parse(process.env);

export type Env = z.infer<typeof envSchema>;

export default env;
