import env from './config/env';
import { EmbeddingService } from './lib/ai/embeddingService';
import { LLMService } from './lib/ai/LLMService';
import { RAGService } from './lib/ai/RAGService';
import { VectorIndex } from './lib/ai/vectorIndex';
import { PageExtractor, urlParser } from './lib/parsers/urlParser';
import { ItemStore } from './lib/store/itemStore';
import { MongoItemStore } from './lib/store/mongoItemStore';
import { ItemService } from './modules/items/service';
import { EmbeddingProviderFactory } from './provider/embeddingProviderFactory';
import { LLMProviderFactory } from './provider/LLMProviderFactory';
import { EmbeddingProvider } from './types/embedding';
import { LLMProvider } from './types/llm';

export interface Services {
    store: ItemStore;
    index: VectorIndex;
    embeddingService: EmbeddingService;
    llmService: LLMService;
    itemService: ItemService;
    ragService: RAGService;
}

export interface ServiceOverrides {
    store?: ItemStore;
    embeddingProvider?: EmbeddingProvider;
    llmProvider?: LLMProvider;
    pageExtractor?: PageExtractor;
}

/**
 * Wire the pipelines around one shared vector index
 */
export const createServices = (overrides: ServiceOverrides = {}): Services => {
    const store = overrides.store ?? new MongoItemStore();
    const index = new VectorIndex();
    const embeddingService = new EmbeddingService(
        overrides.embeddingProvider ?? EmbeddingProviderFactory.createFromEnv()
    );
    const llmService = new LLMService(
        overrides.llmProvider ?? LLMProviderFactory.createFromEnv(),
        { temperature: env.TEMPERATURE, maxTokens: env.MAX_ANSWER_TOKENS }
    );

    const itemService = new ItemService(
        store,
        index,
        embeddingService,
        overrides.pageExtractor ?? urlParser,
        {
            chunkSize: env.CHUNK_SIZE,
            chunkOverlap: env.CHUNK_OVERLAP,
            maxNoteLength: env.MAX_NOTE_LENGTH,
        }
    );
    const ragService = new RAGService(embeddingService, index, llmService, {
        maxContextTokens: env.MAX_CONTEXT_TOKENS,
    });

    return {
        store,
        index,
        embeddingService,
        llmService,
        itemService,
        ragService,
    };
};
