import { Request, Response } from 'express';
import { sendSuccess } from '../../lib/apiResponse';
import helpers from '../../lib/helpers';
import { ddl } from '../../lib/dd';
import { Citation, RAGService } from '../../lib/ai/RAGService';
import { validate } from '../../middleware/validate';
import { querySchema } from './schema';

const SNIPPET_LENGTH = 200;

/**
 * Source snippet shown under an answer
 */
export const toSourceSnippet = (citation: Citation) => ({
    itemId: citation.itemId,
    chunkId: citation.chunkId,
    content: helpers.truncate(citation.text, SNIPPET_LENGTH),
    sourceKind: citation.source.kind,
    url: citation.source.kind === 'url' ? citation.source.originUrl : null,
    relevanceScore: Number(citation.relevanceScore.toFixed(4)),
});

export class QueryController {
    constructor(
        private readonly ragService: RAGService,
        private readonly defaultMaxResults: number
    ) {}

    ask = async (req: Request, res: Response) => {
        ddl('route: POST /api/v1/query');
        const { body } = validate(querySchema, req);

        const result = await this.ragService.answer(
            body.question,
            body.maxResults ?? this.defaultMaxResults
        );

        return sendSuccess(req, res, {
            question: result.question,
            answer: result.answer,
            sources: result.citations.map(toSourceSnippet),
            model: result.model,
        });
    };
}
