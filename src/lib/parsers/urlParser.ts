// lib/parsers/urlParser.ts
import * as cheerio from 'cheerio';
import env from '../../config/env';
import { ExtractionFailedError } from '../errors';
import helpers from '../helpers';
import { ddl } from '../dd';

/**
 * Turns a web page into plain text
 */
export interface PageExtractor {
    extract(url: string): Promise<string>;
}

const USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const SUPPORTED_MEDIA_TYPES = new Set([
    'text/html',
    'application/xhtml+xml',
    'text/plain',
]);

const NON_CONTENT_SELECTORS =
    'script, style, nav, footer, header, noscript, template';

// Closing tags of block elements; text on either side must not run together
const BLOCK_END_TAG =
    /<\/(p|div|h[1-6]|li|dt|dd|tr|td|th|section|article|aside|main|blockquote|pre|ul|ol|dl|table|figcaption)\s*>/gi;

const collapseWhitespace = (text: string): string =>
    text.replace(/\s+/g, ' ').trim();

export function htmlToText(html: string): string {
    const spaced = html.replace(BLOCK_END_TAG, '$& ').replace(/<br\s*\/?>/gi, ' ');
    const $ = cheerio.load(spaced);
    $(NON_CONTENT_SELECTORS).remove();
    return collapseWhitespace($('body').text());
}

export class UrlParserService implements PageExtractor {
    constructor(private readonly timeoutMs: number) {}

    /**
     * Fetch a page and extract its readable text.
     * The body is read inside the same time limit as the request.
     */
    async extract(url: string): Promise<string> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            let response: Response;
            try {
                response = await fetch(url, {
                    headers: {
                        'User-Agent': USER_AGENT,
                        Accept: 'text/html,application/xhtml+xml,text/plain;q=0.9',
                    },
                    redirect: 'follow',
                    signal: controller.signal,
                });
            } catch (error) {
                throw this.requestFailure(url, error);
            }

            if (!response.ok) {
                throw new ExtractionFailedError(url, `HTTP ${response.status}`);
            }

            const mediaType = (response.headers.get('content-type') ?? 'text/html')
                .split(';')[0]
                .trim()
                .toLowerCase();

            if (!SUPPORTED_MEDIA_TYPES.has(mediaType)) {
                throw new ExtractionFailedError(
                    url,
                    `Unsupported content type: ${mediaType}`
                );
            }

            let body: string;
            try {
                body = await response.text();
            } catch (error) {
                throw this.requestFailure(url, error);
            }

            const text =
                mediaType === 'text/plain'
                    ? collapseWhitespace(body)
                    : htmlToText(body);

            if (!text) {
                throw new ExtractionFailedError(url, 'No text content found at URL');
            }

            ddl('extracted url ->', url, `${text.length} chars`);
            return text;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private requestFailure(url: string, error: unknown): ExtractionFailedError {
        if (error instanceof Error && error.name === 'AbortError') {
            return new ExtractionFailedError(url, 'Request timed out', error);
        }
        return new ExtractionFailedError(
            url,
            `Failed to fetch URL: ${helpers.errorMessage(error)}`,
            error
        );
    }
}

export const urlParser = new UrlParserService(env.EXTRACTION_TIMEOUT_MS);
