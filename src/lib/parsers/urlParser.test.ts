import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { UrlParserService, htmlToText } from './urlParser';
import { ExtractionFailedError } from '../errors';

const PAGE = [
    '<html><head><title>Page</title><style>p { color: red; }</style></head>',
    '<body><header>Site menu</header><nav><a href="/">Home</a></nav>',
    '<h1>Knowledge</h1><p>First paragraph.</p><p>Second<br>line</p>',
    '<script>var x = 1;</script><footer>Copyright</footer></body></html>',
].join('');

const htmlResponse = (html: string, status = 200): Response =>
    new Response(html, {
        status,
        headers: { 'Content-Type': 'text/html; charset=utf-8' },
    });

describe('htmlToText', () => {
    it('keeps body text and drops page chrome and scripts', () => {
        expect(htmlToText(PAGE)).toBe('Knowledge First paragraph. Second line');
    });

    it('separates adjacent block elements', () => {
        expect(htmlToText('<div>One</div><div>Two</div>')).toBe('One Two');
    });

    it('collapses whitespace runs', () => {
        expect(htmlToText('<p>  lots \n\n of\t space </p>')).toBe(
            'lots of space'
        );
    });
});

describe('UrlParserService', () => {
    const fetchMock = vi.fn<typeof fetch>();
    const parser = new UrlParserService(1000);

    const reasonOf = async (url: string): Promise<string> => {
        const error = await parser.extract(url).catch((e: unknown) => e);
        if (!(error instanceof ExtractionFailedError)) {
            throw new Error('expected ExtractionFailedError');
        }
        return error.reason;
    };

    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('extracts text from an html page', async () => {
        fetchMock.mockResolvedValueOnce(htmlResponse(PAGE));

        await expect(parser.extract('https://example.com/post')).resolves.toBe(
            'Knowledge First paragraph. Second line'
        );

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('https://example.com/post');
        expect(init?.headers).toMatchObject({
            'User-Agent': expect.stringContaining('Mozilla/5.0'),
        });
    });

    it('accepts plain text', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response('plain\n\ntext body', {
                headers: { 'Content-Type': 'text/plain' },
            })
        );

        await expect(parser.extract('https://example.com/a.txt')).resolves.toBe(
            'plain text body'
        );
    });

    it('fails on a non-2xx status', async () => {
        fetchMock.mockResolvedValueOnce(htmlResponse('missing', 404));

        const error = await parser
            .extract('https://example.com/missing')
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ExtractionFailedError);
        expect(error).toMatchObject({
            message: 'Failed to extract URL content: HTTP 404',
            statusCode: 422,
            errorCode: 'EXTRACTION_FAILED',
            data: {
                stage: 'extraction',
                url: 'https://example.com/missing',
                reason: 'HTTP 404',
            },
        });
    });

    it('fails on an unsupported content type', async () => {
        fetchMock.mockResolvedValueOnce(
            new Response('%PDF-1.7', {
                headers: { 'Content-Type': 'application/pdf' },
            })
        );

        expect(await reasonOf('https://example.com/doc.pdf')).toBe(
            'Unsupported content type: application/pdf'
        );
    });

    it('fails when the page has no text', async () => {
        fetchMock.mockResolvedValueOnce(
            htmlResponse('<html><body><script>app()</script></body></html>')
        );

        expect(await reasonOf('https://example.com/app')).toBe(
            'No text content found at URL'
        );
    });

    it('fails when the host cannot be reached', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('getaddrinfo ENOTFOUND'));

        expect(await reasonOf('https://unreachable.test')).toBe(
            'Failed to fetch URL: getaddrinfo ENOTFOUND'
        );
    });

    it('gives up after the timeout', async () => {
        fetchMock.mockImplementationOnce(
            (_input, init) =>
                new Promise<Response>((_resolve, reject) => {
                    init?.signal?.addEventListener('abort', () =>
                        reject(Object.assign(new Error('aborted'), { name: 'AbortError' }))
                    );
                })
        );
        const slowParser = new UrlParserService(20);

        const error = await slowParser
            .extract('https://slow.test')
            .catch((e: unknown) => e);

        expect(error).toMatchObject({ reason: 'Request timed out' });
    });
});
