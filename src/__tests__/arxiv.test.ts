import { describe, it, expect } from 'vitest';
import { ArxivClient } from '../sources/arxiv.js';
import { isArxivId, stripArxivVersion, toWire } from '../sources/utils.js';
import { ParseError, ValidationError } from '../utils/errors.js';
import { calledHeaders, calledUrl, mockFetch, readFixture, testConfig, testHttpClient, textResponse } from './helpers.js';

const ERROR_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format_for_2399.99999</id>
    <title>Error</title>
    <summary>incorrect id format for 2399.99999</summary>
  </entry>
</feed>`;

const EMPTY_FEED = '<?xml version="1.0" encoding="UTF-8"?><feed xmlns="http://www.w3.org/2005/Atom"><title>empty</title></feed>';

function createClient(): ArxivClient {
    return new ArxivClient(testHttpClient(), testConfig().arxiv);
}

describe('ArxivClient', () => {
    describe('search', () => {
        it('should search all fields when the query has no prefix', async () => {
            const fetchMock = mockFetch(textResponse(readFixture('arxiv-feed.xml')));

            const papers = await createClient().search('lithium tailings', 5, 'submittedDate');

            const url = calledUrl(fetchMock);
            expect(`${url.origin}${url.pathname}`).toBe('https://export.arxiv.org/api/query');
            expect(url.searchParams.get('search_query')).toBe('all:lithium tailings');
            expect(url.searchParams.get('start')).toBe('0');
            expect(url.searchParams.get('max_results')).toBe('5');
            expect(url.searchParams.get('sortBy')).toBe('submittedDate');
            expect(url.searchParams.get('sortOrder')).toBe('descending');
            expect(calledHeaders(fetchMock).get('accept')).toBe('application/atom+xml');
            expect(papers.map((paper) => paper.id)).toEqual(['2301.07041v2', 'cs.AI/0001001v1']);
        });

        it('should pass field-prefixed queries through', async () => {
            const fetchMock = mockFetch(textResponse(EMPTY_FEED));

            await createClient().search('ti:graphite AND au:sample');

            expect(calledUrl(fetchMock).searchParams.get('search_query')).toBe('ti:graphite AND au:sample');
            expect(calledUrl(fetchMock).searchParams.get('sortBy')).toBe('relevance');
        });

        it('should trim the result list to max_results', async () => {
            mockFetch(textResponse(readFixture('arxiv-feed.xml')));
            const papers = await createClient().search('lithium', 1);
            expect(papers).toHaveLength(1);
        });

        it.each([0, 101, 2.5])('should reject max_results=%s without a request', async (maxResults) => {
            const fetchMock = mockFetch();

            const error = await createClient().search('lithium', maxResults).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({ param: 'max_results' });
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should reject a blank query', async () => {
            const fetchMock = mockFetch();
            await expect(createClient().search('   ')).rejects.toMatchObject({ param: 'query' });
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });

    describe('getById', () => {
        it('should reject malformed identifiers before any request', async () => {
            const fetchMock = mockFetch();

            await expect(createClient().getById('lithium-paper')).rejects.toMatchObject({
                kind: 'ValidationError',
                param: 'arxiv_id',
            });
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should query id_list without the version suffix', async () => {
            const fetchMock = mockFetch(textResponse(readFixture('arxiv-feed.xml')));

            const paper = await createClient().getById('2301.07041v2');

            expect(calledUrl(fetchMock).searchParams.get('id_list')).toBe('2301.07041');
            expect(paper?.title).toBe('Recovering Lithium from Mine Tailings');
        });

        it('should return null when arXiv answers with an error entry', async () => {
            mockFetch(textResponse(ERROR_FEED));
            expect(await createClient().getById('2399.99999')).toBeNull();
        });

        it('should return null for an empty feed', async () => {
            mockFetch(textResponse(EMPTY_FEED));
            expect(await createClient().getById('cs.AI/0001001')).toBeNull();
        });
    });

    describe('parseFeed', () => {
        it('should normalize a full entry', () => {
            const [paper] = createClient().parseFeed(readFixture('arxiv-feed.xml'));

            expect(paper).toBeDefined();
            expect(toWire(paper ?? fail())).toEqual({
                source: 'arxiv',
                id: '2301.07041v2',
                title: 'Recovering Lithium from Mine Tailings',
                abstract: 'We study lithium recovery from tailings.',
                published: '2023-01-17T18:30:00Z',
                updated: '2023-02-01T10:00:00Z',
                pdf_url: 'http://arxiv.org/pdf/2301.07041v2',
                abs_url: 'http://arxiv.org/abs/2301.07041v2',
                primary_category: 'physics.geo-ph',
                comment: '12 pages, 4 figures',
                journal_ref: 'Minerals Letters 4 (2023)',
                doi: '10.1000/example.1',
                year: 2023,
                authors: ['Ada Example', 'Ben Sample', 'Cy Placeholder', 'Dee Test'],
                categories: ['physics.geo-ph', 'cond-mat.mtrl-sci'],
            });
        });

        it('should keep absent fields distinct and derive the PDF link', () => {
            const papers = createClient().parseFeed(readFixture('arxiv-feed.xml'));
            const old = papers[1];

            expect(old?.text['abstract']).toEqual({ present: false });
            expect(old?.text['doi']).toEqual({ present: false });
            expect(old?.text['pdf_url']).toEqual({ present: true, value: 'http://arxiv.org/pdf/cs.AI/0001001v1.pdf' });
            expect(old?.numbers['year']).toEqual({ present: true, value: 2000 });
            expect(old?.lists['authors']).toEqual(['Eve Author']);
        });

        it('should skip entries without a title', () => {
            const papers = createClient().parseFeed(readFixture('arxiv-feed.xml'));
            expect(papers.map((paper) => paper.id)).not.toContain('2302.00001v1');
            expect(papers).toHaveLength(2);
        });

        it('should raise ParseError for malformed XML', () => {
            expect(() => createClient().parseFeed('<feed><entry></feed>')).toThrow(ParseError);
        });

        it('should raise ParseError when there is no feed element', () => {
            expect(() => createClient().parseFeed('<html><body>maintenance</body></html>')).toThrow(
                'arXiv response has no feed element'
            );
        });
    });
});

describe('arXiv identifiers', () => {
    it.each(['2301.07041', '2301.07041v3', '0704.0001', 'cs.AI/0001001', 'hep-th/9901001v2'])('should accept %s', (id) => {
        expect(isArxivId(id)).toBe(true);
    });

    it.each(['', '2301', 'abc.defgh', '2301.07041 OR 1', 'cs.AI/01'])('should reject %j', (id) => {
        expect(isArxivId(id)).toBe(false);
    });

    it('should strip the version suffix', () => {
        expect(stripArxivVersion('2301.07041v12')).toBe('2301.07041');
        expect(stripArxivVersion('cs.AI/0001001')).toBe('cs.AI/0001001');
    });
});

function fail(): never {
    throw new Error('expected a record');
}
