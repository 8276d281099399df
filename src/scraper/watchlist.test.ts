import { WatchlistScraper } from './watchlist';
import { PageFetcher, PageResponse } from './transport';
import { FetchError, ParseError, UserNotFoundError } from '../util/errors';

// Mock logger to suppress noise
jest.mock('../util/logger', () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
}));

function posterPage(titles: string[], hasNext: boolean): string {
    const posters = titles
        .map(title => `<li class="poster-container"><div class="film-poster"><img alt="${title}" src="poster.jpg" /></div></li>`)
        .join('\n');
    const pagination = hasNext
        ? '<div class="paginate-nextprev"><a class="next" href="/someone/watchlist/page/2/">Older</a></div>'
        : '';

    return `<html><body><ul class="poster-list">${posters}</ul>${pagination}</body></html>`;
}

function titlesFor(page: number, count: number): string[] {
    return Array.from({ length: count }, (_, i) => `Film ${page}-${i + 1}`);
}

function fakeFetcher(pages: Record<string, PageResponse>) {
    return jest.fn<ReturnType<PageFetcher>, Parameters<PageFetcher>>(async (url) => {
        return pages[url] ?? { status: 404, body: 'Not found' };
    });
}

const BASE = 'https://letterboxd.com/alice/watchlist/';

describe('WatchlistScraper', () => {
    it('should follow pagination until a page has no entries', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: posterPage(titlesFor(1, 5), true) },
            [`${BASE}page/2/`]: { status: 200, body: posterPage(titlesFor(2, 5), true) },
            [`${BASE}page/3/`]: { status: 200, body: posterPage(titlesFor(3, 3), true) },
            [`${BASE}page/4/`]: { status: 200, body: posterPage([], false) },
        });

        const watchlist = await new WatchlistScraper('alice', fetchPage).getWatchlist();

        expect(watchlist).toHaveLength(13);
        expect(watchlist).toEqual([...titlesFor(1, 5), ...titlesFor(2, 5), ...titlesFor(3, 3)]);
        expect(fetchPage.mock.calls.map(([url]) => url)).toEqual([
            BASE,
            `${BASE}page/2/`,
            `${BASE}page/3/`,
            `${BASE}page/4/`,
        ]);
    });

    it('should stop after a page without a next link', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: posterPage(['Heat', 'Se7en', 'Arrival'], false) },
        });

        const watchlist = await new WatchlistScraper('alice', fetchPage).getWatchlist();

        expect(watchlist).toEqual(['Heat', 'Se7en', 'Arrival']);
        expect(fetchPage).toHaveBeenCalledTimes(1);
    });

    it('should keep duplicate titles in listing order', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: posterPage(['Heat', 'Dune', 'Heat'], false) },
        });

        await expect(new WatchlistScraper('alice', fetchPage).getWatchlist()).resolves.toEqual(['Heat', 'Dune', 'Heat']);
    });

    it('should read titles from lazy poster components', async () => {
        const body = `
            <ul class="grid">
                <li class="griditem"><div class="react-component" data-item-name="Heat (1995)"></div></li>
                <li class="griditem"><div class="react-component" data-film-name="Arrival"></div></li>
            </ul>`;
        const fetchPage = fakeFetcher({ [BASE]: { status: 200, body } });

        await expect(new WatchlistScraper('alice', fetchPage).getWatchlist()).resolves.toEqual(['Heat (1995)', 'Arrival']);
    });

    it('should return an empty watchlist when the page says it is empty', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: '<html><body><section><p>No films in watchlist.</p></section></body></html>' },
        });

        await expect(new WatchlistScraper('alice', fetchPage).getWatchlist()).resolves.toEqual([]);
    });

    it('should THROW ParseError if the first page has no entries and no empty notice', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: '<html><body><div class="some-random-new-layout"></div></body></html>' },
        });

        const result = new WatchlistScraper('alice', fetchPage).getWatchlist();

        await expect(result).rejects.toThrow(ParseError);
        await expect(result).rejects.toMatchObject({ kind: 'ParseError', username: 'alice', page: 1 });
    });

    it('should THROW ParseError if an entry has no title', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: posterPage(['Heat'], true) },
            [`${BASE}page/2/`]: { status: 200, body: '<div class="film-poster"><img src="poster.jpg" /></div>' },
        });

        await expect(new WatchlistScraper('alice', fetchPage).getWatchlist())
            .rejects.toMatchObject({ kind: 'ParseError', username: 'alice', page: 2 });
    });

    it('should THROW UserNotFoundError on a 404', async () => {
        const fetchPage = fakeFetcher({});

        const result = new WatchlistScraper('ghost', fetchPage).getWatchlist();

        await expect(result).rejects.toThrow(UserNotFoundError);
        await expect(result).rejects.toMatchObject({ username: 'ghost' });
    });

    it('should THROW FetchError on other error statuses', async () => {
        const fetchPage = fakeFetcher({
            [BASE]: { status: 503, body: 'Service Unavailable' },
        });

        await expect(new WatchlistScraper('alice', fetchPage).getWatchlist())
            .rejects.toMatchObject({ kind: 'FetchError', username: 'alice', status: 503 });
    });

    it('should wrap network failures in FetchError', async () => {
        const cause = new TypeError('fetch failed');
        const fetchPage = jest.fn<ReturnType<PageFetcher>, Parameters<PageFetcher>>().mockRejectedValue(cause);

        const result = new WatchlistScraper('alice', fetchPage).getWatchlist();

        await expect(result).rejects.toThrow(FetchError);
        await expect(result).rejects.toMatchObject({ username: 'alice', cause });
    });

    it('should pass the abort signal to every request', async () => {
        const controller = new AbortController();
        const fetchPage = fakeFetcher({
            [BASE]: { status: 200, body: posterPage(['Heat'], true) },
            [`${BASE}page/2/`]: { status: 200, body: posterPage([], false) },
        });

        await new WatchlistScraper('alice', fetchPage).getWatchlist(controller.signal);

        expect(fetchPage.mock.calls.map(([, signal]) => signal)).toEqual([controller.signal, controller.signal]);
    });
});
