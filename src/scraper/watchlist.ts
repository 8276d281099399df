import * as cheerio from 'cheerio';
import { watchlistUrl } from '.';
import { ParseError } from '../util/errors';
import { BaseScraper } from './scraper.base';
import { PageFetcher } from './transport';

// Classic markup first, then the lazy-loaded poster grid
const ENTRY_SELECTORS = [
    'div.film-poster',
    '.poster-container .react-component',
    '.griditem .react-component'
];

export class WatchlistScraper extends BaseScraper {
    constructor(username: string, fetchPage: PageFetcher) {
        super(username, fetchPage);
    }

    protected pageUrl(page: number): string {
        return watchlistUrl(this.username, page);
    }

    protected getTitlesFromHtml(html: string, page: number): string[] {
        const $ = cheerio.load(html);

        for (const selector of ENTRY_SELECTORS) {
            const entries = $(selector).toArray();
            if (entries.length === 0) continue;

            return entries.map((element, index) => {
                const entry = $(element);
                const title = [
                    entry.find('img').first().attr('alt'),
                    entry.attr('data-item-name'),
                    entry.attr('data-film-name')
                ].find((candidate): candidate is string => !!candidate && candidate.trim().length > 0);

                if (!title) {
                    throw new ParseError(
                        this.username,
                        page,
                        `Entry ${index + 1} on page ${page} has no title (matched '${selector}')`
                    );
                }
                return title;
            });
        }

        return [];
    }

    protected hasNextPage(html: string): boolean {
        const $ = cheerio.load(html);
        return $('.paginate-nextprev .next, a.next').length > 0;
    }
}
