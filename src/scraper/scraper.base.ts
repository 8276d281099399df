import * as cheerio from 'cheerio';
import { Watchlist } from '.';
import logger from '../util/logger';
import { FetchError, ParseError, UserNotFoundError } from '../util/errors';
import Scraper from './scraper.interface';
import { PageFetcher } from './transport';

export abstract class BaseScraper implements Scraper {
    constructor(
        protected username: string,
        protected fetchPage: PageFetcher
    ) { }

    // Abstract methods that must be implemented by subclasses
    protected abstract pageUrl(page: number): string;
    protected abstract getTitlesFromHtml(html: string, page: number): string[];
    protected abstract hasNextPage(html: string): boolean;

    // Default implementation can be overridden if needed
    protected verifyEmptyList(html: string): void {
        const $ = cheerio.load(html);
        const text = $.text();

        const emptyIndicators = [
            'No films in watchlist',
            'watchlist is empty',
            'There are no films in this list',
            'No films',
            'No entries'
        ];

        const isExplicitlyEmpty = emptyIndicators.some(indicator => text.includes(indicator));

        if (!isExplicitlyEmpty) {
            const bodyPreview = $('body').text().substring(0, 200).replace(/\s+/g, ' ').trim();
            throw new ParseError(
                this.username,
                1,
                `Found no films on the first watchlist page and could not confirm it is empty. Body preview: ${bodyPreview}`
            );
        }

        logger.info(`Watchlist of ${this.username} is confirmed empty.`);
    }

    async getWatchlist(signal?: AbortSignal): Promise<Watchlist> {
        const titles: string[] = [];
        let page = 1;

        while (true) {
            const url = this.pageUrl(page);
            logger.info(`Fetching page ${page} for ${this.username}: ${url}`);

            const html = await this.requestPage(url, signal);
            const pageTitles = this.getTitlesFromHtml(html, page);

            if (pageTitles.length === 0) {
                if (page === 1) {
                    this.verifyEmptyList(html);
                }
                break;
            }

            titles.push(...pageTitles);

            if (!this.hasNextPage(html)) {
                break;
            }
            page++;
        }

        logger.debug(`Retrieved ${titles.length} titles across ${page} page(s) for ${this.username}.`);
        return titles;
    }

    protected async requestPage(url: string, signal?: AbortSignal): Promise<string> {
        const response = await this.fetchPage(url, signal).catch((e: unknown) => {
            const message = e instanceof Error ? e.message : String(e);
            throw new FetchError(this.username, `Could not fetch ${url}: ${message}`, undefined, { cause: e });
        });

        if (response.status === 404) {
            throw new UserNotFoundError(this.username);
        }

        if (response.status < 200 || response.status >= 300) {
            throw new FetchError(this.username, `Failed to fetch page: ${response.status}`, response.status);
        }

        return response.body;
    }
}
