import { InvalidUsernameError } from '../util/errors';
import { createLetterboxdThrottle } from '../util/queues';
import logger from '../util/logger';
import { LetterboxdConfig } from '../util/config';
import { createLetterboxdFetcher, PageFetcher } from './transport';
import { WatchlistScraper } from './watchlist';

/** A Letterboxd account name, as it appears in profile URLs. */
export type Username = string;

/** A title exactly as Letterboxd renders it on the poster. */
export type MovieTitle = string;

/** Titles in the order Letterboxd lists them, duplicates included. */
export type Watchlist = MovieTitle[];

export const LETTERBOXD_BASE_URL = 'https://letterboxd.com';

const LETTERBOXD_HOST_PATTERN = /(^|\.)letterboxd\.com$/i;

// Letterboxd account names are letters, digits and underscores
const USERNAME_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Accepts `name`, `@name` or a watchlist URL such as
 * `https://letterboxd.com/name/watchlist/` and returns the bare username.
 */
export function parseUsername(input: string): Username {
    let value = input.trim();
    if (value.startsWith('@')) {
        value = value.slice(1).trim();
    }

    if (/^https?:\/\//i.test(value)) {
        let url: URL;
        try {
            url = new URL(value);
        } catch {
            throw new InvalidUsernameError(input, 'Invalid URL format');
        }

        if (!LETTERBOXD_HOST_PATTERN.test(url.hostname)) {
            throw new InvalidUsernameError(input, 'URL must be from letterboxd.com');
        }

        const segments = url.pathname.split('/').filter(segment => segment.length > 0);
        if (segments.length < 2 || segments[1] !== 'watchlist') {
            throw new InvalidUsernameError(input, 'URL must be a watchlist page');
        }

        try {
            value = decodeURIComponent(segments[0]);
        } catch {
            throw new InvalidUsernameError(input, 'URL contains a malformed username');
        }
    }

    if (value.length === 0) {
        throw new InvalidUsernameError(input, 'Username cannot be empty');
    }

    if (!USERNAME_PATTERN.test(value)) {
        throw new InvalidUsernameError(input, `"${value}" is not a valid Letterboxd username`);
    }

    return value;
}

export function watchlistUrl(username: Username, page = 1): string {
    const base = `${LETTERBOXD_BASE_URL}/${encodeURIComponent(username)}/watchlist/`;
    return page > 1 ? `${base}page/${page}/` : base;
}

export interface FetchWatchlistsOptions {
    /** Overrides the throttled HTTP fetcher built from `config`. */
    fetchPage?: PageFetcher;
    signal?: AbortSignal;
}

/**
 * Fetches each user's watchlist in order, one request at a time.
 * All requests share one throttle, so the configured delay also separates
 * the last page of one user from the first page of the next. The first
 * failure is rethrown and the remaining users are never requested.
 */
export async function fetchWatchlists(
    usernames: readonly Username[],
    config: LetterboxdConfig,
    options: FetchWatchlistsOptions = {}
): Promise<Watchlist[]> {
    const fetchPage = options.fetchPage ?? createLetterboxdFetcher({
        limiter: createLetterboxdThrottle(),
        delayMs: config.requestDelayMs,
        timeoutMs: config.requestTimeoutMs,
        retries: config.retries
    });

    const watchlists: Watchlist[] = [];
    for (const username of usernames) {
        const scraper = new WatchlistScraper(username, fetchPage);
        const watchlist = await scraper.getWatchlist(options.signal);
        logger.info(`Fetched ${watchlist.length} titles from ${username}'s watchlist.`);
        watchlists.push(watchlist);
    }

    return watchlists;
}
