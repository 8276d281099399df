import { Watchlist } from ".";

interface Scraper {
    /**
     * Retrieves every title on one user's public Letterboxd watchlist.
     *
     * Walks the paginated listing from page 1 until a page has no entries,
     * waiting on the shared throttle before each request.
     *
     * @returns titles in the order Letterboxd lists them
     * @throws UserNotFoundError, FetchError or ParseError
     */
    getWatchlist(signal?: AbortSignal): Promise<Watchlist>;
}

export default Scraper;
