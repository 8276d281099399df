import { EmptyOverlapError, InvalidArgumentCountError } from './errors';

export const MIN_WATCHLISTS = 2;
export const MAX_WATCHLISTS = 4;

export function assertWatchlistCount(count: number): void {
    if (count < MIN_WATCHLISTS || count > MAX_WATCHLISTS) {
        throw new InvalidArgumentCountError(count, MIN_WATCHLISTS, MAX_WATCHLISTS);
    }
}

/**
 * Titles present in every watchlist, in the order they first appear in the
 * first one. Titles are compared as exact strings; "Heat" and "Heat (1995)"
 * are different movies here.
 */
export function intersect(watchlists: readonly (readonly string[])[]): string[] {
    assertWatchlistCount(watchlists.length);

    const [first, ...rest] = watchlists;
    const others = rest.map(list => new Set(list));
    const seen = new Set<string>();
    const common: string[] = [];

    for (const title of first) {
        if (seen.has(title)) continue;
        seen.add(title);

        if (others.every(set => set.has(title))) {
            common.push(title);
        }
    }

    return common;
}

export function pickRandom(overlap: readonly string[], random: () => number = Math.random): string {
    if (overlap.length === 0) {
        throw new EmptyOverlapError();
    }

    // Clamp in case an injected source returns exactly 1
    const index = Math.min(Math.floor(random() * overlap.length), overlap.length - 1);
    return overlap[index];
}
