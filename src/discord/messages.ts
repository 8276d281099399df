import { escapeMarkdown } from 'discord.js';
import { MAX_WATCHLISTS, MIN_WATCHLISTS } from '../util/overlap';
import { KnownOverlapError } from '../util/errors';

/** Discord rejects messages over 2000 characters; leave some headroom. */
export const MESSAGE_CHUNK_LIMIT = 1900;

export const NO_COMMON_MOVIES = 'No common movies found between these users.';

function formatUsers(usernames: readonly string[]): string {
    return usernames.map(name => escapeMarkdown(name)).join(', ');
}

/**
 * Lists every common title, split into as few messages as fit the chunk
 * limit, followed by a summary line.
 */
export function renderOverlap(usernames: readonly string[], titles: readonly string[], limit = MESSAGE_CHUNK_LIMIT): string[] {
    if (titles.length === 0) {
        return [NO_COMMON_MOVIES];
    }

    const chunks: string[] = [];
    let current = `Common movies between ${formatUsers(usernames)}:\n\n`;

    for (const title of titles) {
        const line = `- ${escapeMarkdown(title)}\n`;
        if (current.length > 0 && current.length + line.length > limit) {
            chunks.push(current);
            current = '';
        }
        current += line;
    }

    if (current) {
        chunks.push(current);
    }

    chunks.push(`Found ${titles.length} common ${titles.length === 1 ? 'movie' : 'movies'} in total!`);
    return chunks;
}

export function renderRandomPick(usernames: readonly string[], title: string): string {
    return `🎬 Random movie pick for ${formatUsers(usernames)}:\n**${escapeMarkdown(title)}**`;
}

export function renderError(error: KnownOverlapError): string {
    switch (error.kind) {
        case 'EmptyOverlap':
            return NO_COMMON_MOVIES;
        case 'InvalidArgumentCount':
            return `Please provide between ${MIN_WATCHLISTS} and ${MAX_WATCHLISTS} Letterboxd usernames.`;
        case 'InvalidUsername':
            return `That doesn't look like a Letterboxd username: ${escapeMarkdown(error.message)}.`;
        case 'UserNotFound':
            return `Couldn't find a Letterboxd watchlist for **${escapeMarkdown(error.username)}**. Check the username and make sure the watchlist is public.`;
        case 'FetchError':
            return `Failed to fetch the watchlist of **${escapeMarkdown(error.username)}** from Letterboxd. Please try again later.`;
        case 'ParseError':
            return `Couldn't read the watchlist of **${escapeMarkdown(error.username)}**. Letterboxd may have changed its page layout.`;
    }
}

export function renderUnexpectedError(): string {
    return 'An unexpected error occurred while comparing watchlists.';
}

export function renderQueueTimeout(): string {
    return 'The bot was too busy to compare these watchlists in time. Please try again later.';
}
