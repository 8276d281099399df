import { SlashCommandBuilder } from 'discord.js';

export const WATCHLIST_OVERLAP = 'watchlist_overlap';
export const RANDOM_MOVIE = 'random_movie';

export type OverlapCommandName = typeof WATCHLIST_OVERLAP | typeof RANDOM_MOVIE;

export const USERNAME_OPTIONS = ['username1', 'username2', 'username3', 'username4'] as const;

function withUsernameOptions(builder: SlashCommandBuilder): SlashCommandBuilder {
    USERNAME_OPTIONS.forEach((name, index) => {
        const required = index < 2;
        builder.addStringOption(option => option
            .setName(name)
            .setDescription(`${ordinal(index + 1)} user's Letterboxd username${required ? '' : ' (optional)'}`)
            .setRequired(required)
            .setMaxLength(100));
    });
    return builder;
}

function ordinal(n: number): string {
    return ['First', 'Second', 'Third', 'Fourth'][n - 1] ?? `#${n}`;
}

export const watchlistOverlapCommand = withUsernameOptions(
    new SlashCommandBuilder()
        .setName(WATCHLIST_OVERLAP)
        .setDescription('Compare watchlists between 2-4 users')
);

export const randomMovieCommand = withUsernameOptions(
    new SlashCommandBuilder()
        .setName(RANDOM_MOVIE)
        .setDescription('Pick a random movie from common watchlist between 2-4 users')
);

export const commandDefinitions = [watchlistOverlapCommand, randomMovieCommand];

export function isOverlapCommand(name: string): name is OverlapCommandName {
    return name === WATCHLIST_OVERLAP || name === RANDOM_MOVIE;
}
