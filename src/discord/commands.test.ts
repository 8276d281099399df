import { ApplicationCommandOptionType } from 'discord.js';
import { commandDefinitions, isOverlapCommand, randomMovieCommand, watchlistOverlapCommand } from './commands';

const expectedOptions = [
    { name: 'username1', description: "First user's Letterboxd username", type: ApplicationCommandOptionType.String, required: true },
    { name: 'username2', description: "Second user's Letterboxd username", type: ApplicationCommandOptionType.String, required: true },
    { name: 'username3', description: "Third user's Letterboxd username (optional)", type: ApplicationCommandOptionType.String, required: false },
    { name: 'username4', description: "Fourth user's Letterboxd username (optional)", type: ApplicationCommandOptionType.String, required: false },
];

describe('slash command definitions', () => {
    it('should define watchlist_overlap with two required and two optional usernames', () => {
        expect(watchlistOverlapCommand.toJSON()).toMatchObject({
            name: 'watchlist_overlap',
            description: 'Compare watchlists between 2-4 users',
            options: expectedOptions,
        });
    });

    it('should define random_movie with the same options', () => {
        expect(randomMovieCommand.toJSON()).toMatchObject({
            name: 'random_movie',
            description: 'Pick a random movie from common watchlist between 2-4 users',
            options: expectedOptions,
        });
    });

    it('should register both commands', () => {
        expect(commandDefinitions.map(command => command.name)).toEqual(['watchlist_overlap', 'random_movie']);
    });

    it('should recognise only its own command names', () => {
        expect(isOverlapCommand('watchlist_overlap')).toBe(true);
        expect(isOverlapCommand('random_movie')).toBe(true);
        expect(isOverlapCommand('ping')).toBe(false);
    });
});
