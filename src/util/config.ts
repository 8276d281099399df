import env, { Env } from './env';

export interface LetterboxdConfig {
    /** Minimum gap between two Letterboxd requests of the same command. */
    requestDelayMs: number;
    requestTimeoutMs: number;
    /** Extra attempts after a network failure. HTTP statuses are never retried. */
    retries: number;
}

export interface BotConfig {
    token: string;
    guildId?: string;
    presence: string;
    commandTimeoutMs: number;
    maxConcurrentCommands: number;
}

export interface AppConfig {
    letterboxd: LetterboxdConfig;
    bot: BotConfig;
}

export function loadConfig(source: Env = env): AppConfig {
    return {
        letterboxd: {
            requestDelayMs: Math.round(source.LETTERBOXD_REQUEST_DELAY_SECONDS * 1000),
            requestTimeoutMs: Math.round(source.LETTERBOXD_REQUEST_TIMEOUT_SECONDS * 1000),
            retries: source.LETTERBOXD_FETCH_RETRIES,
        },
        bot: {
            token: source.DISCORD_TOKEN,
            guildId: source.DISCORD_GUILD_ID,
            presence: source.BOT_PRESENCE,
            commandTimeoutMs: Math.round(source.COMMAND_TIMEOUT_MINUTES * 60 * 1000),
            maxConcurrentCommands: source.MAX_CONCURRENT_COMMANDS,
        },
    };
}
