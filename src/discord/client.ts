import {
    ActivityType,
    Client,
    Events,
    GatewayIntentBits,
    MessageFlags,
    type Interaction,
} from 'discord.js';
import PQueue from 'p-queue';
import logger from '../util/logger';
import { AppConfig } from '../util/config';
import { createCommandQueue } from '../util/queues';
import { fetchWatchlists } from '../scraper';
import { commandDefinitions } from './commands';
import { CommandHandler, createCommandHandler } from './handlers';

const DEFAULT_SHUTDOWN_GRACE_MS = 30_000;

/**
 * Owns the process-wide Discord connection. Created once at startup,
 * `start()` logs in and `stop()` drains running commands and disconnects.
 */
export class OverlapBot {
    private readonly client: Client;
    private readonly queue: PQueue;
    private readonly handleCommand: CommandHandler;
    private accepting = false;

    constructor(private readonly config: AppConfig) {
        this.client = new Client({ intents: [GatewayIntentBits.Guilds] });
        this.queue = createCommandQueue(config.bot.maxConcurrentCommands);
        this.handleCommand = createCommandHandler({
            loadWatchlists: (usernames, signal) => fetchWatchlists(usernames, config.letterboxd, { signal }),
            queue: this.queue,
            commandTimeoutMs: config.bot.commandTimeoutMs,
        });

        this.client.once(Events.ClientReady, (client) => {
            this.onReady(client).catch((err) => {
                logger.error({ err }, 'Failed to register slash commands');
            });
        });
        this.client.on(Events.InteractionCreate, (interaction) => this.onInteraction(interaction));
        this.client.on(Events.Error, (err) => logger.error({ err }, 'Discord client error'));
    }

    async start(): Promise<void> {
        this.accepting = true;
        logger.info('Logging in to Discord...');
        await this.client.login(this.config.bot.token);
    }

    async stop(graceMs = DEFAULT_SHUTDOWN_GRACE_MS): Promise<void> {
        this.accepting = false;

        if (this.queue.size > 0 || this.queue.pending > 0) {
            logger.info(`Waiting up to ${graceMs / 1000}s for ${this.queue.size + this.queue.pending} command(s) to finish...`);
            let timer: NodeJS.Timeout | undefined;
            const timedOut = new Promise<boolean>(resolve => {
                timer = setTimeout(() => resolve(true), graceMs);
            });
            const drained = this.queue.onIdle().then(() => false);

            if (await Promise.race([drained, timedOut])) {
                logger.warn('Shutdown grace period expired; dropping remaining commands.');
            }
            clearTimeout(timer);
            this.queue.clear();
        }

        await this.client.destroy();
        logger.info('Disconnected from Discord.');
    }

    private async onReady(client: Client<true>): Promise<void> {
        logger.info(`${client.user.tag} has connected to Discord!`);

        const body = commandDefinitions.map(command => command.toJSON());
        const { guildId, presence } = this.config.bot;
        const synced = guildId
            ? await client.application.commands.set(body, guildId)
            : await client.application.commands.set(body);
        logger.info(`Synced ${synced.size} command(s)${guildId ? ` to guild ${guildId}` : ' globally'}`);

        client.user.setPresence({ activities: [{ name: presence, type: ActivityType.Playing }] });
    }

    private onInteraction(interaction: Interaction): void {
        if (!interaction.isChatInputCommand()) return;

        if (!this.accepting) {
            interaction.reply({ content: 'The bot is shutting down, try again in a moment.', flags: MessageFlags.Ephemeral })
                .catch((err) => logger.warn({ err }, 'Failed to reply during shutdown'));
            return;
        }

        const { commandName } = interaction;
        this.handleCommand(interaction).catch((err) => {
            logger.error({ err }, `Failed to handle /${commandName}`);
        });
    }
}
