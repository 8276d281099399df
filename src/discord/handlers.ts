import PQueue from 'p-queue';
import logger from '../util/logger';
import { runInCommandContext } from '../util/context';
import { isKnownOverlapError } from '../util/errors';
import { assertWatchlistCount, intersect, pickRandom } from '../util/overlap';
import { parseUsername, Username, Watchlist } from '../scraper';
import { isOverlapCommand, OverlapCommandName, USERNAME_OPTIONS, WATCHLIST_OVERLAP } from './commands';
import { renderError, renderOverlap, renderQueueTimeout, renderRandomPick, renderUnexpectedError } from './messages';

/**
 * The slice of a discord.js ChatInputCommandInteraction the handler uses.
 */
export interface OverlapInteraction {
    id: string;
    commandName: string;
    user: { id: string };
    options: {
        getString(name: string, required?: boolean): string | null;
    };
    deferReply(): Promise<unknown>;
    editReply(content: string): Promise<unknown>;
    followUp(content: string): Promise<unknown>;
}

export type WatchlistLoader = (usernames: readonly Username[], signal: AbortSignal) => Promise<Watchlist[]>;

export interface CommandHandlerOptions {
    loadWatchlists: WatchlistLoader;
    queue: PQueue;
    commandTimeoutMs: number;
    random?: () => number;
}

export type CommandHandler = (interaction: OverlapInteraction) => Promise<void>;

export function createCommandHandler({ loadWatchlists, queue, commandTimeoutMs, random }: CommandHandlerOptions): CommandHandler {
    async function buildReply(command: OverlapCommandName, interaction: OverlapInteraction, deadline: AbortSignal): Promise<string[]> {
        if (deadline.aborted) {
            logger.warn(`/${command} spent its whole deadline in the queue.`);
            return [renderQueueTimeout()];
        }

        try {
            const usernames = USERNAME_OPTIONS
                .map(name => interaction.options.getString(name))
                .filter((value): value is string => value !== null)
                .map(parseUsername);
            assertWatchlistCount(usernames.length);

            logger.info(`/${command} requested by ${interaction.user.id} for ${usernames.join(', ')}`);
            const watchlists = await loadWatchlists(usernames, deadline);
            const common = intersect(watchlists);
            logger.info(`Found ${common.length} common titles.`);

            if (command === WATCHLIST_OVERLAP) {
                return renderOverlap(usernames, common);
            }
            return [renderRandomPick(usernames, pickRandom(common, random))];
        } catch (e) {
            if (isKnownOverlapError(e)) {
                if (e.kind === 'EmptyOverlap') {
                    logger.info('No common titles to pick from.');
                } else {
                    logger.warn(`/${command} failed: ${e.message}`);
                }
                return [renderError(e)];
            }
            logger.error({ err: e }, `Unexpected error in /${command}`);
            return [renderUnexpectedError()];
        }
    }

    return async function handleCommand(interaction) {
        const command = interaction.commandName;
        if (!isOverlapCommand(command)) {
            logger.warn(`Ignoring unknown command: ${command}`);
            return;
        }

        // Scraping takes at least one request delay per page, so acknowledge first
        await interaction.deferReply();
        // Counted from the deferral, time spent in the queue included
        const deadline = AbortSignal.timeout(commandTimeoutMs);

        logger.debug(`Queueing /${command} (${queue.size} waiting, ${queue.pending} running).`);
        const context = { requestId: interaction.id, command, userId: interaction.user.id };
        await queue.add(() => runInCommandContext(context, async () => {
            const [first, ...rest] = await buildReply(command, interaction, deadline);
            await interaction.editReply(first);
            for (const message of rest) {
                await interaction.followUp(message);
            }
        }));
    };
}
