import { AsyncLocalStorage } from 'async_hooks';

/** What the logger attaches to every line written while a command runs. */
export interface CommandContext {
    /** The Discord interaction id. */
    requestId: string;
    command: string;
    userId: string;
}

export const commandContext = new AsyncLocalStorage<CommandContext>();

export function getCommandContext(): CommandContext | undefined {
    return commandContext.getStore();
}

export function runInCommandContext<T>(context: CommandContext, callback: () => T): T {
    return commandContext.run(context, callback);
}
