export type OverlapErrorKind =
    | 'UserNotFound'
    | 'FetchError'
    | 'ParseError'
    | 'InvalidArgumentCount'
    | 'EmptyOverlap'
    | 'InvalidUsername';

/**
 * Base class for every failure the bot reports back to a Discord user.
 * `kind` lets callers switch over the taxonomy without `instanceof` chains.
 */
export abstract class OverlapBotError extends Error {
    abstract readonly kind: OverlapErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UserNotFoundError extends OverlapBotError {
    readonly kind = 'UserNotFound';

    constructor(public readonly username: string) {
        super(`No Letterboxd watchlist found for "${username}"`);
    }
}

export class FetchError extends OverlapBotError {
    readonly kind = 'FetchError';

    constructor(
        public readonly username: string,
        message: string,
        public readonly status?: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ParseError extends OverlapBotError {
    readonly kind = 'ParseError';

    constructor(
        public readonly username: string,
        public readonly page: number,
        message: string
    ) {
        super(message);
    }
}

export class InvalidArgumentCountError extends OverlapBotError {
    readonly kind = 'InvalidArgumentCount';

    constructor(public readonly count: number, public readonly min: number, public readonly max: number) {
        super(`Expected between ${min} and ${max} watchlists, got ${count}`);
    }
}

export class EmptyOverlapError extends OverlapBotError {
    readonly kind = 'EmptyOverlap';

    constructor() {
        super('The watchlists have no movies in common');
    }
}

export class InvalidUsernameError extends OverlapBotError {
    readonly kind = 'InvalidUsername';

    constructor(public readonly input: string, reason: string) {
        super(reason);
    }
}

/** Errors that name the user whose watchlist could not be retrieved. */
export type WatchlistFetchError = UserNotFoundError | FetchError | ParseError;

export type KnownOverlapError =
    | WatchlistFetchError
    | InvalidArgumentCountError
    | EmptyOverlapError
    | InvalidUsernameError;

export function isKnownOverlapError(error: unknown): error is KnownOverlapError {
    return error instanceof UserNotFoundError
        || error instanceof FetchError
        || error instanceof ParseError
        || error instanceof InvalidArgumentCountError
        || error instanceof EmptyOverlapError
        || error instanceof InvalidUsernameError;
}
