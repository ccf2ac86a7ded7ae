/**
 * Error taxonomy for exchange collaborators.
 *
 * Transient errors are absorbed inside a tick and retried on the next schedule.
 * Fatal errors stop only the worker of the affected market.
 */

export type MakerErrorCode =
    | "NETWORK"
    | "TIMEOUT"
    | "RATE_LIMITED"
    | "AUTH"
    | "MARKET_NOT_FOUND"
    | "REPLACE_RACE";

export class MakerError extends Error {
    readonly code: MakerErrorCode;
    readonly retryable: boolean;
    readonly fatal: boolean;

    constructor(code: MakerErrorCode, message: string, opts: { retryable: boolean; fatal: boolean; cause?: unknown }) {
        super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
        this.name = new.target.name;
        this.code = code;
        this.retryable = opts.retryable;
        this.fatal = opts.fatal;
    }
}

export class NetworkError extends MakerError {
    constructor(message: string, cause?: unknown) {
        super("NETWORK", message, { retryable: true, fatal: false, cause });
    }
}

export class TimeoutError extends MakerError {
    readonly timeoutMs: number;

    constructor(label: string, timeoutMs: number) {
        super("TIMEOUT", `${label} timed out after ${timeoutMs}ms`, { retryable: true, fatal: false });
        this.timeoutMs = timeoutMs;
    }
}

export class RateLimitedError extends MakerError {
    readonly retryAfterMs?: number;

    constructor(message: string, retryAfterMs?: number, cause?: unknown) {
        super("RATE_LIMITED", message, { retryable: true, fatal: false, cause });
        this.retryAfterMs = retryAfterMs;
    }
}

export class AuthError extends MakerError {
    constructor(message: string, cause?: unknown) {
        super("AUTH", message, { retryable: false, fatal: true, cause });
    }
}

export class MarketNotFoundError extends MakerError {
    readonly marketId: string;

    constructor(marketId: string, cause?: unknown) {
        super("MARKET_NOT_FOUND", `Market ${marketId} not found`, { retryable: true, fatal: false, cause });
        this.marketId = marketId;
    }
}

/** Cancel was acknowledged but the replacement order could not be placed. */
export class ReplaceRaceError extends MakerError {
    readonly oldOrderId: string;

    constructor(oldOrderId: string, cause: unknown) {
        super("REPLACE_RACE", `Canceled ${oldOrderId} but the replacement was not placed: ${describeError(cause)}`, {
            retryable: true,
            fatal: false,
            cause
        });
        this.oldOrderId = oldOrderId;
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === "string") return err;
    try {
        return JSON.stringify(err) ?? String(err);
    } catch {
        return String(err);
    }
}

const AUTH_PATTERN = /unauthori[sz]ed|forbidden|invalid api key|invalid signature|\b401\b|\b403\b/i;
const RATE_LIMIT_PATTERN = /rate.?limit|too many requests|\b429\b/i;
const NOT_FOUND_PATTERN = /market not found|no orderbook exists|\b404\b/i;

/**
 * Maps any thrown value or error payload onto the taxonomy.
 * `status` is the HTTP status when the caller knows it.
 */
export function toMakerError(err: unknown, context: { marketId?: string; status?: number } = {}): MakerError {
    if (err instanceof MakerError) return err;

    const message = describeError(err);
    const status = context.status ?? extractStatus(err);

    if (status === 401 || status === 403 || AUTH_PATTERN.test(message)) {
        return new AuthError(message, err);
    }
    if (status === 429 || RATE_LIMIT_PATTERN.test(message)) {
        return new RateLimitedError(message, extractRetryAfterMs(err), err);
    }
    if (context.marketId && (status === 404 || NOT_FOUND_PATTERN.test(message))) {
        return new MarketNotFoundError(context.marketId, err);
    }
    return new NetworkError(message, err);
}

function extractStatus(err: unknown): number | undefined {
    if (typeof err !== "object" || err === null) return undefined;
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("response" in err && typeof err.response === "object" && err.response !== null) {
        const response = err.response;
        if ("status" in response && typeof response.status === "number") return response.status;
    }
    return undefined;
}

function extractRetryAfterMs(err: unknown): number | undefined {
    if (typeof err !== "object" || err === null) return undefined;
    if ("retryAfterMs" in err && typeof err.retryAfterMs === "number") return err.retryAfterMs;
    if (!("response" in err) || typeof err.response !== "object" || err.response === null) return undefined;
    const response = err.response;
    if (!("headers" in response) || typeof response.headers !== "object" || response.headers === null) return undefined;
    const headers = response.headers;
    if ("retry-after" in headers) {
        const seconds = Number(headers["retry-after"]);
        if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
    }
    return undefined;
}
