/**
 * Structured event socket error taxonomy.
 * @module esl/errors
 */
import type {EslMessage} from './codec';

export type EslErrorDomain = 'transport' | 'framing' | 'decode' | 'session';

export type EslErrorCode =
    | 'TRANSPORT_ERROR'
    | 'MALFORMED_HEADER'
    | 'MALFORMED_LENGTH'
    | 'DECODE_ERROR'
    | 'TRUNCATED_BODY'
    | 'UNEXPECTED_MESSAGE'
    | 'AUTHENTICATION_FAILED'
    | 'COMMAND_FAILED'
    | 'INVALID_STATE'
    | 'READ_IN_PROGRESS';

export type EslErrorParams = {
    message: string;
    domain: EslErrorDomain;
    code: EslErrorCode;
    /** When `true` the connection is desynchronised and must be discarded. */
    fatal?: boolean;
    details?: Record<string, unknown>;
    cause?: unknown;
};

type SubclassParams = {
    details?: Record<string, unknown>;
    cause?: unknown;
};

export class EslError extends Error {
    public readonly domain: EslErrorDomain;
    public readonly code: EslErrorCode;
    public readonly fatal: boolean;
    public readonly details?: Record<string, unknown>;

    constructor(params: EslErrorParams) {
        super(params.message, params.cause === undefined ? undefined : {cause: params.cause});
        this.name = 'EslError';
        this.domain = params.domain;
        this.code = params.code;
        this.fatal = params.fatal ?? false;
        this.details = params.details;
    }
}

/** I/O failure on the underlying socket. */
export class TransportError extends EslError {
    constructor(message: string, params: SubclassParams = {}) {
        super({message, domain: 'transport', code: 'TRANSPORT_ERROR', fatal: true, ...params});
        this.name = 'TransportError';
    }
}

export class MalformedHeaderError extends EslError {
    constructor(message: string, params: SubclassParams = {}) {
        super({message, domain: 'framing', code: 'MALFORMED_HEADER', fatal: true, ...params});
        this.name = 'MalformedHeaderError';
    }
}

export class MalformedLengthError extends EslError {
    constructor(message: string, params: SubclassParams = {}) {
        super({message, domain: 'framing', code: 'MALFORMED_LENGTH', fatal: true, ...params});
        this.name = 'MalformedLengthError';
    }
}

/**
 * Event body could not be decoded. `partial` holds the fields decoded
 * before the failing line.
 */
export class DecodeError extends EslError {
    public readonly partial: EslMessage;

    constructor(message: string, partial: EslMessage, params: SubclassParams = {}) {
        super({message, domain: 'decode', code: 'DECODE_ERROR', fatal: true, ...params});
        this.name = 'DecodeError';
        this.partial = partial;
    }
}

export class TruncatedBodyError extends EslError {
    public readonly expected: number;
    public readonly received: number;

    constructor(expected: number, received: number, params: SubclassParams = {}) {
        super({
            message: `Body truncated: expected ${expected} bytes, got ${received}`,
            domain: 'framing',
            code: 'TRUNCATED_BODY',
            fatal: true,
            ...params,
        });
        this.name = 'TruncatedBodyError';
        this.expected = expected;
        this.received = received;
    }
}

export class UnexpectedMessageError extends EslError {
    constructor(message: string, params: SubclassParams = {}) {
        super({message, domain: 'framing', code: 'UNEXPECTED_MESSAGE', fatal: true, ...params});
        this.name = 'UnexpectedMessageError';
    }
}

export class AuthenticationError extends EslError {
    public readonly replyText: string | null;

    constructor(replyText: string | null, params: SubclassParams = {}) {
        super({
            message: replyText ? `Authentication failed: ${replyText}` : 'Authentication failed',
            domain: 'session',
            code: 'AUTHENTICATION_FAILED',
            fatal: true,
            ...params,
        });
        this.name = 'AuthenticationError';
        this.replyText = replyText;
    }
}

/** The server answered a command with a failure reply. The connection stays usable. */
export class CommandError extends EslError {
    public readonly command: string;
    public readonly replyText: string | null;

    constructor(command: string, replyText: string | null, params: SubclassParams = {}) {
        super({
            message: replyText ? `Command "${command}" failed: ${replyText}` : `Command "${command}" failed`,
            domain: 'session',
            code: 'COMMAND_FAILED',
            ...params,
        });
        this.name = 'CommandError';
        this.command = command;
        this.replyText = replyText;
    }
}

/** Wraps anything thrown by the socket layer into a {@link TransportError}. */
export const toEslError = (err: unknown): EslError => {
    if (err instanceof EslError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new TransportError(message, {cause: err});
};
