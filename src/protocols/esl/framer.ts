/**
 * Message framer: turns one header block (and its body, if any) into a frame.
 * @module esl/framer
 *
 * The body strategy is chosen from the headers before any body byte is
 * consumed. Reading the wrong number of bytes desynchronises the connection
 * for good, so every failure here is fatal.
 */
import {
    ESL_DEFAULT_MAX_BODY_BYTES,
    ESL_REPLY_AUTH_ACCEPTED,
    ESL_REPLY_OK,
    EslContentType,
} from './constants';
import {decodeEventBody, type EslMessage} from './codec';
import type {FrameReader} from './connection';
import {DecodeError, MalformedLengthError, UnexpectedMessageError} from './errors';
import type {EslHeaders} from './headers';

export type EventFrame = {
    kind: 'event';
    headers: EslHeaders;
    message: EslMessage;
};

export type ApiResponseFrame = {
    kind: 'api-response';
    headers: EslHeaders;
    /** `{body}` decoded with the framer's encoding. */
    message: EslMessage;
    /** The body bytes exactly as received. */
    body: Buffer;
};

export type CommandReplyFrame = {
    kind: 'command-reply';
    headers: EslHeaders;
    /** `{body: 'OK'}` on `+OK` or `+OK accepted`, otherwise `{body: <reply text>}`. */
    message: EslMessage;
    replyText: string;
    ok: boolean;
};

export type Frame = EventFrame | ApiResponseFrame | CommandReplyFrame;

export type FramerOptions = {
    /** Largest accepted `Content-Length` for API responses. */
    maxBodyBytes?: number;
    /** Encoding used to turn API response bodies into `message.body`. */
    encoding?: BufferEncoding;
};

/**
 * Parses a `Content-Length` value. Returns `null` when it is not a
 * non-negative decimal integer.
 */
export const parseContentLength = (value: string): number | null => {
    if (!/^\d+$/.test(value)) return null;
    const length = Number(value);
    return Number.isSafeInteger(length) ? length : null;
};

/** Reads one frame from `reader`. */
export const readFrame = async (reader: FrameReader, options: FramerOptions = {}): Promise<Frame> => {
    const headers = await reader.readHeaders();
    const contentType = headers.get('Content-Type') ?? '';
    const contentLength = headers.get('Content-Length') ?? '';

    if (contentType === EslContentType.EventPlain && contentLength !== '') {
        const length = parseContentLength(contentLength);
        if (length === null) {
            throw new DecodeError(`Invalid event Content-Length: ${JSON.stringify(contentLength)}`, {});
        }
        const body = await reader.readBytes(length);
        return {kind: 'event', headers, message: decodeEventBody(body)};
    }

    if (contentType === EslContentType.ApiResponse && contentLength !== '') {
        const length = parseContentLength(contentLength);
        if (length === null) {
            throw new MalformedLengthError(`Invalid api/response Content-Length: ${JSON.stringify(contentLength)}`);
        }
        const maxBodyBytes = options.maxBodyBytes ?? ESL_DEFAULT_MAX_BODY_BYTES;
        if (length > maxBodyBytes) {
            throw new MalformedLengthError(`api/response Content-Length ${length} exceeds limit of ${maxBodyBytes} bytes`, {
                details: {length, maxBodyBytes},
            });
        }
        const body = await reader.readBytes(length);
        return {
            kind: 'api-response',
            headers,
            message: {body: body.toString(options.encoding ?? 'utf8')},
            body,
        };
    }

    if (contentType === EslContentType.CommandReply) {
        const replyText = headers.get('Reply-Text') ?? '';
        if (replyText === ESL_REPLY_OK || replyText === ESL_REPLY_AUTH_ACCEPTED) {
            return {kind: 'command-reply', headers, message: {body: 'OK'}, replyText, ok: true};
        }
        return {kind: 'command-reply', headers, message: {body: replyText}, replyText, ok: false};
    }

    throw new UnexpectedMessageError(
        `Unexpected message (Content-Type: ${JSON.stringify(contentType)})`,
        {details: {headers: headers.toRecord()}},
    );
};
