/**
 * Event body codec.
 * @module esl/codec
 *
 * Plain events carry one `Key: Value` pair per line with the value
 * percent-encoded using URL query rules (`+` is a space).
 */
import {ESL_EVENT_BODY_KEY} from './constants';
import {DecodeError} from './errors';

/** Decoded message: event fields, or the `body` of a reply. */
export type EslMessage = Record<string, string>;

const FIELD_SEPARATOR = ': ';

const ESCAPE_RUN = /((?:%[0-9A-Fa-f]{2})+)/;
const BROKEN_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

/**
 * Percent-decodes one event value. Escapes may carry any byte; the bytes are
 * read as UTF-8, so sequences that are not valid UTF-8 become U+FFFD.
 * Throws `URIError` on a `%` not followed by two hex digits.
 */
export const decodeEventValue = (value: string): string => {
    const text = value.replace(/\+/g, ' ');
    const broken = BROKEN_ESCAPE.exec(text);
    if (broken) {
        throw new URIError(`Invalid percent escape at offset ${broken.index}`);
    }
    const parts = text.split(ESCAPE_RUN).map((part, index) => (
        index % 2 === 1 ? Buffer.from(part.replace(/%/g, ''), 'hex') : Buffer.from(part, 'utf8')
    ));
    return Buffer.concat(parts).toString('utf8');
};

/** Inverse of {@link decodeEventValue}. */
export const encodeEventValue = (value: string): string => encodeURIComponent(value).replace(/%20/g, '+');

/**
 * Decodes a plain event body into its fields.
 *
 * Lines end at `\n` (a trailing `\r` is dropped). The field block ends at the
 * first empty line; anything after it is the event's own body and is kept
 * verbatim under `_body`.
 */
export const decodeEventBody = (body: Buffer | string): EslMessage => {
    const text = typeof body === 'string' ? body : body.toString('utf8');
    const event: EslMessage = {};
    let offset = 0;

    while (offset < text.length) {
        const newline = text.indexOf('\n', offset);
        const end = newline === -1 ? text.length : newline;
        const line = text.slice(offset, end).replace(/\r$/, '');
        offset = end + 1;

        if (line === '') {
            const rest = text.slice(Math.min(offset, text.length));
            if (rest.length > 0) event[ESL_EVENT_BODY_KEY] = rest;
            break;
        }

        const separator = line.indexOf(FIELD_SEPARATOR);
        if (separator <= 0) {
            throw new DecodeError(`Event line has no "Key: Value" separator: ${JSON.stringify(line)}`, {...event});
        }
        const key = line.slice(0, separator);
        const raw = line.slice(separator + FIELD_SEPARATOR.length);
        try {
            event[key] = decodeEventValue(raw);
        } catch (err) {
            throw new DecodeError(`Invalid percent-encoding for "${key}": ${JSON.stringify(raw)}`, {...event}, {
                cause: err,
                details: {key},
            });
        }
    }

    return event;
};

/** Encodes fields as a plain event body, terminated by an empty line. */
export const encodeEventBody = (event: EslMessage): string => {
    const lines: string[] = [];
    for (const [key, value] of Object.entries(event)) {
        if (key === ESL_EVENT_BODY_KEY) continue;
        if (key === '' || key.includes(FIELD_SEPARATOR) || /[\r\n]/.test(key)) {
            throw new DecodeError(`Event key is not representable: ${JSON.stringify(key)}`, {});
        }
        lines.push(`${key}${FIELD_SEPARATOR}${encodeEventValue(value)}\n`);
    }
    return `${lines.join('')}\n${event[ESL_EVENT_BODY_KEY] ?? ''}`;
};
