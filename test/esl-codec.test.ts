import {describe, expect, it} from 'vitest';

import {
    decodeEventBody,
    decodeEventValue,
    DecodeError,
    encodeEventBody,
    encodeEventValue,
} from '../src';

describe('event value codec', () => {
    it('decodes query-style percent escapes', () => {
        expect(decodeEventValue('Mon%2C%2019%20Oct+2026')).toBe('Mon, 19 Oct 2026');
        expect(decodeEventValue('sofia%2Finternal%2F1000%40example.test')).toBe('sofia/internal/1000@example.test');
        expect(decodeEventValue('%C3%A9t%C3%A9')).toBe('été');
    });

    it('round-trips arbitrary values through encode then decode', () => {
        const values = ['plain', 'with space', 'a+b=c&d', '100%', 'line\nbreak', 'ünïcödé ☎', ''];
        for (const value of values) {
            expect(decodeEventValue(encodeEventValue(value))).toBe(value);
        }
    });

    it('encodes spaces as plus signs', () => {
        expect(encodeEventValue('0 years, 1 day')).toBe('0+years%2C+1+day');
    });

    it('rejects invalid escapes', () => {
        expect(() => decodeEventValue('100%')).toThrow(URIError);
        expect(() => decodeEventValue('%zz')).toThrow(URIError);
        expect(() => decodeEventValue('%4')).toThrow('Invalid percent escape at offset 0');
    });

    it('accepts escapes that are not valid UTF-8', () => {
        expect(decodeEventValue('%FF')).toBe('\uFFFD');
        expect(decodeEventValue('caf%C3+bar')).toBe('caf\uFFFD bar');
        expect(decodeEventValue('%00x')).toBe('\u0000x');
    });
});

describe('decodeEventBody', () => {
    it('decodes one field per line up to the empty line', () => {
        const event = decodeEventBody(Buffer.from('Event-Name: CHANNEL_ANSWER\nCaller-Caller-ID-Name: Jane+Doe\n\n'));
        expect(event).toEqual({
            'Event-Name': 'CHANNEL_ANSWER',
            'Caller-Caller-ID-Name': 'Jane Doe',
        });
    });

    it('accepts CRLF line endings and a missing terminator', () => {
        expect(decodeEventBody('A: 1\r\nB: 2')).toEqual({A: '1', B: '2'});
    });

    it('splits on the first separator only', () => {
        expect(decodeEventBody('Reply: +OK: done\n\n')).toEqual({Reply: ' OK: done'});
    });

    it('keeps a nested body under _body', () => {
        const event = decodeEventBody('Event-Name: BACKGROUND_JOB\nContent-Length: 12\n\n+OK job done');
        expect(event).toEqual({
            'Event-Name': 'BACKGROUND_JOB',
            'Content-Length': '12',
            _body: '+OK job done',
        });
    });

    it('returns an empty event for an empty body', () => {
        expect(decodeEventBody(Buffer.alloc(0))).toEqual({});
    });

    it('rejects lines without a separator and keeps what was decoded', () => {
        let caught: unknown;
        try {
            decodeEventBody('Event-Name: HEARTBEAT\nbroken line\nOther: x\n\n');
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(DecodeError);
        expect(caught).toMatchObject({
            code: 'DECODE_ERROR',
            fatal: true,
            partial: {'Event-Name': 'HEARTBEAT'},
        });
    });

    it('rejects invalid percent-encoding and keeps earlier fields', () => {
        expect(() => decodeEventBody('A: ok\nB: 50%\n\n')).toThrow(DecodeError);
        try {
            decodeEventBody('A: ok\nB: 50%\n\n');
        } catch (err) {
            expect(err).toMatchObject({partial: {A: 'ok'}, details: {key: 'B'}});
        }
    });

    it('rejects an empty key', () => {
        expect(() => decodeEventBody(': value\n\n')).toThrow(DecodeError);
    });
});

describe('encodeEventBody', () => {
    it('encodes fields and decodes back to the same event', () => {
        const event = {'Event-Name': 'CUSTOM', 'Event-Subclass': 'conference::maintenance', Note: 'a, b & c'};
        const body = encodeEventBody(event);
        expect(body).toBe('Event-Name: CUSTOM\nEvent-Subclass: conference%3A%3Amaintenance\nNote: a%2C+b+%26+c\n\n');
        expect(decodeEventBody(body)).toEqual(event);
    });

    it('rejects keys containing the separator', () => {
        expect(() => encodeEventBody({'Bad: Key': 'x'})).toThrow(DecodeError);
    });
});
