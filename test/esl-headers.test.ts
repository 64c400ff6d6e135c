import {describe, expect, it} from 'vitest';

import {EslHeaders, MalformedHeaderError, parseHeaderBlock} from '../src';

describe('parseHeaderBlock', () => {
    it('parses key/value lines and trims values', () => {
        const headers = parseHeaderBlock(['Content-Type: command/reply', 'Reply-Text:   +OK accepted  ']);
        expect(headers.get('Content-Type')).toBe('command/reply');
        expect(headers.get('Reply-Text')).toBe('+OK accepted');
        expect(headers.size).toBe(2);
    });

    it('looks names up case-insensitively and keeps the first value', () => {
        const headers = parseHeaderBlock(['content-length: 10', 'Content-Length: 20']);
        expect(headers.get('Content-Length')).toBe('10');
        expect(headers.getAll('CONTENT-LENGTH')).toEqual(['10', '20']);
        expect(headers.toRecord()).toEqual({'content-length': '10'});
    });

    it('folds continuation lines into the previous value', () => {
        const headers = parseHeaderBlock(['Reply-Text: -ERR long', '\treason text']);
        expect(headers.get('Reply-Text')).toBe('-ERR long reason text');
    });

    it('accepts an empty value', () => {
        expect(parseHeaderBlock(['Content-Length:']).get('Content-Length')).toBe('');
    });

    it('returns an empty collection for an empty block', () => {
        const headers = parseHeaderBlock([]);
        expect(headers.size).toBe(0);
        expect(headers.has('Content-Type')).toBe(false);
    });

    it('rejects lines without a colon', () => {
        expect(() => parseHeaderBlock(['Content-Type command/reply'])).toThrow(MalformedHeaderError);
    });

    it('rejects names containing whitespace', () => {
        expect(() => parseHeaderBlock(['Bad Name: x'])).toThrow(MalformedHeaderError);
    });

    it('rejects a leading continuation line', () => {
        expect(() => parseHeaderBlock(['  orphan'])).toThrow(/continuation/);
    });
});

describe('EslHeaders', () => {
    it('builds from entries', () => {
        const headers = new EslHeaders([['Event-Name', 'HEARTBEAT'], ['Core-UUID', 'core-1']]);
        expect(headers.toRecord()).toEqual({'Event-Name': 'HEARTBEAT', 'Core-UUID': 'core-1'});
    });
});
