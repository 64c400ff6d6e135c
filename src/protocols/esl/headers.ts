/**
 * MIME-style header blocks.
 * @module esl/headers
 */
import {MalformedHeaderError} from './errors';

/**
 * Case-insensitive, ordered header collection. Lookups return the first
 * value seen for a name.
 */
export class EslHeaders {
    private readonly entries = new Map<string, {name: string; values: string[]}>();

    constructor(init?: Iterable<[string, string]>) {
        if (!init) return;
        for (const [name, value] of init) this.append(name, value);
    }

    public append(name: string, value: string): void {
        const key = name.toLowerCase();
        const entry = this.entries.get(key);
        if (entry) entry.values.push(value);
        else this.entries.set(key, {name, values: [value]});
    }

    public get(name: string): string | undefined {
        return this.entries.get(name.toLowerCase())?.values[0];
    }

    public getAll(name: string): string[] {
        return [...(this.entries.get(name.toLowerCase())?.values ?? [])];
    }

    public has(name: string): boolean {
        return this.entries.has(name.toLowerCase());
    }

    public get size(): number {
        return this.entries.size;
    }

    /** First value per header, keyed by the name as first received. */
    public toRecord(): Record<string, string> {
        const record: Record<string, string> = {};
        for (const {name, values} of this.entries.values()) {
            const [first] = values;
            if (first !== undefined) record[name] = first;
        }
        return record;
    }
}

const isContinuation = (line: string): boolean => line.startsWith(' ') || line.startsWith('\t');

/**
 * Parses the lines of one header block (without the terminating empty line).
 * Continuation lines starting with whitespace are folded into the previous value.
 */
export const parseHeaderBlock = (lines: readonly string[]): EslHeaders => {
    const headers = new EslHeaders();
    const parsed: Array<[string, string]> = [];

    for (const line of lines) {
        if (isContinuation(line)) {
            const last = parsed[parsed.length - 1];
            if (!last) {
                throw new MalformedHeaderError(`Header block starts with a continuation line: ${JSON.stringify(line)}`);
            }
            last[1] = `${last[1]} ${line.trim()}`.trim();
            continue;
        }

        const colon = line.indexOf(':');
        if (colon <= 0) {
            throw new MalformedHeaderError(`Malformed header line: ${JSON.stringify(line)}`);
        }
        const name = line.slice(0, colon);
        if (/\s/.test(name)) {
            throw new MalformedHeaderError(`Malformed header name: ${JSON.stringify(name)}`);
        }
        parsed.push([name, line.slice(colon + 1).trim()]);
    }

    for (const [name, value] of parsed) headers.append(name, value);
    return headers;
};
