/**
 * Line-oriented connection over a stream socket.
 * @module esl/connection
 */
import {EslError, TransportError, TruncatedBodyError} from './errors';
import {EslHeaders, parseHeaderBlock} from './headers';

/** The slice of `net.Socket` used by {@link LineConnection}. */
export interface LineSocket {
    on(event: 'data', listener: (chunk: Buffer) => void): this;
    on(event: 'end' | 'close', listener: () => void): this;
    on(event: 'error', listener: (err: Error) => void): this;
    write(chunk: string | Uint8Array, cb?: (err?: Error | null) => void): boolean;
    end(): void;
    destroy(error?: Error): void;
}

/** Source of header blocks and raw bytes, as consumed by the framer. */
export interface FrameReader {
    readHeaders(): Promise<EslHeaders>;
    readBytes(length: number): Promise<Buffer>;
}

type Attempt<T> = () => T | undefined;

type Waiter = {
    /** Completes the read when enough data is buffered; returns `true` when done. */
    poll: () => boolean;
    fail: (failure: Error | null) => void;
};

/**
 * Buffers inbound bytes and serves them as lines, header blocks and
 * fixed-length bodies. Only one read may be pending at a time.
 */
export class LineConnection implements FrameReader {
    private buffer: Buffer = Buffer.alloc(0);
    private waiter: Waiter | null = null;
    private failure: Error | null = null;
    private closed = false;

    constructor(private readonly socket: LineSocket) {
        socket.on('data', (chunk) => {
            this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
            this.drain();
        });
        socket.on('end', () => this.markClosed(null));
        socket.on('close', () => this.markClosed(null));
        socket.on('error', (err) => this.markClosed(err));
    }

    /** `true` once the peer has closed or the socket failed. */
    public isClosed(): boolean {
        return this.closed;
    }

    /** Number of received bytes not consumed yet. */
    public bufferedBytes(): number {
        return this.buffer.length;
    }

    /** Reads one line, without its `\n` or `\r\n` terminator. */
    public readLine(): Promise<string> {
        return this.read(() => this.takeLine(), (failure) => new TransportError(
            failure ? `Connection failed: ${failure.message}` : 'Connection closed while reading a line',
            {cause: failure ?? undefined},
        ));
    }

    /** Reads lines up to an empty line and parses them as headers. */
    public async readHeaders(): Promise<EslHeaders> {
        const lines: string[] = [];
        for (;;) {
            const line = await this.readLine();
            if (line === '') return parseHeaderBlock(lines);
            lines.push(line);
        }
    }

    /** Reads exactly `length` bytes. */
    public readBytes(length: number): Promise<Buffer> {
        if (!Number.isSafeInteger(length) || length < 0) {
            return Promise.reject(new RangeError(`Byte count must be a non-negative integer, got ${length}`));
        }
        return this.read(() => this.takeBytes(length), (failure) => new TruncatedBodyError(
            length,
            this.buffer.length,
            {cause: failure ?? undefined},
        ));
    }

    /** Writes raw text to the socket. */
    public async write(data: string): Promise<void> {
        if (this.closed) {
            throw new TransportError('Cannot write to a closed connection', {cause: this.failure ?? undefined});
        }
        await new Promise<void>((resolve, reject) => {
            this.socket.write(data, (err) => {
                if (err) reject(new TransportError(`Write failed: ${err.message}`, {cause: err}));
                else resolve();
            });
        });
    }

    /** Ends the socket and fails any pending read. */
    public close(): void {
        if (!this.closed) this.socket.end();
        this.markClosed(null);
    }

    private read<T>(attempt: Attempt<T>, onClosed: (failure: Error | null) => Error): Promise<T> {
        if (this.waiter) {
            return Promise.reject(new EslError({
                message: 'Another read is already in progress on this connection',
                domain: 'session',
                code: 'READ_IN_PROGRESS',
            }));
        }
        const ready = attempt();
        if (ready !== undefined) return Promise.resolve(ready);
        if (this.closed) return Promise.reject(onClosed(this.failure));

        return new Promise<T>((resolve, reject) => {
            this.waiter = {
                poll: () => {
                    const value = attempt();
                    if (value === undefined) return false;
                    resolve(value);
                    return true;
                },
                fail: (failure) => reject(onClosed(failure)),
            };
        });
    }

    private drain(): void {
        const waiter = this.waiter;
        if (!waiter) return;
        if (waiter.poll()) {
            this.waiter = null;
        } else if (this.closed) {
            this.waiter = null;
            waiter.fail(this.failure);
        }
    }

    private markClosed(failure: Error | null): void {
        if (failure && !this.failure) this.failure = failure;
        this.closed = true;
        this.drain();
    }

    private takeLine(): string | undefined {
        const newline = this.buffer.indexOf(0x0a);
        if (newline === -1) return undefined;
        const end = newline > 0 && this.buffer[newline - 1] === 0x0d ? newline - 1 : newline;
        const line = this.buffer.subarray(0, end).toString('utf8');
        this.buffer = this.buffer.subarray(newline + 1);
        return line;
    }

    private takeBytes(length: number): Buffer | undefined {
        if (this.buffer.length < length) return undefined;
        const bytes = Buffer.from(this.buffer.subarray(0, length));
        this.buffer = this.buffer.subarray(length);
        return bytes;
    }
}
