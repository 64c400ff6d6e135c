/**
 * Event socket session: authentication, commands and event dispatch over
 * one TCP connection.
 * @module esl/session
 */
import * as net from 'net';
import type {Socket} from 'net';
import {EventEmitter} from 'events';
import pino, {type Logger} from 'pino';
import Queue from 'yocto-queue';

import {
    ESL_DEFAULT_CONNECT_TIMEOUT_MS,
    ESL_DEFAULT_HOST,
    ESL_DEFAULT_MAX_BODY_BYTES,
    ESL_DEFAULT_PASSWORD,
    ESL_DEFAULT_PORT,
    ESL_LINE_TERMINATOR,
    ESL_REPLY_AUTH_ACCEPTED,
    ESL_REPLY_OK,
    EslContentType,
} from './constants';
import type {EslMessage} from './codec';
import {LineConnection} from './connection';
import {
    AuthenticationError,
    CommandError,
    EslError,
    TransportError,
    toEslError,
} from './errors';
import {readFrame, type ApiResponseFrame, type CommandReplyFrame, type EventFrame, type Frame} from './framer';

/**
 * Configuration for an {@link EventSocketSession}.
 */
export type EventSocketSessionOptions = {
    /** Server hostname or IP address. Defaults to {@link ESL_DEFAULT_HOST}. */
    host?: string;
    /** Server TCP port. Defaults to {@link ESL_DEFAULT_PORT}. */
    port?: number;
    /** Password sent with `auth`. Defaults to {@link ESL_DEFAULT_PASSWORD}. */
    password?: string;
    /** Timeout for establishing the TCP connection. */
    connectTimeoutMs?: number;
    /** Largest accepted api/response body. */
    maxBodyBytes?: number;
    /** Encoding used for the string returned by {@link EventSocketSession.runAPI}. */
    encoding?: BufferEncoding;
    /** pino logger. Defaults to a silent logger. */
    logger?: Logger;
};

export enum SessionState {
    Unconnected = 'unconnected',
    Connecting = 'connecting',
    Authenticated = 'authenticated',
    Closed = 'closed',
}

/**
 * What the dispatcher is reading for. While awaiting a reply, events that
 * arrive first are queued instead of returned.
 */
export enum ReadMode {
    Idle = 'idle',
    AwaitingReply = 'awaiting_reply',
}

/**
 * Typed event map emitted by {@link EventSocketSession}.
 */
export interface EventSocketSessionEvents {
    /** Emitted after authentication succeeds. */
    connect: [];
    /** Emitted when the socket closes. */
    disconnect: [hadError: boolean];
    /** Emitted on every state change. */
    state: [state: SessionState];
}

const assertSingleLine = (value: string, what: string): void => {
    if (/[\r\n]/.test(value)) {
        throw new RangeError(`${what} must not contain line breaks`);
    }
};

/**
 * Client session on a server's inbound event socket.
 *
 * Strictly sequential: await each operation before starting the next one.
 * Events that arrive while a command waits for its reply are kept, in
 * arrival order, and handed out by {@link readEvent} before anything new is
 * read from the socket.
 */
export class EventSocketSession extends EventEmitter<EventSocketSessionEvents> {
    private readonly host: string;
    private readonly port: number;
    private readonly password: string;
    private readonly connectTimeoutMs: number;
    private readonly maxBodyBytes: number;
    private readonly encoding: BufferEncoding;
    private readonly logger: Logger;

    private state: SessionState = SessionState.Unconnected;
    private socket: Socket | null = null;
    private connection: LineConnection | null = null;
    private busy = false;
    private readonly eventQueue = new Queue<EventFrame>();

    constructor(options: EventSocketSessionOptions = {}) {
        super();
        this.host = options.host ?? ESL_DEFAULT_HOST;
        this.port = options.port ?? ESL_DEFAULT_PORT;
        this.password = options.password ?? ESL_DEFAULT_PASSWORD;
        this.connectTimeoutMs = options.connectTimeoutMs ?? ESL_DEFAULT_CONNECT_TIMEOUT_MS;
        this.maxBodyBytes = options.maxBodyBytes ?? ESL_DEFAULT_MAX_BODY_BYTES;
        this.encoding = options.encoding ?? 'utf8';

        if (!Number.isInteger(this.port) || this.port < 1 || this.port > 65535) {
            throw new RangeError(`Port must be 1-65535, got ${this.port}`);
        }
        if (!(this.connectTimeoutMs > 0)) {
            throw new RangeError(`connectTimeoutMs must be positive, got ${this.connectTimeoutMs}`);
        }
        if (!Number.isSafeInteger(this.maxBodyBytes) || this.maxBodyBytes <= 0) {
            throw new RangeError(`maxBodyBytes must be a positive integer, got ${this.maxBodyBytes}`);
        }
        assertSingleLine(this.password, 'Password');

        this.logger = (options.logger ?? pino({level: 'silent'})).child({
            module: 'esl',
            host: this.host,
            port: this.port,
        });
    }

    /** Returns the current session state. */
    public getState(): SessionState {
        return this.state;
    }

    /** Returns `true` while the session is authenticated and the socket is open. */
    public isConnected(): boolean {
        return this.state === SessionState.Authenticated && !!this.connection && !this.connection.isClosed();
    }

    /** Number of events buffered while commands were waiting for replies. */
    public getQueuedEventCount(): number {
        return this.eventQueue.size;
    }

    /**
     * Dials the server, reads its welcome block and authenticates.
     * Rejects with {@link AuthenticationError} unless the server accepts the password.
     */
    public async connect(): Promise<void> {
        if (this.state !== SessionState.Unconnected) {
            throw this.invalidState('connect');
        }
        this.setState(SessionState.Connecting);

        try {
            const connection = await this.dial();
            const welcome = await connection.readHeaders();
            this.logger.debug({contentType: welcome.get('Content-Type')}, 'Received welcome');

            this.logger.debug({}, 'Authenticating');
            await connection.write(this.formatCommand([`auth ${this.password}`]));
            const reply = await connection.readHeaders();
            const replyText = reply.get('Reply-Text') ?? null;
            if (reply.get('Content-Type') !== EslContentType.CommandReply || replyText !== ESL_REPLY_AUTH_ACCEPTED) {
                throw new AuthenticationError(replyText);
            }
        } catch (err) {
            const error = toEslError(err);
            this.logger.warn({err: error}, 'Connect failed');
            this.teardown();
            throw error;
        }

        this.setState(SessionState.Authenticated);
        this.logger.info({}, 'Authenticated');
        this.emit('connect');
    }

    /**
     * Adds an event filter, e.g. `Event-Name CHANNEL_ANSWER`. Filters only let
     * matching events through; several filters may be active at once.
     */
    public async addFilter(spec: string): Promise<void> {
        await this.sendCommand(`filter ${spec}`);
    }

    /** Enables plain-format events for the given classes, or `ALL`. */
    public async subscribeEvent(classOrAll: string | readonly string[]): Promise<void> {
        const classes = typeof classOrAll === 'string' ? classOrAll : classOrAll.join(' ');
        await this.sendCommand(`event plain ${classes}`);
    }

    /** Runs a blocking `api` command and returns its output as a string. */
    public async runAPI(cmd: string): Promise<string> {
        const frame = await this.sendApi(cmd);
        return frame.message.body ?? '';
    }

    /** Runs a blocking `api` command and returns its output bytes unchanged. */
    public async runAPIBuffer(cmd: string): Promise<Buffer> {
        const frame = await this.sendApi(cmd);
        return frame.body;
    }

    /**
     * Executes a dialplan application on a channel via `sendmsg`.
     * An empty `arg` is omitted; `lock` sets `event-lock: true`.
     */
    public async execute(app: string, arg: string, uuid: string, lock = false): Promise<void> {
        const lines = [
            `sendmsg ${uuid}`,
            'call-command: execute',
            `execute-app-name: ${app}`,
        ];
        if (arg !== '') lines.push(`execute-app-arg: ${arg}`);
        if (lock) lines.push('event-lock: true');
        await this.sendCommand(lines);
    }

    /** Returns the next event: a queued one if any, otherwise the next one read. */
    public async readEvent(): Promise<EslMessage> {
        return this.readMessage(ReadMode.Idle);
    }

    /**
     * Reads the next message.
     *
     * With {@link ReadMode.Idle} a queued event is returned without any I/O.
     * With {@link ReadMode.AwaitingReply} events are queued until a command
     * reply or API response arrives.
     */
    public async readMessage(mode: ReadMode): Promise<EslMessage> {
        const frame = await this.exclusive(() => this.nextFrame(mode));
        return frame.message;
    }

    /** Closes the connection. Queued events stay readable. */
    public close(): void {
        if (this.state === SessionState.Closed) return;
        this.logger.info({}, 'Closing');
        this.connection?.close();
        this.connection = null;
        this.socket = null;
        this.setState(SessionState.Closed);
    }

    private async nextFrame(mode: ReadMode): Promise<Frame> {
        if (mode === ReadMode.Idle) {
            const queued = this.eventQueue.dequeue();
            if (queued) {
                this.logger.trace({remaining: this.eventQueue.size}, 'Delivering queued event');
                return queued;
            }
        }
        const connection = this.requireConnection();

        for (;;) {
            let frame: Frame;
            try {
                frame = await readFrame(connection, {maxBodyBytes: this.maxBodyBytes, encoding: this.encoding});
            } catch (err) {
                throw this.fail(err);
            }
            this.logger.trace({kind: frame.kind, mode}, 'Read frame');

            if (frame.kind === 'event' && mode === ReadMode.AwaitingReply) {
                this.eventQueue.enqueue(frame);
                this.logger.trace({queued: this.eventQueue.size}, 'Queued event while awaiting reply');
                continue;
            }
            return frame;
        }
    }

    /** Sends a command block; anything but a `+OK` command reply raises {@link CommandError}. */
    private async sendCommand(lines: string | readonly string[]): Promise<CommandReplyFrame> {
        const block = typeof lines === 'string' ? [lines] : lines;
        const [command = ''] = block;
        const frame = await this.request(block);
        if (frame.kind !== 'command-reply') {
            throw new CommandError(command, null, {details: {kind: frame.kind}});
        }
        if (frame.replyText !== ESL_REPLY_OK) {
            throw new CommandError(command, frame.replyText);
        }
        return frame;
    }

    private async sendApi(cmd: string): Promise<ApiResponseFrame> {
        const command = `api ${cmd}`;
        const frame = await this.request([command]);
        if (frame.kind === 'api-response') return frame;
        throw new CommandError(command, frame.kind === 'command-reply' ? frame.replyText : null, {
            details: {kind: frame.kind},
        });
    }

    private request(lines: readonly string[]): Promise<Frame> {
        for (const line of lines) assertSingleLine(line, 'Command line');
        return this.exclusive(async () => {
            const connection = this.requireConnection();
            this.logger.debug({command: lines[0]}, 'Sending command');
            try {
                await connection.write(this.formatCommand(lines));
            } catch (err) {
                throw this.fail(err);
            }
            const frame = await this.nextFrame(ReadMode.AwaitingReply);
            this.logger.debug({command: lines[0], kind: frame.kind}, 'Received reply');
            return frame;
        });
    }

    /** Rejects overlapping operations: the protocol allows one exchange at a time. */
    private async exclusive<T>(run: () => Promise<T>): Promise<T> {
        if (this.busy) {
            throw new EslError({
                message: 'Another operation is already reading from this session',
                domain: 'session',
                code: 'READ_IN_PROGRESS',
            });
        }
        this.busy = true;
        try {
            return await run();
        } finally {
            this.busy = false;
        }
    }

    /** Every line ends in CRLF; the block ends with an empty line. */
    private formatCommand(lines: readonly string[]): string {
        return lines.map((line) => `${line}${ESL_LINE_TERMINATOR}`).join('') + ESL_LINE_TERMINATOR;
    }

    private async dial(): Promise<LineConnection> {
        const socket = net.createConnection({host: this.host, port: this.port});
        const connection = new LineConnection(socket);
        this.socket = socket;
        this.connection = connection;

        socket.on('close', (hadError) => {
            this.logger.info({hadError}, 'Socket closed');
            this.emit('disconnect', hadError);
        });

        await new Promise<void>((resolve, reject) => {
            const timer = setTimeout(() => {
                socket.off('connect', onConnect);
                socket.off('error', onError);
                reject(new TransportError(`Connection to ${this.host}:${this.port} timed out after ${this.connectTimeoutMs}ms`));
            }, this.connectTimeoutMs);
            const onConnect = (): void => {
                clearTimeout(timer);
                socket.off('error', onError);
                resolve();
            };
            const onError = (err: Error): void => {
                clearTimeout(timer);
                socket.off('connect', onConnect);
                reject(new TransportError(`Connection to ${this.host}:${this.port} failed: ${err.message}`, {cause: err}));
            };
            socket.once('connect', onConnect);
            socket.once('error', onError);
        });

        this.logger.info({}, 'Connected');
        return connection;
    }

    private requireConnection(): LineConnection {
        if (this.state !== SessionState.Authenticated || !this.connection) {
            throw this.invalidState('this operation');
        }
        return this.connection;
    }

    /** Closes the session on fatal errors and returns the error to throw. */
    private fail(err: unknown): EslError {
        const error = toEslError(err);
        if (error.fatal) {
            this.logger.warn({err: error}, 'Fatal protocol error, closing session');
            this.close();
        }
        return error;
    }

    private teardown(): void {
        this.socket?.destroy();
        this.connection?.close();
        this.socket = null;
        this.connection = null;
        this.setState(SessionState.Closed);
    }

    private invalidState(operation: string): EslError {
        return new EslError({
            message: `Cannot run ${operation} in state "${this.state}"`,
            domain: 'session',
            code: 'INVALID_STATE',
            details: {state: this.state},
        });
    }

    private setState(next: SessionState): void {
        if (next === this.state) return;
        this.state = next;
        this.emit('state', next);
    }
}
