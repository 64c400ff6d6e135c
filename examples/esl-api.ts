import pino from 'pino';

import {ESL_DEFAULT_PORT, EventSocketSession} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    password?: string;
    command: string;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: '127.0.0.1', command: 'status'};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--password=')) {
            options.password = arg.substring('--password='.length);
        } else if (arg.startsWith('--command=')) {
            options.command = arg.substring('--command='.length);
        }
    }
    return options;
}

const options = parseArgs(process.argv.slice(2));

const session = new EventSocketSession({
    host: options.host,
    port: options.port,
    password: options.password,
    logger: pino({level: 'info'}),
});

async function main(): Promise<void> {
    await session.connect();
    console.log(`Connected to ${options.host}:${options.port ?? ESL_DEFAULT_PORT}`);
    const output = await session.runAPI(options.command);
    console.log(output.trim());
    session.close();
}

main().catch((err) => {
    console.error('[EslError]', err instanceof Error ? err.message : err);
    session.close();
    process.exitCode = 1;
});
