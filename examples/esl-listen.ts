import pino from 'pino';

import {EventSocketSession, SessionState} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    password?: string;
    events: string[];
    filters: string[];
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: '127.0.0.1', events: [], filters: []};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--password=')) {
            options.password = arg.substring('--password='.length);
        } else if (arg.startsWith('--event=')) {
            options.events.push(arg.substring('--event='.length));
        } else if (arg.startsWith('--filter=')) {
            options.filters.push(arg.substring('--filter='.length));
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

session.on('disconnect', (hadError) => {
    console.log(`Disconnected (hadError=${hadError})`);
});

async function main(): Promise<void> {
    await session.connect();
    for (const filter of options.filters) {
        await session.addFilter(filter);
    }
    await session.subscribeEvent(options.events.length > 0 ? options.events : 'ALL');

    while (session.getState() === SessionState.Authenticated) {
        const event = await session.readEvent();
        const name = event['Event-Name'] ?? 'UNKNOWN';
        const uuid = event['Unique-ID'];
        console.log(uuid ? `${name} uuid=${uuid}` : name);
    }
}

main().catch((err) => {
    console.error('[EslError]', err instanceof Error ? err.message : err);
    session.close();
    process.exitCode = 1;
});
