#!/usr/bin/env node
import cac from 'cac';
import path from 'path';
import readline from 'readline';
import { version } from '../package.json';
import { SessionManager } from './core/SessionManager';
import { FileDocument } from './document/FileDocument';
import { bindDocument } from './document/MemoryDocument';
import { resolveConfig, type SessionConfig } from './config';
import { Logger, isLogLevelName, parseLogLevel, type LogLevelName } from './utils/Logger';
import { ConfigurationError, PairpenError } from './errors';

const cli = cac('pairpen');

interface CommonOptions {
    port?: number;
    bind?: string;
    timeout?: number;
    logLevel?: string;
    json?: boolean;
}

cli
    .command('host [file]', 'Host a session and share [file] (default: ./pairpen.txt)')
    .option('--port <port>', 'Port to listen on')
    .option('--bind <address>', 'Interface to bind')
    .option('--log-level <level>', 'debug | info | warn | error | none')
    .option('--json', 'Log as JSON lines')
    .action(async (file: string | undefined, options: CommonOptions) => {
        const run = createRun(file, options);
        if (!run) return;
        const ok = await run.session.startHosting();
        if (!ok) run.shutdown(1);
    });

cli
    .command('join <address> [file]', 'Join the session hosted at <address> and mirror it into [file]')
    .option('--port <port>', 'Port the host listens on')
    .option('--timeout <ms>', 'Connection timeout in milliseconds')
    .option('--log-level <level>', 'debug | info | warn | error | none')
    .option('--json', 'Log as JSON lines')
    .action(async (address: string, file: string | undefined, options: CommonOptions) => {
        const run = createRun(file, options);
        if (!run) return;
        const ok = await run.session.connectToHost(address);
        if (!ok) run.shutdown(1);
    });

cli.help();
cli.version(version);
cli.parse();

interface Run {
    session: SessionManager;
    shutdown: (code?: number) => void;
}

function createRun(file: string | undefined, options: CommonOptions): Run | null {
    let config: SessionConfig;
    try {
        config = resolveConfig({
            port: options.port,
            bindAddress: options.bind,
            connectTimeoutMs: options.timeout,
            logLevel: toLevelName(options.logLevel),
            logJson: options.json,
        });
    } catch (err) {
        console.error(err instanceof PairpenError ? err.message : String(err));
        process.exitCode = 1;
        return null;
    }

    const logger = new Logger('pairpen');
    logger.setLogLevel(parseLogLevel(config.logLevel));
    logger.setJson(config.logJson);

    const doc = new FileDocument(path.resolve(file ?? 'pairpen.txt'), logger.child('file'));
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    const session = new SessionManager({
        editor: doc,
        config,
        logger,
        approver: {
            approveControlRequest: () => new Promise<boolean>((resolve) => {
                rl.question('Peer requests editing control. Grant? [y/N] ', (answer) => {
                    resolve(answer.trim().toLowerCase().startsWith('y'));
                });
            }),
        },
    });

    let done = false;
    const unbind = bindDocument(session, doc);
    const shutdown = (code: number = 0) => {
        if (done) return;
        done = true;
        unbind();
        session.stopSession();
        doc.dispose();
        rl.close();
        process.exitCode = code;
    };

    session.on('hostingStarted', (address, port) => {
        logger.info(`Hosting ${doc.path} on ${address}:${port}. Waiting for a peer...`);
    });
    session.on('peerConnected', (role) => {
        logger.info(role === 'host' ? 'Peer joined. You hold editing control.' : 'Joined. The host holds editing control.');
    });
    session.on('controlChanged', (hasControl) => {
        logger.info(hasControl ? 'You hold editing control.' : 'You are viewing; edits are not sent.');
    });
    session.on('controlDeclined', () => logger.info('The host declined your control request.'));
    session.on('error', (error) => logger.warn(`${error.code}: ${error.message}`));
    session.on('peerDisconnected', (reason) => {
        if (reason === 'preempted') return;
        logger.info(`Peer disconnected (${reason}).`);
        shutdown();
    });

    rl.on('line', (line) => {
        switch (line.trim().toLowerCase()) {
            case 'request':
                session.requestControl();
                break;
            case 'reclaim':
                session.onUserRequestedReclaim();
                break;
            case 'status': {
                const { role, linkState, hasControl } = session.getSnapshot();
                logger.info(`role=${role} link=${linkState} control=${hasControl}`);
                break;
            }
            case 'stop':
            case 'quit':
                shutdown();
                break;
            case '':
                break;
            default:
                logger.info('Commands: request, reclaim, status, stop');
        }
    });
    rl.on('close', () => shutdown());
    process.once('SIGINT', () => shutdown());

    doc.watch();
    return { session, shutdown };
}

function toLevelName(value: string | undefined): LogLevelName | undefined {
    if (value === undefined) return undefined;
    const name = value.toLowerCase();
    if (!isLogLevelName(name)) {
        throw new ConfigurationError(`Unknown log level: ${value}`);
    }
    return name;
}
