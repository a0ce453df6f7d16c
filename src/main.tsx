import chalk from 'chalk';
import {render} from 'ink';
import React from 'react';
import packageJson from '../package.json';
import {resolveToken} from './auth/token';
import {parseArgs} from './cli/args';
import Help from './components/Help';
import {StatusView} from './components/StatusView';
import {readConfig, resolveSettings} from './config/hcpstat-config';
import {createClusterClient, ClusterStatusService, describeStatusError} from './services/cluster-status-service';
import {getLogger, initializeLogger, log} from './services/logger';
import {createStatusService} from './services/status-service';
import type {StatusSnapshot} from './types/domain';

const EXIT_FAILURE = 1;
const EXIT_USAGE = 2;

async function renderOnce(node: React.ReactElement): Promise<void> {
    const instance = render(node, {patchConsole: false});
    instance.unmount();
    await instance.waitUntilExit();
}

function fail(message: string, code = EXIT_FAILURE): never {
    log.error(message, 'main');
    console.error(`${chalk.red('error:')} ${message}`);
    process.exit(code);
}

async function showStatus(clusterId: string, flags: {url?: string; token?: string}): Promise<StatusSnapshot> {
    const config = await readConfig();
    if (config.isErr()) {
        fail(`invalid config file ${config.error.path}: ${config.error.message}`);
    }

    const settings = resolveSettings(flags, config.value);
    const logger = initializeLogger({keepSessions: settings.keepSessions});
    void logger.cleanupOldSessions().mapErr(error => {
        log.warn('Failed to cleanup old log sessions', 'main', error);
    });
    log.info('hcpstat session started', 'main', {
        sessionId: logger.getSessionId(),
        logFile: logger.getLogFilePath(),
        server: settings.baseUrl,
    });

    const token = await resolveToken(settings.token);
    if (token.isErr()) {
        fail(token.error.message);
    }

    const progress = createStatusService(message => {
        if (process.stderr.isTTY) process.stderr.write(`${chalk.dim(message)}\n`);
    });
    const service = new ClusterStatusService(
        createClusterClient({baseUrl: settings.baseUrl, token: token.value}),
        progress,
    );

    const snapshot = await service.getStatus(clusterId);
    if (snapshot.isErr()) {
        fail(describeStatusError(snapshot.error));
    }
    return snapshot.value;
}

async function main() {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed.isErr()) {
        fail(`${parsed.error.message} (see --help)`, EXIT_USAGE);
    }

    const args = parsed.value;
    switch (args.command) {
        case 'help':
            await renderOnce(<Help version={packageJson.version}/>);
            return;
        case 'version':
            console.log(packageJson.version);
            return;
        case 'status': {
            const snapshot = await showStatus(args.clusterId, {url: args.url, token: args.token});
            await renderOnce(<StatusView snapshot={snapshot}/>);
            const flushed = await getLogger()?.close();
            if (flushed?.isErr()) console.error(`Failed to flush session log: ${flushed.error.message}`);
        }
    }
}

main().catch((error) => {
    const err = error instanceof Error ? error : new Error(String(error));
    log.error('Unhandled failure', 'main', {message: err.message, stack: err.stack});
    console.error(`❌ ${err.message}`);
    process.exit(EXIT_FAILURE);
});
