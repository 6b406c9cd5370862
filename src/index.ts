#!/usr/bin/env node

import { SocksServer } from './socks5Proxy/SocksServer';
import * as path from 'path';
import { Logger, parseLogLevel, parseLogOutput } from './Logger';

const argValue = (flag: string): string | null => {
    const index = process.argv.indexOf(flag);
    return index > -1 && index + 1 < process.argv.length ? process.argv[index + 1] : null;
};

async function main() {
    try {
        const configPath = argValue('--config_path') ?? path.join(__dirname, '../server-config.json');
        const logFilePath = argValue('--log_file_path') ?? path.join(__dirname, '../server.log');
        const logLevel = parseLogLevel(argValue('--log_level'));
        const logOutput = parseLogOutput(argValue('--log_output'));
        const portArg = argValue('--port');

        const logger = new Logger(logLevel, logOutput, logFilePath);
        const socksServer = new SocksServer(configPath, logger);
        if (portArg !== null) {
            socksServer.configManager.overrideSocksPort(Number(portArg));
        }

        logger.debug(`Server Process PID : ${process.pid.toString()}`);
        logger.debug(`Using config file ${socksServer.configManager.getConfigFilePath()}`);

        await socksServer.start();

        const gracefulShutdown = () => {
            logger.info('Shutting down the server...');
            socksServer.close().then(
                () => process.exit(0),
                (error: unknown) => {
                    logger.error('Failed to close the server:', error);
                    process.exit(1);
                }
            );
        };

        process.on('SIGINT', gracefulShutdown);
        process.on('SIGTERM', gracefulShutdown);

    } catch (error) {
        console.error('Failed to start the server:', error);
        process.exit(1);
    }
}

void main();
