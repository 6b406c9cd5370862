import * as net from 'net';
import { AddressResolver, SocksRuntime, nodeRuntime } from './AddressResolver';
import { SocksSession } from './SocksSession';
import { Logger } from '../Logger';
import { ConfigManager } from '../ConfigManager';
import { describeSocket } from '../utils';


export class SocksServer {
    private server: net.Server;
    public configManager: ConfigManager;
    private activeConnections: Set<net.Socket>;
    private logger: Logger;
    private resolver: AddressResolver;
    private sessionCounter = 0;

    constructor(configPath: string, logger: Logger, runtime: SocksRuntime = nodeRuntime) {
        this.configManager = new ConfigManager(configPath);
        // A client may half-close right after its request and still expects the reply.
        this.server = new net.Server({ allowHalfOpen: true });
        this.activeConnections = new Set();
        this.logger = logger;
        this.resolver = new AddressResolver(runtime);

        this.server.on('connection', this.handleConnection.bind(this));
        this.server.on('error', (err) => {
            this.logger.error(`Server error: ${err.message}`);
        });
    }

    /**
     * Entry point for every accepted socket. The session runs on its own; whatever happens to it
     * stays confined to this socket and its target.
     */
    public handleConnection(socket: net.Socket) {
        const sessionId = ++this.sessionCounter;
        const peer = describeSocket(socket);
        const sessionLogger = this.logger.withContext(`session #${sessionId} ${peer}`);
        sessionLogger.info(`New connection on server from socket : ${peer}`);

        // Keeps a client reset from becoming an unhandled 'error' event.
        socket.on('error', (err) => {
            sessionLogger.debug(`Client socket error: ${err.message}`);
        });

        this.activeConnections.add(socket);
        socket.on('close', () => {
            sessionLogger.info(`Connection closed from socket : ${peer}`);
            this.activeConnections.delete(socket);
        });

        new SocksSession(socket, this.resolver, sessionLogger).run().catch((error: unknown) => {
            sessionLogger.error('Session terminated unexpectedly:', error);
            socket.destroy();
        });
    }

    public address(): net.AddressInfo {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
            throw new Error('SOCKS5 server is not listening on a TCP port');
        }
        return address;
    }

    public async start(): Promise<void> {
        const { serverIP, port } = this.configManager.getSocksListenAddress();

        return new Promise((resolve, reject) => {
            const onError = (error: Error) => {
                this.logger.error(`Error starting SOCKS5 server: ${error.message}`);
                reject(error);
            };
            this.server.once('error', onError);

            this.server.listen(port, serverIP, () => {
                this.server.off('error', onError);
                const { address, port: boundPort } = this.address();
                this.logger.info(`SOCKS5 server listening on ${address}:${boundPort}`);
                resolve();
            });
        });
    }

    public async close(): Promise<void> {
        return new Promise((resolve, reject) => {
            for (const socket of this.activeConnections) {
                socket.destroy();
            }
            this.activeConnections.clear();
            this.logger.info(`Closed active connections`);

            this.server.close((error) => {
                if (error) {
                    this.logger.error(`Error closing SOCKS5 server: ${error.message}`);
                    reject(error);
                } else {
                    this.logger.info(`Closing the server...`);
                    resolve();
                }
            });
        });
    }
}
