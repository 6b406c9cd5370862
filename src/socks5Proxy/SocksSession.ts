import * as net from 'net';
import { AddressResolver, assertSupportedAddressType } from './AddressResolver';
import { ConnectCommandHandler } from './ConnectCommandHandler';
import { Relay } from './Relay';
import { SocketReader } from './SocketReader';
import {
    ConnectRequest,
    addressFieldLength,
    decodeGreeting,
    decodeRequest,
    decodeRequestHeader,
    encodeMethodSelection,
    encodeReply,
    greetingLength,
    selectMethod
} from './SocksCodec';
import { AddressType, Command, PORT_LENGTH, REQUEST_HEADER_LENGTH, ReplyStatus } from './SocksConstants';
import {
    MalformedGreeting,
    MalformedRequest,
    SocksError,
    StreamClosed,
    UnsupportedCommand
} from './SocksErrors';
import { Logger } from '../Logger';
import { SessionMonitor } from '../SessionMonitor';
import { closeStream, toHex } from '../utils';

enum SocksSessionState {
    AwaitingGreeting = 'AwaitingGreeting',
    AwaitingRequest = 'AwaitingRequest',
    Connecting = 'Connecting',
    Relaying = 'Relaying',
    Closed = 'Closed',
    Failed = 'Failed'
}

type ErrorFactory = (message: string) => SocksError;

/**
 * Drives one client connection: greeting, request, dial, then relay. Every way out of the
 * session, successful or not, goes through {@link SocksSession.finish}.
 */
export class SocksSession {
    private state: SocksSessionState = SocksSessionState.AwaitingGreeting;
    private readonly reader: SocketReader;
    private request: ConnectRequest | null = null;
    private targetSocket: net.Socket | null = null;
    private readonly monitor = new SessionMonitor();

    constructor(
        private readonly clientSocket: net.Socket,
        private readonly resolver: AddressResolver,
        private readonly logger: Logger
    ) {
        this.reader = new SocketReader(clientSocket);
    }

    /** Runs the session to completion. Never rejects; the outcome shows only in socket state and logs. */
    public async run(): Promise<void> {
        try {
            await this.handleGreeting();
            const request = await this.handleRequest();
            const target = await this.handleConnect(request);
            await this.handleRelay(target);
        } catch (error) {
            this.fail(error);
        }
    }

    private async handleGreeting() {
        const toError: ErrorFactory = (message) => new MalformedGreeting(message);

        const header = await this.readField(2, 'VER/NMETHODS', toError);
        const methods = await this.readField(greetingLength(header) - header.length, 'METHODS', toError);
        const { value: greeting } = decodeGreeting(Buffer.concat([header, methods]));

        const method = selectMethod(greeting);
        this.clientSocket.write(encodeMethodSelection(method));
        this.logger.debug(`Greeting accepted, methods offered: [${greeting.methods.map(toHex).join(', ')}]`);
        this.transition(SocksSessionState.AwaitingRequest);
    }

    private async handleRequest(): Promise<ConnectRequest> {
        const toError: ErrorFactory = (message) => new MalformedRequest(message);

        const header = await this.readField(REQUEST_HEADER_LENGTH, 'VER/CMD/RSV/ATYP', toError);
        const { command, addressType } = decodeRequestHeader(header).value;
        if (command !== Command.Connect) {
            throw new UnsupportedCommand(`CMD: ${toHex(command)} is not supported, only CONNECT`);
        }
        assertSupportedAddressType(addressType);

        const lengthPrefix = addressType === AddressType.DomainName
            ? await this.readField(1, 'DST.ADDR length', toError)
            : Buffer.alloc(0);
        const domainLength = lengthPrefix.length > 0 ? lengthPrefix[0] : 0;
        const remaining = addressFieldLength(addressType, domainLength) - lengthPrefix.length + PORT_LENGTH;
        const tail = await this.readField(remaining, 'DST.ADDR/DST.PORT', toError);

        const { value: request } = decodeRequest(Buffer.concat([header, lengthPrefix, tail]));
        this.request = request;
        this.logger.info(`CONNECT ${request.address.host}:${request.port} requested`);
        this.transition(SocksSessionState.Connecting);
        return request;
    }

    private async handleConnect(request: ConnectRequest): Promise<net.Socket> {
        const target = await new ConnectCommandHandler(request, this.resolver, this.logger).execute();
        this.targetSocket = target;
        target.on('error', (err) => this.logger.debug(`Target socket error: ${err.message}`));

        this.clientSocket.write(encodeReply(ReplyStatus.Succeeded, request.address, request.port));
        this.transition(SocksSessionState.Relaying);
        return target;
    }

    private async handleRelay(target: net.Socket) {
        // Bytes the client pipelined behind its request belong to the destination.
        const pipelined = this.reader.detach();
        if (pipelined.length > 0) {
            this.monitor.recordUpstream(pipelined.length);
            target.write(pipelined);
        }

        const result = await new Relay(this.clientSocket, target, this.logger, this.monitor).start();
        this.logger.info(
            `Relay finished (${result.closedBy.message}): ${result.totalUpstream} byte(s) up, ` +
            `${result.totalDownstream} byte(s) down in ${result.durationMs}ms`
        );
        this.finish(SocksSessionState.Closed);
    }

    private async readField(size: number, field: string, toError: ErrorFactory): Promise<Buffer> {
        try {
            return await this.reader.read(size);
        } catch (error) {
            if (error instanceof StreamClosed) {
                throw toError(`${field}: ${error.message}`);
            }
            throw error;
        }
    }

    private fail(error: unknown) {
        if (error instanceof SocksError) {
            this.logger.info(`Session failed in ${this.state}: ${error.name}: ${error.message}`);
        } else {
            this.logger.error(`Unexpected error in ${this.state}:`, error);
        }

        const reply = error instanceof SocksError && error.replyStatus !== undefined && this.request
            ? encodeReply(error.replyStatus, this.request.address, this.request.port)
            : undefined;
        this.finish(SocksSessionState.Failed, reply);
    }

    private finish(state: SocksSessionState.Closed | SocksSessionState.Failed, lastReply?: Buffer) {
        this.transition(state);
        this.reader.detach();
        closeStream(this.clientSocket, lastReply);
        if (this.targetSocket) {
            closeStream(this.targetSocket);
        }
    }

    private transition(next: SocksSessionState) {
        this.logger.debug(`State ${this.state} -> ${next}`);
        this.state = next;
    }
}
