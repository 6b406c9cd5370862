import * as net from 'net';
import { AddressResolver } from './AddressResolver';
import { ConnectRequest } from './SocksCodec';
import { ReplyStatus } from './SocksConstants';
import { ConnectionRefused, DialFailed, SocksError, isErrnoException } from './SocksErrors';
import { Logger } from '../Logger';

const UNREACHABLE_ERRORS = new Set(['EHOSTUNREACH', 'ENETUNREACH']);

/**
 * Maps whatever resolving or dialing threw onto the error taxonomy, and so onto a reply status.
 */
export const classifyConnectError = (error: unknown, target: string): SocksError => {
    if (error instanceof SocksError) {
        return error;
    }
    const code = isErrnoException(error) ? error.code : undefined;
    const reason = isErrnoException(error) || error instanceof Error ? error.message : String(error);

    if (code === 'ECONNREFUSED') {
        return new ConnectionRefused(`Connection to ${target} refused`, { cause: error });
    }
    if (code !== undefined && UNREACHABLE_ERRORS.has(code)) {
        return new DialFailed(`${target} unreachable: ${reason}`, ReplyStatus.HostUnreachable, { cause: error });
    }
    return new DialFailed(`Cannot connect to ${target}: ${reason}`, ReplyStatus.GeneralFailure, { cause: error });
};

export class ConnectCommandHandler {
    constructor(
        private readonly request: ConnectRequest,
        private readonly resolver: AddressResolver,
        private readonly logger: Logger
    ) {}

    /** Resolves and dials the requested destination; never retries another address. */
    public async execute(): Promise<net.Socket> {
        const { address, port } = this.request;
        const target = `${address.host}:${port}`;

        try {
            const destination = await this.resolver.resolve(this.request);
            if (destination.host !== address.host) {
                this.logger.debug(`Resolved ${address.host} to ${destination.host}`);
            }
            this.logger.info(`Attempting to connect to ${target}`);
            const socket = await this.resolver.dial(destination);
            this.logger.info(`Connection to ${target} established`);
            return socket;
        } catch (error) {
            throw classifyConnectError(error, target);
        }
    }
}
