import * as dns from 'dns';
import * as net from 'net';
import { AddressType } from './SocksConstants';
import { ConnectRequest } from './SocksCodec';
import { Nxdomain, UnsupportedAddressFamily, isErrnoException } from './SocksErrors';

export interface Destination {
    host: string;
    port: number;
}

/**
 * What the proxy needs from the host runtime to reach a destination.
 */
export interface SocksRuntime {
    lookup(hostname: string): Promise<string>;
    connect(host: string, port: number): Promise<net.Socket>;
}

const NAME_RESOLUTION_ERRORS = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_NONAME', 'ENODATA', 'EAI_FAIL']);

export const nodeRuntime: SocksRuntime = {
    async lookup(hostname: string): Promise<string> {
        const { address } = await dns.promises.lookup(hostname);
        return address;
    },

    connect(host: string, port: number): Promise<net.Socket> {
        return new Promise((resolve, reject) => {
            const socket = net.createConnection({ host, port });
            const onError = (err: Error) => {
                socket.destroy();
                reject(err);
            };
            socket.once('error', onError);
            socket.once('connect', () => {
                socket.off('error', onError);
                resolve(socket);
            });
        });
    }
};

export const assertSupportedAddressType = (addressType: AddressType): void => {
    if (addressType === AddressType.IPv6) {
        throw new UnsupportedAddressFamily('IPv6 destinations are not supported');
    }
};

export class AddressResolver {
    constructor(private readonly runtime: SocksRuntime = nodeRuntime) {}

    /**
     * Turns the request's DST.ADDR into something connectable. IPv4 addresses are used as-is;
     * domain names are looked up on every call.
     */
    public async resolve(request: ConnectRequest): Promise<Destination> {
        const { address, port } = request;
        assertSupportedAddressType(address.type);

        if (address.type === AddressType.IPv4) {
            return { host: address.host, port };
        }

        try {
            const host = await this.runtime.lookup(address.host);
            return { host, port };
        } catch (error) {
            if (isErrnoException(error) && error.code !== undefined && NAME_RESOLUTION_ERRORS.has(error.code)) {
                throw new Nxdomain(`Cannot resolve ${address.host}: ${error.code}`, { cause: error });
            }
            throw error;
        }
    }

    public dial(destination: Destination): Promise<net.Socket> {
        return this.runtime.connect(destination.host, destination.port);
    }
}
