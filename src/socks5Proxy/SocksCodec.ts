import * as net from 'net';
import {
    AddressType,
    AuthMethod,
    PORT_LENGTH,
    RESERVED,
    ReplyStatus,
    SOCKS_VERSION
} from './SocksConstants';
import { MalformedGreeting, MalformedRequest, SocksError, UnsupportedAuth } from './SocksErrors';
import { toHex } from '../utils';

/**
 * Destination address as carried on the wire. `raw` holds the DST.ADDR bytes exactly as the
 * client sent them (without the length byte of a domain name) so that replies can echo them.
 */
export interface SocksAddress {
    type: AddressType;
    host: string;
    raw: Buffer;
}

export interface Greeting {
    methods: number[];
}

export interface RequestHeader {
    command: number;
    addressType: AddressType;
}

export interface ConnectRequest {
    command: number;
    address: SocksAddress;
    port: number;
}

export interface Decoded<T> {
    value: T;
    bytesRead: number;
}

class BufferCursor {
    private offset = 0;

    constructor(private readonly buf: Buffer, private readonly fail: (message: string) => SocksError) {}

    get bytesRead(): number {
        return this.offset;
    }

    uint8(field: string): number {
        this.ensure(1, field);
        const value = this.buf.readUInt8(this.offset);
        this.offset += 1;
        return value;
    }

    uint16(field: string): number {
        this.ensure(2, field);
        const value = this.buf.readUInt16BE(this.offset);
        this.offset += 2;
        return value;
    }

    bytes(length: number, field: string): Buffer {
        this.ensure(length, field);
        const value = Buffer.from(this.buf.subarray(this.offset, this.offset + length));
        this.offset += length;
        return value;
    }

    private ensure(length: number, field: string) {
        const available = this.buf.length - this.offset;
        if (available < length) {
            throw this.fail(`${field}: expected ${length} byte(s), got ${available}`);
        }
    }
}

const isAddressType = (value: number): value is AddressType => {
    return value === AddressType.IPv4 || value === AddressType.DomainName || value === AddressType.IPv6;
};

const formatIPv6 = (raw: Buffer): string => {
    const groups: string[] = [];
    for (let i = 0; i < raw.length; i += 2) {
        groups.push(raw.readUInt16BE(i).toString(16));
    }
    return groups.join(':');
};

/*
    +----+----------+----------+
    |VER | NMETHODS | METHODS  |
    +----+----------+----------+
    | 1  |    1     | 1 to 255 |
    +----+----------+----------+
*/
export const decodeGreeting = (data: Buffer): Decoded<Greeting> => {
    const cursor = new BufferCursor(data, (message) => new MalformedGreeting(message));

    const version = cursor.uint8('VER');
    if (version !== SOCKS_VERSION) {
        throw new MalformedGreeting(`VER: expected ${toHex(SOCKS_VERSION)}, got ${toHex(version)}`);
    }
    const nMethods = cursor.uint8('NMETHODS');
    const methods = [...cursor.bytes(nMethods, 'METHODS')];

    return { value: { methods }, bytesRead: cursor.bytesRead };
};

/** Validates VER and returns the full greeting length announced by NMETHODS. */
export const greetingLength = (header: Buffer): number => {
    const cursor = new BufferCursor(header, (message) => new MalformedGreeting(message));
    const version = cursor.uint8('VER');
    if (version !== SOCKS_VERSION) {
        throw new MalformedGreeting(`VER: expected ${toHex(SOCKS_VERSION)}, got ${toHex(version)}`);
    }
    return 2 + cursor.uint8('NMETHODS');
};

// Only "no authentication" is implemented.
export const selectMethod = (greeting: Greeting): AuthMethod => {
    if (!greeting.methods.includes(AuthMethod.NoAuthentication)) {
        const offered = greeting.methods.map(toHex).join(', ');
        throw new UnsupportedAuth(`METHODS: ${toHex(AuthMethod.NoAuthentication)} not offered (got [${offered}])`);
    }
    return AuthMethod.NoAuthentication;
};

export const encodeMethodSelection = (method: AuthMethod): Buffer => {
    return Buffer.from([SOCKS_VERSION, method]);
};

const readRequestHeader = (cursor: BufferCursor): RequestHeader => {
    const version = cursor.uint8('VER');
    if (version !== SOCKS_VERSION) {
        throw new MalformedRequest(`VER: expected ${toHex(SOCKS_VERSION)}, got ${toHex(version)}`);
    }
    const command = cursor.uint8('CMD');
    const reserved = cursor.uint8('RSV');
    if (reserved !== RESERVED) {
        throw new MalformedRequest(`RSV: expected ${toHex(RESERVED)}, got ${toHex(reserved)}`);
    }
    const addressType = cursor.uint8('ATYP');
    if (!isAddressType(addressType)) {
        throw new MalformedRequest(`ATYP: unknown address type ${toHex(addressType)}`);
    }
    return { command, addressType };
};

export const decodeRequestHeader = (data: Buffer): Decoded<RequestHeader> => {
    const cursor = new BufferCursor(data, (message) => new MalformedRequest(message));
    const value = readRequestHeader(cursor);
    return { value, bytesRead: cursor.bytesRead };
};

/**
 * Number of DST.ADDR bytes that follow ATYP, including the length byte of a domain name.
 */
export const addressFieldLength = (addressType: AddressType, domainLength = 0): number => {
    switch (addressType) {
        case AddressType.IPv4:
            return 4;
        case AddressType.DomainName:
            return 1 + domainLength;
        case AddressType.IPv6:
            return 16;
    }
};

const readAddress = (cursor: BufferCursor, addressType: AddressType): SocksAddress => {
    switch (addressType) {
        case AddressType.IPv4: {
            const raw = cursor.bytes(4, 'DST.ADDR');
            return { type: addressType, host: [...raw].join('.'), raw };
        }
        case AddressType.DomainName: {
            const length = cursor.uint8('DST.ADDR length');
            if (length === 0) {
                throw new MalformedRequest('DST.ADDR: empty domain name');
            }
            const raw = cursor.bytes(length, 'DST.ADDR');
            return { type: addressType, host: raw.toString(), raw };
        }
        case AddressType.IPv6: {
            const raw = cursor.bytes(16, 'DST.ADDR');
            return { type: addressType, host: formatIPv6(raw), raw };
        }
    }
};

/*
    +----+-----+-------+------+----------+----------+
    |VER | CMD |  RSV  | ATYP | DST.ADDR | DST.PORT |
    +----+-----+-------+------+----------+----------+
    | 1  |  1  | X'00' |  1   | Variable |    2     |
    +----+-----+-------+------+----------+----------+
*/
export const decodeRequest = (data: Buffer): Decoded<ConnectRequest> => {
    const cursor = new BufferCursor(data, (message) => new MalformedRequest(message));
    const { command, addressType } = readRequestHeader(cursor);

    const address = readAddress(cursor, addressType);
    const port = cursor.uint16('DST.PORT');

    return { value: { command, address, port }, bytesRead: cursor.bytesRead };
};

const encodeAddress = (address: SocksAddress): Buffer => {
    if (address.type === AddressType.DomainName) {
        return Buffer.concat([Buffer.from([address.raw.length]), address.raw]);
    }
    return address.raw;
};

const encodePort = (port: number): Buffer => {
    const buf = Buffer.alloc(PORT_LENGTH);
    buf.writeUInt16BE(port);
    return buf;
};

export const encodeRequest = (request: ConnectRequest): Buffer => {
    return Buffer.concat([
        Buffer.from([SOCKS_VERSION, request.command, RESERVED, request.address.type]),
        encodeAddress(request.address),
        encodePort(request.port)
    ]);
};

/*
    +----+-----+-------+------+----------+----------+
    |VER | REP |  RSV  | ATYP | BND.ADDR | BND.PORT |
    +----+-----+-------+------+----------+----------+
    | 1  |  1  | X'00' |  1   | Variable |    2     |
    +----+-----+-------+------+----------+----------+
*/
export const encodeReply = (status: ReplyStatus, address: SocksAddress, port: number): Buffer => {
    return Buffer.concat([
        Buffer.from([SOCKS_VERSION, status, RESERVED, address.type]),
        encodeAddress(address),
        encodePort(port)
    ]);
};

export const ipv4Address = (host: string): SocksAddress => {
    if (!net.isIPv4(host)) {
        throw new TypeError(`Not an IPv4 address: ${host}`);
    }
    return { type: AddressType.IPv4, host, raw: Buffer.from(host.split('.').map(Number)) };
};

export const domainAddress = (name: string): SocksAddress => {
    const raw = Buffer.from(name);
    if (raw.length === 0 || raw.length > 255) {
        throw new RangeError(`Domain name must be 1 to 255 bytes, got ${raw.length}`);
    }
    return { type: AddressType.DomainName, host: name, raw };
};
