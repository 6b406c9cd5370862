import * as net from 'net';
import { loadConfig, saveConfig } from '../../configLoader';
import { SocksServer } from '../../../src/socks5Proxy/SocksServer';
import { SocksRuntime } from '../../../src/socks5Proxy/AddressResolver';
import { LogLevel, LogOutput, Logger } from '../../../src/Logger';
import { GREETING_NO_AUTH, SocksTestClient, connectRequestDomain, connectRequestIPv4 } from '../../socksTestClient';
import path from 'path';

const errnoError = (code: string): NodeJS.ErrnoException => {
    return Object.assign(new Error(`connect ${code}`), { code });
};


describe('SOCKS5 Server - rejected handshakes and requests', () => {
    let socksProxy: SocksServer;
    let socksPort: number;
    const lookup = jest.fn<Promise<string>, [string]>();
    const connect = jest.fn<Promise<net.Socket>, [string, number]>();
    const runtime: SocksRuntime = { lookup, connect };
    let client: SocksTestClient;

    beforeAll(async () => {
        const testConfig = loadConfig(path.join(__dirname, '../../commonTestConfig.json'), path.join(__dirname, 'failures_test_server_config.json'));
        saveConfig(path.join(__dirname, 'merged_test_config.json'), testConfig);

        const logger = new Logger(LogLevel.None, LogOutput.Console, '');
        socksProxy = new SocksServer(path.join(__dirname, 'merged_test_config.json'), logger, runtime);
        await socksProxy.start();
        socksPort = socksProxy.address().port;
    });

    afterAll(async () => {
        await socksProxy.close();
    });

    beforeEach(async () => {
        lookup.mockReset();
        connect.mockReset();
        client = await SocksTestClient.connect(socksPort);
    });

    afterEach(() => {
        client.destroy();
    });

    test('A greeting without no-authentication is closed without a reply', async () => {
        client.write(Buffer.from([0x05, 0x01, 0x02]));

        expect(await client.closed()).toEqual(Buffer.alloc(0));
    });

    test('A greeting with another version is closed without a reply', async () => {
        client.write(Buffer.from([0x04, 0x01, 0x00]));

        expect(await client.closed()).toEqual(Buffer.alloc(0));
    });

    test('A greeting cut short is closed without a reply', async () => {
        client.socket.end(Buffer.from([0x05, 0x03, 0x00]));

        expect(await client.closed()).toEqual(Buffer.alloc(0));
    });

    test('BIND is closed after the method reply, without a request reply', async () => {
        client.write(GREETING_NO_AUTH);
        client.write(connectRequestIPv4('127.0.0.1', 80, 0x02));

        expect(await client.closed()).toEqual(Buffer.from([0x05, 0x00]));
        expect(connect).not.toHaveBeenCalled();
    });

    test('UDP ASSOCIATE is closed after the method reply, without a request reply', async () => {
        client.write(GREETING_NO_AUTH);
        client.write(connectRequestIPv4('0.0.0.0', 0, 0x03));

        expect(await client.closed()).toEqual(Buffer.from([0x05, 0x00]));
    });

    test('An IPv6 request is closed without a reply as soon as ATYP is read', async () => {
        client.write(GREETING_NO_AUTH);
        // No DST.ADDR follows: the proxy must not wait for it.
        client.write(Buffer.from([0x05, 0x01, 0x00, 0x04]));

        expect(await client.closed()).toEqual(Buffer.from([0x05, 0x00]));
        expect(lookup).not.toHaveBeenCalled();
        expect(connect).not.toHaveBeenCalled();
    });

    test('A request with a non-zero reserved byte is closed without a reply', async () => {
        client.write(GREETING_NO_AUTH);
        client.write(Buffer.from([0x05, 0x01, 0x01, 0x01, 127, 0, 0, 1, 0x00, 0x50]));

        expect(await client.closed()).toEqual(Buffer.from([0x05, 0x00]));
    });

    test('IPv4 requests dial the literal address without a lookup', async () => {
        connect.mockRejectedValue(errnoError('ECONNREFUSED'));

        const reply = await client.handshake(connectRequestIPv4('93.184.216.34', 80), 10);

        expect(reply).toEqual(Buffer.from([0x05, 0x05, 0x00, 0x01, 0x5d, 0xb8, 0xd8, 0x22, 0x00, 0x50]));
        expect(connect).toHaveBeenCalledWith('93.184.216.34', 80);
        expect(lookup).not.toHaveBeenCalled();
    });

    test('A name that does not resolve is reported with status 0x04 without dialing', async () => {
        lookup.mockRejectedValue(errnoError('ENOTFOUND'));

        const reply = await client.handshake(connectRequestDomain('nowhere.test', 80), 19);

        expect(reply).toEqual(Buffer.concat([
            Buffer.from([0x05, 0x04, 0x00, 0x03, 12]),
            Buffer.from('nowhere.test'),
            Buffer.from([0x00, 0x50])
        ]));
        expect(await client.closed()).toEqual(Buffer.alloc(0));
        expect(lookup).toHaveBeenCalledWith('nowhere.test');
        expect(connect).not.toHaveBeenCalled();
    });

    test('An unreachable host is reported with status 0x04', async () => {
        connect.mockRejectedValue(errnoError('EHOSTUNREACH'));

        const reply = await client.handshake(connectRequestIPv4('10.9.9.9', 443), 10);

        expect(reply[1]).toBe(0x04);
        expect(await client.closed()).toEqual(Buffer.alloc(0));
    });

    test('Other dial failures are reported with the general failure status', async () => {
        connect.mockRejectedValue(errnoError('ETIMEDOUT'));

        const reply = await client.handshake(connectRequestIPv4('10.9.9.9', 443), 10);

        expect(reply).toEqual(Buffer.from([0x05, 0x01, 0x00, 0x01, 10, 9, 9, 9, 0x01, 0xbb]));
        expect(await client.closed()).toEqual(Buffer.alloc(0));
    });

    test('The server keeps accepting after failed sessions', async () => {
        client.write(Buffer.from([0xff]));
        client.socket.end();
        await client.closed();

        const next = await SocksTestClient.connect(socksPort);
        next.write(GREETING_NO_AUTH);
        expect(await next.read(2)).toEqual(Buffer.from([0x05, 0x00]));
        next.destroy();
    });
});
