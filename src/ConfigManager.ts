import { DEFAULT_CONFIG, ListenAddress, ServerConfig } from './ServerConfigInterface';
import { ConfigError } from './socks5Proxy/SocksErrors';
import * as fs from 'fs';
import * as path from 'path';

// Only the listen address is configurable; it is read once, before the server starts listening.

const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const readSection = (parent: Record<string, unknown>, key: string, where: string): Record<string, unknown> => {
    const section = parent[key];
    if (section === undefined) {
        return {};
    }
    if (!isRecord(section)) {
        throw new ConfigError(`${where}.${key} must be an object`);
    }
    return section;
};

export const validatePort = (value: unknown, where: string): number => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > 65535) {
        throw new ConfigError(`${where} must be an integer between 0 and 65535, got ${JSON.stringify(value)}`);
    }
    return value;
};

export class ConfigManager {
    private configFilePath: string;
    public config: ServerConfig;

    constructor(configPath: string) {
        this.configFilePath = path.resolve(configPath);
        this.config = this.loadConfig(this.configFilePath);
    }

    public loadConfig(configPath: string): ServerConfig {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigError(`Cannot read config file ${configPath}: ${reason}`);
        }
        return ConfigManager.parseConfig(raw);
    }

    public static parseConfig(raw: unknown): ServerConfig {
        if (!isRecord(raw)) {
            throw new ConfigError('config must be a JSON object');
        }
        const server = readSection(raw, 'server', 'config');
        const socks5 = readSection(server, 'socks5', 'config.server');
        const defaults = DEFAULT_CONFIG.server.socks5;

        const serverIP = socks5.serverIP ?? defaults.serverIP;
        if (typeof serverIP !== 'string' || serverIP.length === 0) {
            throw new ConfigError('config.server.socks5.serverIP must be a non-empty string');
        }
        const port = validatePort(socks5.port ?? defaults.port, 'config.server.socks5.port');

        return { server: { socks5: { serverIP, port } } };
    }

    public getConfigFilePath(): string {
        return this.configFilePath;
    }

    public getSocksListenAddress(): ListenAddress {
        return { ...this.config.server.socks5 };
    }

    public overrideSocksPort(port: number) {
        this.config.server.socks5.port = validatePort(port, '--port');
    }
}
