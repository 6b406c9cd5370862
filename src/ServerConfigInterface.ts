export interface ListenAddress {
    serverIP: string;
    port: number;
};

export interface ServerConfig {
    server: {
        socks5: ListenAddress;
    };
};

export const DEFAULT_CONFIG: ServerConfig = {
    server: {
        socks5: {
            serverIP: '0.0.0.0',
            port: 1080
        }
    }
};
