export const SOCKS_VERSION = 0x05;
export const RESERVED = 0x00;

enum AuthMethod {
    NoAuthentication = 0x00
}

enum Command {
    Connect = 0x01,
    Bind = 0x02
}

enum AddressType {
    IPv4 = 0x01,
    DomainName = 0x03,
    IPv6 = 0x04
}

enum ReplyStatus {
    Succeeded = 0x00,
    GeneralFailure = 0x01,
    HostUnreachable = 0x04,
    ConnectionRefused = 0x05
}

// VER, CMD, RSV, ATYP
export const REQUEST_HEADER_LENGTH = 4;
export const PORT_LENGTH = 2;

export { AuthMethod, Command, AddressType, ReplyStatus };
