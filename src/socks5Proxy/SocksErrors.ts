import { ReplyStatus } from './SocksConstants';

enum SocksErrorCode {
    MalformedGreeting = 'MalformedGreeting',
    UnsupportedAuth = 'UnsupportedAuth',
    MalformedRequest = 'MalformedRequest',
    UnsupportedCommand = 'UnsupportedCommand',
    UnsupportedAddressFamily = 'UnsupportedAddressFamily',
    Nxdomain = 'Nxdomain',
    ConnectionRefused = 'ConnectionRefused',
    DialFailed = 'DialFailed',
    StreamClosed = 'StreamClosed'
}

/**
 * Base class of every protocol-level failure a session can hit.
 *
 * `replyStatus` is set only for failures the client is told about with a reply frame;
 * everything else ends the connection without a reply.
 */
abstract class SocksError extends Error {
    abstract readonly code: SocksErrorCode;
    readonly replyStatus?: ReplyStatus;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

class MalformedGreeting extends SocksError {
    readonly code = SocksErrorCode.MalformedGreeting;
}

class UnsupportedAuth extends SocksError {
    readonly code = SocksErrorCode.UnsupportedAuth;
}

class MalformedRequest extends SocksError {
    readonly code = SocksErrorCode.MalformedRequest;
}

class UnsupportedCommand extends SocksError {
    readonly code = SocksErrorCode.UnsupportedCommand;
}

class UnsupportedAddressFamily extends SocksError {
    readonly code = SocksErrorCode.UnsupportedAddressFamily;
}

class Nxdomain extends SocksError {
    readonly code = SocksErrorCode.Nxdomain;
    readonly replyStatus = ReplyStatus.HostUnreachable;
}

class ConnectionRefused extends SocksError {
    readonly code = SocksErrorCode.ConnectionRefused;
    readonly replyStatus = ReplyStatus.ConnectionRefused;
}

class DialFailed extends SocksError {
    readonly code = SocksErrorCode.DialFailed;
    declare readonly replyStatus: ReplyStatus;

    constructor(message: string, replyStatus: ReplyStatus = ReplyStatus.GeneralFailure, options?: { cause?: unknown }) {
        super(message, options);
        this.replyStatus = replyStatus;
    }
}

// Terminal condition of a relay direction or a read cut short by the peer; not a real failure.
class StreamClosed extends SocksError {
    readonly code = SocksErrorCode.StreamClosed;
}

class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Narrows a thrown value to a Node system error carrying an errno code such as `ECONNREFUSED`.
 * Checks the shape only: errors raised in another realm (a vm context, Jest's sandbox) fail
 * `instanceof Error`.
 */
const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => {
    return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
};

export {
    SocksErrorCode,
    SocksError,
    MalformedGreeting,
    UnsupportedAuth,
    MalformedRequest,
    UnsupportedCommand,
    UnsupportedAddressFamily,
    Nxdomain,
    ConnectionRefused,
    DialFailed,
    StreamClosed,
    ConfigError,
    isErrnoException
};
