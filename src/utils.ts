import * as net from 'net';
import { Duplex } from 'stream';


export const toHex = (byte: number): string => {
    return `0x${byte.toString(16).padStart(2, '0')}`;
};

export const describeSocket = (socket: net.Socket): string => {
    return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
};

/**
 * Flushes whatever is still queued on the writable side (plus an optional last chunk), then
 * destroys the stream. Streams already destroyed are left alone.
 */
export const closeStream = (stream: Duplex, lastChunk?: Buffer): void => {
    if (stream.destroyed) {
        return;
    }
    if (stream.writableEnded) {
        if (stream.writableFinished) {
            stream.destroy();
        } else {
            stream.once('finish', () => stream.destroy());
        }
        return;
    }
    const destroy = () => stream.destroy();
    if (lastChunk) {
        stream.end(lastChunk, destroy);
    } else {
        stream.end(destroy);
    }
};

/** Resolves once the stream has emitted `close`, or right away if it already has. */
export const waitForClose = (stream: Duplex): Promise<void> => {
    return new Promise((resolve) => {
        if (stream.closed) {
            resolve();
            return;
        }
        stream.once('close', () => resolve());
    });
};
