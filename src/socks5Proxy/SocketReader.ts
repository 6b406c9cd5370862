import { Duplex } from 'stream';
import { StreamClosed } from './SocksErrors';

interface PendingRead {
    size: number;
    resolve: (data: Buffer) => void;
    reject: (error: Error) => void;
}

/**
 * Exact-length reads on top of a socket's `data` events. A read resolves with exactly `size`
 * bytes; anything the peer sent beyond that stays buffered for the next read or for
 * {@link SocketReader.detach}.
 */
export class SocketReader {
    private chunks: Buffer[] = [];
    private buffered = 0;
    private pending: PendingRead | null = null;
    private ended = false;
    private failure: Error | null = null;
    private detached = false;

    constructor(private readonly socket: Duplex) {
        this.socket.on('data', this.onData);
        this.socket.on('end', this.onEnd);
        this.socket.on('close', this.onEnd);
        this.socket.on('error', this.onError);
    }

    public read(size: number): Promise<Buffer> {
        if (this.detached) {
            return Promise.reject(new Error('SocketReader is detached'));
        }
        if (this.pending) {
            return Promise.reject(new Error('A read is already pending'));
        }
        return new Promise((resolve, reject) => {
            this.pending = { size, resolve, reject };
            this.settle();
        });
    }

    /**
     * Stops reading and hands back the bytes received but not consumed yet. The socket is left
     * paused so that nothing arrives unobserved until the next consumer resumes it.
     */
    public detach(): Buffer {
        if (!this.detached) {
            this.detached = true;
            this.socket.pause();
            this.socket.off('data', this.onData);
            this.socket.off('end', this.onEnd);
            this.socket.off('close', this.onEnd);
            this.socket.off('error', this.onError);
        }
        const pending = this.pending;
        if (pending) {
            this.pending = null;
            pending.reject(new StreamClosed('reader detached'));
        }
        return this.take(this.buffered);
    }

    private onData = (chunk: Buffer) => {
        this.chunks.push(chunk);
        this.buffered += chunk.length;
        this.settle();
    };

    private onEnd = () => {
        this.ended = true;
        this.settle();
    };

    private onError = (error: Error) => {
        this.failure = error;
        this.settle();
    };

    private settle() {
        const pending = this.pending;
        if (!pending) {
            return;
        }
        if (this.buffered >= pending.size) {
            this.pending = null;
            pending.resolve(this.take(pending.size));
            return;
        }
        if (this.ended || this.failure) {
            this.pending = null;
            const reason = this.failure ? this.failure.message : 'peer closed the stream';
            pending.reject(new StreamClosed(
                `${reason} after ${this.buffered} of ${pending.size} byte(s)`,
                { cause: this.failure ?? undefined }
            ));
        }
    }

    private take(size: number): Buffer {
        const all = Buffer.concat(this.chunks, this.buffered);
        const rest = all.subarray(size);
        this.chunks = rest.length > 0 ? [rest] : [];
        this.buffered = rest.length;
        return all.subarray(0, size);
    }
}
