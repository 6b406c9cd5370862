import { Duplex } from 'stream';
import { Logger } from '../Logger';
import { SessionMonitor, SessionBandwidth } from '../SessionMonitor';
import { StreamClosed } from './SocksErrors';
import { closeStream, waitForClose } from '../utils';

export interface RelayResult extends SessionBandwidth {
    closedBy: StreamClosed;
    durationMs: number;
}

type FinishListener = (reason: StreamClosed) => void;

/**
 * One way of the relay: every chunk read from `source` is written verbatim to `destination`.
 * When the destination's buffer is full the source is paused until `drain`, so at most one
 * chunk is in flight.
 */
class RelayDirection {
    private finished = false;

    constructor(
        readonly name: string,
        private readonly source: Duplex,
        private readonly destination: Duplex,
        private readonly onChunk: (bytes: number) => void,
        private readonly onFinish: FinishListener
    ) {}

    start() {
        this.source.on('data', this.onData);
        this.source.on('end', () => this.finish('source ended'));
        this.source.on('close', () => this.finish('source closed'));
        this.source.on('error', (err: Error) => this.finish('source error', err));

        this.destination.on('drain', this.onDrain);
        this.destination.on('close', () => this.finish('destination closed'));
        this.destination.on('error', (err: Error) => this.finish('destination error', err));

        // A source that ended before the relay began will not emit `end` again.
        if (this.source.readableEnded) {
            this.finish('source ended');
            return;
        }
        this.source.resume();
    }

    /** Stops forwarding; called on both directions as soon as either one ends. */
    stop() {
        this.finished = true;
    }

    private onData = (chunk: Buffer) => {
        if (this.finished || this.destination.writableEnded) {
            return;
        }
        this.onChunk(chunk.length);
        if (!this.destination.write(chunk)) {
            this.source.pause();
        }
    };

    private onDrain = () => {
        if (!this.finished) {
            this.source.resume();
        }
    };

    private finish(reason: string, error?: Error) {
        if (this.finished) {
            return;
        }
        this.finished = true;
        const detail = error ? `${reason}: ${error.message}` : reason;
        this.onFinish(new StreamClosed(`${this.name} ${detail}`, { cause: error }));
    }
}

/**
 * Bidirectional pass-through between two connected streams. The first direction to end closes
 * both streams; {@link Relay.start} resolves once both have emitted `close`.
 */
export class Relay {
    private closedBy: StreamClosed | null = null;
    private readonly upstream: RelayDirection;
    private readonly downstream: RelayDirection;

    constructor(
        private readonly client: Duplex,
        private readonly target: Duplex,
        private readonly logger: Logger,
        private readonly monitor: SessionMonitor = new SessionMonitor()
    ) {
        this.upstream = new RelayDirection('client->target', client, target, (bytes) => this.monitor.recordUpstream(bytes), this.shutdown);
        this.downstream = new RelayDirection('target->client', target, client, (bytes) => this.monitor.recordDownstream(bytes), this.shutdown);
    }

    public async start(): Promise<RelayResult> {
        const closed = Promise.all([waitForClose(this.client), waitForClose(this.target)]);

        if (this.client.destroyed || this.target.destroyed) {
            this.shutdown(new StreamClosed('relay started on a closed stream'));
        } else {
            this.upstream.start();
            this.downstream.start();
        }

        await closed;

        const closedBy = this.closedBy ?? new StreamClosed('both streams closed');
        return {
            ...this.monitor.getTotalSessionBandwidth(),
            closedBy,
            durationMs: this.monitor.getDuration()
        };
    }

    private shutdown = (reason: StreamClosed) => {
        if (this.closedBy) {
            return;
        }
        this.closedBy = reason;
        this.logger.debug(`Relay stopping: ${reason.message}`);

        this.upstream.stop();
        this.downstream.stop();
        closeStream(this.client);
        closeStream(this.target);
    };
}
