export interface SessionBandwidth {
    totalUpstream: number;
    totalDownstream: number;
}

/**
 * Byte accounting for one relayed connection. Upstream is client to destination, downstream
 * the way back.
 */
export class SessionMonitor {
    private bytesUpstream: number = 0;
    private bytesDownstream: number = 0;
    private readonly startedAt: number;

    constructor(now: number = Date.now()) {
        this.startedAt = now;
    }

    recordUpstream(bytes: number) {
        this.bytesUpstream += bytes;
    }

    recordDownstream(bytes: number) {
        this.bytesDownstream += bytes;
    }

    getTotalSessionBandwidth(): SessionBandwidth {
        return {
            totalUpstream: this.bytesUpstream,
            totalDownstream: this.bytesDownstream
        };
    }

    getDuration(now: number = Date.now()): number {
        return now - this.startedAt;
    }
}
