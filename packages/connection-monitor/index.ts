export interface ConnectionMetrics {
    connectAttempts: number;
    connectSuccesses: number;
    connectFailures: number;
    disconnects: number;
    identifies: number;
    resumes: number;
    reconnects: number;
    staleConnections: number;
    heartbeatsSent: number;
    heartbeatAcks: number;
    messagesReceived: number;
    messagesSent: number;
    bytesReceived: number;
    bytesSent: number;
    droppedFrames: number;
    /** Seconds, over the last few acknowledged heartbeats. */
    averageLatency: number;
    /** Seconds. */
    lastHeartbeatLatency: number;
    uptime: number;
    lastConnectedAt: number | null;
    lastDisconnectedAt: number | null;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthReport {
    status: HealthStatus;
    details: {
        message: string;
        heartbeatAckRate: number;
        connectSuccessRate: number;
        averageLatency: number;
        droppedFrames: number;
    };
}

function emptyMetrics(): ConnectionMetrics {
    return {
        connectAttempts: 0,
        connectSuccesses: 0,
        connectFailures: 0,
        disconnects: 0,
        identifies: 0,
        resumes: 0,
        reconnects: 0,
        staleConnections: 0,
        heartbeatsSent: 0,
        heartbeatAcks: 0,
        messagesReceived: 0,
        messagesSent: 0,
        bytesReceived: 0,
        bytesSent: 0,
        droppedFrames: 0,
        averageLatency: 0,
        lastHeartbeatLatency: 0,
        uptime: 0,
        lastConnectedAt: null,
        lastDisconnectedAt: null
    };
}

export class ConnectionMonitor {
    private metrics: ConnectionMetrics = emptyMetrics();
    private latencies: number[] = [];

    constructor(private readonly maxLatencyHistory = 10) {}

    recordConnectAttempt(): void {
        this.metrics.connectAttempts++;
    }

    recordConnectSuccess(): void {
        this.metrics.connectSuccesses++;
        this.metrics.lastConnectedAt = Date.now();
        this.metrics.lastDisconnectedAt = null;
    }

    recordConnectFailure(): void {
        this.metrics.connectFailures++;
    }

    recordDisconnect(): void {
        this.metrics.disconnects++;
        this.metrics.lastDisconnectedAt = Date.now();

        if (this.metrics.lastConnectedAt !== null) {
            this.metrics.uptime = Date.now() - this.metrics.lastConnectedAt;
        }
    }

    recordIdentify(): void {
        this.metrics.identifies++;
    }

    recordResume(): void {
        this.metrics.resumes++;
    }

    recordReconnect(): void {
        this.metrics.reconnects++;
    }

    recordStaleConnection(): void {
        this.metrics.staleConnections++;
    }

    recordHeartbeatSent(): void {
        this.metrics.heartbeatsSent++;
    }

    recordHeartbeatAck(latency: number): void {
        this.metrics.heartbeatAcks++;
        this.metrics.lastHeartbeatLatency = latency;

        this.latencies.push(latency);
        if (this.latencies.length > this.maxLatencyHistory) {
            this.latencies.shift();
        }

        const sum = this.latencies.reduce((acc, val) => acc + val, 0);
        this.metrics.averageLatency = sum / this.latencies.length;
    }

    recordMessageReceived(byteSize: number = 0): void {
        this.metrics.messagesReceived++;
        this.metrics.bytesReceived += byteSize;
    }

    recordMessageSent(byteSize: number = 0): void {
        this.metrics.messagesSent++;
        this.metrics.bytesSent += byteSize;
    }

    recordDroppedFrame(): void {
        this.metrics.droppedFrames++;
    }

    getMetrics(): Readonly<ConnectionMetrics> {
        return { ...this.metrics };
    }

    getHealthStatus(): HealthReport {
        const { heartbeatsSent, heartbeatAcks, connectAttempts, connectSuccesses } = this.metrics;

        // The newest heartbeat may legitimately still be waiting for its ack.
        const heartbeatAckRate = heartbeatsSent > 1
            ? Math.min(100, (heartbeatAcks / (heartbeatsSent - 1)) * 100)
            : 100;

        const connectSuccessRate = connectAttempts > 0
            ? (connectSuccesses / connectAttempts) * 100
            : 100;

        const details = {
            heartbeatAckRate,
            connectSuccessRate,
            averageLatency: this.metrics.averageLatency,
            droppedFrames: this.metrics.droppedFrames
        };

        if (heartbeatAckRate >= 95 && connectSuccessRate >= 90 && this.metrics.staleConnections === 0) {
            return { status: 'healthy', details: { ...details, message: 'Connection is healthy' } };
        }

        if (heartbeatAckRate >= 80 && connectSuccessRate >= 70) {
            return { status: 'degraded', details: { ...details, message: 'Connection quality is degraded' } };
        }

        return { status: 'unhealthy', details: { ...details, message: 'Connection is unhealthy' } };
    }

    reset(): void {
        this.metrics = emptyMetrics();
        this.latencies = [];
    }

    getUptime(): number {
        if (this.metrics.lastConnectedAt === null) {
            return 0;
        }

        if (this.metrics.lastDisconnectedAt !== null) {
            return this.metrics.uptime;
        }

        return Date.now() - this.metrics.lastConnectedAt;
    }
}
