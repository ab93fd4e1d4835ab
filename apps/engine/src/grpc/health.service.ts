import { ServerUnaryCall, sendUnaryData, ServerWritableStream } from '@grpc/grpc-js';

export interface HealthCheckRequest {
    service: string;
}

type ServingStatus = 'SERVING' | 'NOT_SERVING';

export interface HealthCheckResponse {
    status: ServingStatus;
}

export type HealthProbe = () => Promise<unknown>;

/**
 * Standard gRPC health check service implementation.
 * Serving while every probe (snapshot store, Redis when configured) succeeds.
 */
export class HealthService {
    constructor(private probes: HealthProbe[]) { }

    private async currentStatus(): Promise<ServingStatus> {
        try {
            await Promise.all(this.probes.map(probe => probe()));
            return 'SERVING';
        } catch (error) {
            console.error('[grpc] health check failed:', error);
            return 'NOT_SERVING';
        }
    }

    async check(
        _call: Pick<ServerUnaryCall<HealthCheckRequest, HealthCheckResponse>, 'request'>,
        callback: sendUnaryData<HealthCheckResponse>
    ) {
        callback(null, { status: await this.currentStatus() });
    }

    async watch(call: Pick<ServerWritableStream<HealthCheckRequest, HealthCheckResponse>, 'write' | 'end'>) {
        call.write({ status: await this.currentStatus() });
        call.end();
    }
}
