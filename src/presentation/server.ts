import { Server } from 'http';
import { Config } from '../config';
import { PipelineOrchestrator } from '../application/PipelineOrchestrator';
import { isJobTerminal } from '../domain/entities/PipelineJob';
import { createApp } from './app';

export interface RunningServer {
    server: Server;
    /**
     * Cancels every active job, then stops accepting connections.
     * @returns number of jobs cancelled
     */
    shutdown(): Promise<number>;
}

/**
 * Starts the HTTP API on config.port (0 picks a free port).
 */
export function startServer(config: Config, orchestrator: PipelineOrchestrator): Promise<RunningServer> {
    const app = createApp(config, orchestrator);

    return new Promise((resolve, reject) => {
        const server = app.listen(config.port, () => {
            server.off('error', reject);
            resolve({ server, shutdown: () => shutdown(server, orchestrator) });
        });
        server.once('error', reject);
    });
}

export function cancelActiveJobs(orchestrator: PipelineOrchestrator): number {
    let cancelled = 0;
    for (const job of orchestrator.listJobs()) {
        if (!isJobTerminal(job) && orchestrator.cancel(job.id)) {
            cancelled++;
        }
    }
    return cancelled;
}

async function shutdown(server: Server, orchestrator: PipelineOrchestrator): Promise<number> {
    const cancelled = cancelActiveJobs(orchestrator);
    if (cancelled > 0) {
        console.log(`🛑 Cancelled ${cancelled} active job(s)`);
    }
    await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
    return cancelled;
}
