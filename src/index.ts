import { loadConfig, validateConfig } from './config';
import { createDependencies } from './presentation/app';
import { startServer } from './presentation/server';

async function main(): Promise<void> {
    const config = loadConfig();
    const problems = validateConfig(config);
    if (problems.length > 0) {
        console.error(`❌ Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`);
        process.exitCode = 1;
        return;
    }

    const { orchestrator, cache } = createDependencies(config);
    const pruned = await cache.evict();
    const running = await startServer(config, orchestrator);
    console.log(`✅ Reel pipeline listening on port ${config.port} (${config.environment}, ${pruned} cache entries pruned)`);

    let stopping = false;
    const stop = (signal: NodeJS.Signals) => {
        if (stopping) {
            return;
        }
        stopping = true;
        console.log(`${signal} received, shutting down...`);
        running.shutdown().then(
            () => process.exit(0),
            (error: unknown) => {
                console.error('💥 Shutdown failed:', error);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
}

main().catch((error: unknown) => {
    console.error('💥 Fatal error during startup:', error);
    process.exit(1);
});
