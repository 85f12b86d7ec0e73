import fs from 'fs';
import { loadConfig, validateConfig } from '../src/config';
import { createDependencies } from '../src/presentation/app';
import { JobConfigInput, createJobConfig } from '../src/domain/entities/JobConfig';
import { PipelineError } from '../src/domain/errors/PipelineErrors';

/**
 * Runs one job without the HTTP server.
 *
 *   npm run headless -- "Why octopuses have three hearts"
 *   npm run headless -- --script-file narration.txt --voice elevenlabs --bg a.mp4 --bg b.mp4
 */
function parseArgs(argv: string[]): JobConfigInput {
    const input: { -readonly [K in keyof JobConfigInput]: JobConfigInput[K] } = {};
    const backgrounds: string[] = [];
    const words: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const next = () => {
            const value = argv[++i];
            if (value === undefined) {
                throw new Error(`${arg} needs a value`);
            }
            return value;
        };

        switch (arg) {
            case '--script-file':
                input.script = fs.readFileSync(next(), 'utf-8');
                break;
            case '--voice':
                input.voiceProvider = next();
                break;
            case '--voice-id':
                input.voiceId = next();
                break;
            case '--duration':
                input.scriptDurationSeconds = Number(next());
                break;
            case '--music':
                input.backgroundMusicPath = next();
                break;
            case '--watermark':
                input.watermarkPathOrText = next();
                break;
            case '--bg':
                backgrounds.push(next());
                break;
            default:
                words.push(arg);
        }
    }

    input.prompt = words.join(' ');
    if (backgrounds.length > 0) {
        input.backgroundVideoPaths = backgrounds;
    }
    return input;
}

async function runHeadless() {
    console.log('🎬 Headless reel run');

    const config = loadConfig();
    const problems = validateConfig(config);
    if (problems.length > 0) {
        problems.forEach((problem) => console.error(`  - ${problem}`));
        process.exit(1);
    }

    const jobConfig = createJobConfig(parseArgs(process.argv.slice(2)), config.jobDefaults);
    const { orchestrator } = createDependencies(config);

    const controller = new AbortController();
    process.once('SIGINT', () => {
        console.log('\n⏹️  Cancelling...');
        controller.abort();
    });

    try {
        const result = await orchestrator.run(jobConfig, { signal: controller.signal });
        console.log(`\n✅ ${result.job.status}${result.cached ? ' (from cache)' : ''}`);
        console.log(`   Video: ${result.video.videoPath}`);
        console.log(`   Duration: ${result.video.durationSeconds.toFixed(2)}s, ${result.video.captionCount} captions, ${result.video.clipCount} clips`);
        result.job.diagnostics.forEach((line) => console.log(`   ⚠️ ${line}`));
    } catch (error) {
        if (error instanceof PipelineError) {
            console.error(`\n❌ ${orchestrator.friendlyMessage(error)}`);
            console.error(`   Failed in ${error.stage ?? 'setup'} (${error.kind}): ${error.message}`);
            if (error.retainedStages.length > 0) {
                console.error(`   Cached for retry: ${error.retainedStages.join(', ')}`);
            }
        } else {
            console.error('\n❌ Unexpected error:', error);
        }
        process.exitCode = 1;
    }
}

runHeadless().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
