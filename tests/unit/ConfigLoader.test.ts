import { Config, getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

describe('ConfigLoader Resilience', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = {};
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should strip double quotes from environment variables', () => {
        process.env.OPENAI_API_KEY = '"test-secret"';

        expect(loadConfig().openaiApiKey).toBe('test-secret');
    });

    it('should strip single quotes from environment variables', () => {
        process.env.OPENAI_API_KEY = "'test-secret'";

        expect(loadConfig().openaiApiKey).toBe('test-secret');
    });

    it('should trim whitespace from environment variables', () => {
        process.env.OPENAI_API_KEY = '  test-secret  ';

        expect(loadConfig().openaiApiKey).toBe('test-secret');
    });

    it('should apply defaults when nothing is set', () => {
        const config = loadConfig();

        expect(config.port).toBe(3000);
        expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:8080']);
        expect(config.footageProvider).toBe('pexels');
        expect(config.redisUrl).toBeUndefined();
        expect(config.publishWebhookToken).toBeUndefined();
        expect(config.jobDefaults).toEqual({
            scriptDurationSeconds: 30,
            voiceProvider: 'openai',
            fontSize: 24,
            fontName: 'Roboto',
            strokeColor: '#000000',
            textColor: '#ffffff',
            strokeWidth: 1,
            subtitlesPosition: 'bottom',
            watermarkPathOrText: '',
            maxSearchTerms: 10,
            maxProviderRetries: 3,
        });
    });

    it('should read job defaults from the environment', () => {
        process.env.DEFAULT_VOICE_PROVIDER = 'ElevenLabs';
        process.env.CAPTION_POSITION = 'TOP';
        process.env.MAX_PROVIDER_RETRIES = '5';
        process.env.CORS_ORIGINS = 'https://a.test, ,https://b.test';

        const config = loadConfig();

        expect(config.jobDefaults.voiceProvider).toBe('elevenlabs');
        expect(config.jobDefaults.subtitlesPosition).toBe('top');
        expect(config.jobDefaults.maxProviderRetries).toBe(5);
        expect(config.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    });

    it('should reject non-numeric numbers', () => {
        process.env.PORT = 'eighty';

        expect(() => loadConfig()).toThrow('Environment variable PORT must be a number, got: eighty');
    });

    it('should reject unknown choices', () => {
        process.env.FOOTAGE_PROVIDER = 'vimeo';

        expect(() => loadConfig()).toThrow('Environment variable FOOTAGE_PROVIDER must be one of pexels, pixabay, got: vimeo');
    });

    it('should cache the loaded config until reset', () => {
        process.env.PORT = '4000';
        const first = getConfig();
        process.env.PORT = '5000';

        expect(getConfig()).toBe(first);
        resetConfig();
        expect(getConfig().port).toBe(5000);
    });
});

describe('validateConfig', () => {
    const originalEnv = process.env;

    function configWith(env: Record<string, string>): Config {
        process.env = { ...env };
        return loadConfig();
    }

    afterAll(() => {
        process.env = originalEnv;
    });

    it('should accept a complete setup', () => {
        expect(validateConfig(configWith({ OPENAI_API_KEY: 'test-secret', PEXELS_API_KEY: 'test-secret' }))).toEqual([]);
    });

    it('should report missing keys for the chosen providers', () => {
        const errors = validateConfig(
            configWith({ FOOTAGE_PROVIDER: 'pixabay', DEFAULT_VOICE_PROVIDER: 'fishaudio' })
        );

        expect(errors).toEqual([
            'OPENAI_API_KEY is required for script generation',
            'FISH_AUDIO_API_KEY and FISH_AUDIO_VOICE_ID are required when the default voice provider is "fishaudio"',
            'PIXABAY_API_KEY is required when FOOTAGE_PROVIDER is "pixabay"',
        ]);
    });

    it('should reject unknown voices and bad limits', () => {
        const errors = validateConfig(
            configWith({
                OPENAI_API_KEY: 'test-secret',
                PEXELS_API_KEY: 'test-secret',
                DEFAULT_VOICE_PROVIDER: 'robot',
                JOB_CONCURRENCY: '0',
                MAX_PROVIDER_RETRIES: '1.5',
            })
        );

        expect(errors).toEqual([
            'DEFAULT_VOICE_PROVIDER must be openai, fishaudio or elevenlabs, got: robot',
            'JOB_CONCURRENCY must be a positive integer',
            'MAX_PROVIDER_RETRIES must be a non-negative integer',
        ]);
    });
});
