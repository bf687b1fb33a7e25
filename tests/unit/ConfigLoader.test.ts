import { Config, getConfig, loadConfig, resetConfig, validateConfig } from '../../src/config/index';

describe('Config', () => {
    const originalEnv = process.env;

    beforeEach(() => {
        process.env = { NODE_ENV: 'test', OPENAI_API_KEY: 'test-openai-key' };
        resetConfig();
    });

    afterAll(() => {
        process.env = originalEnv;
    });

    describe('loadConfig', () => {
        it('should apply defaults', () => {
            const config = loadConfig();

            expect(config.port).toBe(3000);
            expect(config.outputDir).toBe('videos');
            expect(config.topicsFile).toBe('data/topics.json');
            expect(config.topicsStateFile).toBe('data/rotation-state.json');
            expect(config.slideStyle).toBe('premium');
            expect(config.canvasWidth).toBe(1080);
            expect(config.canvasHeight).toBe(1920);
            expect(config.fontPaths).toEqual([]);
            expect(config.maxVideoSeconds).toBe(59);
            expect(config.truncationPolicy).toBe('hard-cut');
            expect(config.audioTailBufferSeconds).toBe(1);
            expect(config.ttsProvider).toBe('openai');
            expect(config.ttsVoice).toBe('onyx');
            expect(config.ttsTimeoutMs).toBe(30000);
            expect(config.ffmpegTimeoutSeconds).toBe(300);
            expect(config.ffprobeTimeoutMs).toBe(30000);
            expect(config.ffmpegPath).toBeUndefined();
            expect(config.llmBaseUrl).toBe('https://api.mistral.ai/v1');
        });

        it('should strip wrapping quotes and whitespace', () => {
            process.env.OPENAI_API_KEY = '  "test-quoted-key"  ';
            process.env.TELEGRAM_CHANNEL_ID = "'@lessons'";

            const config = loadConfig();

            expect(config.openaiApiKey).toBe('test-quoted-key');
            expect(config.telegramChannelId).toBe('@lessons');
        });

        it('should parse numbers and lists', () => {
            process.env.PORT = '"4000"';
            process.env.AUDIO_TAIL_BUFFER_SECONDS = '0.5';
            process.env.FONT_PATHS = '/fonts/a.ttf, /fonts/b.ttf,,';

            const config = loadConfig();

            expect(config.port).toBe(4000);
            expect(config.audioTailBufferSeconds).toBe(0.5);
            expect(config.fontPaths).toEqual(['/fonts/a.ttf', '/fonts/b.ttf']);
        });

        it('should reject a non-numeric number', () => {
            process.env.MAX_VIDEO_SECONDS = 'sixty';
            expect(() => loadConfig()).toThrow('Environment variable MAX_VIDEO_SECONDS must be a number, got: sixty');
        });

        it('should reject an unknown slide style', () => {
            process.env.SLIDE_STYLE = 'neon';
            expect(() => loadConfig()).toThrow('SLIDE_STYLE must be one of classic, enhanced, premium, got: neon');
        });

        it('should reject an unknown truncation policy', () => {
            process.env.TRUNCATION_POLICY = 'fade';
            expect(() => loadConfig()).toThrow('TRUNCATION_POLICY must be hard-cut or drop-trailing, got: fade');
        });

        it('should leave the voice empty for Fish Audio by default', () => {
            process.env.TTS_PROVIDER = 'fish';
            expect(loadConfig().ttsVoice).toBe('');
        });
    });

    describe('validateConfig', () => {
        function configWith(overrides: Partial<Config>): Config {
            return { ...loadConfig(), ...overrides };
        }

        it('should accept the defaults with an OpenAI key', () => {
            expect(validateConfig(loadConfig())).toEqual([]);
        });

        it('should require the key of the selected TTS provider', () => {
            expect(validateConfig(configWith({ openaiApiKey: '' }))).toEqual([
                'OPENAI_API_KEY is required when TTS_PROVIDER is "openai"',
            ]);
            expect(validateConfig(configWith({ ttsProvider: 'fish', ttsVoice: '' }))).toEqual([
                'FISH_AUDIO_API_KEY is required when TTS_PROVIDER is "fish"',
                'TTS_VOICE must name a Fish Audio voice when TTS_PROVIDER is "fish"',
            ]);
        });

        it('should reject a non-positive duration cap', () => {
            expect(validateConfig(configWith({ maxVideoSeconds: 0 }))).toEqual(['MAX_VIDEO_SECONDS must be positive']);
        });

        it('should reject a negative tail buffer', () => {
            expect(validateConfig(configWith({ audioTailBufferSeconds: -1 }))).toEqual([
                'AUDIO_TAIL_BUFFER_SECONDS cannot be negative',
            ]);
        });

        it('should require a channel when a Telegram token is set', () => {
            expect(validateConfig(configWith({ telegramBotToken: 'test-bot-token' }))).toEqual([
                'TELEGRAM_CHANNEL_ID is required when TELEGRAM_BOT_TOKEN is set',
            ]);
        });

        it('should require the YouTube credentials together', () => {
            expect(validateConfig(configWith({ youtubeClientId: 'test-client' }))).toEqual([
                'YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN must be set together',
            ]);
        });
    });

    it('getConfig should cache until reset', () => {
        const first = getConfig();
        process.env.PORT = '5000';

        expect(getConfig()).toBe(first);
        resetConfig();
        expect(getConfig().port).toBe(5000);
    });
});
