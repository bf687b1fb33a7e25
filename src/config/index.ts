import dotenv from 'dotenv';
import { TruncationPolicy } from '../domain/entities/VideoAssembly';
import { SlideStyleName, isSlideStyleName } from '../domain/services/SlideStyles';

// Load environment variables
dotenv.config();

export type TTSProvider = 'openai' | 'fish';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Output
    outputDir: string;
    topicsFile: string;
    /** Rotation progress, written after every change */
    topicsStateFile: string;

    // Slides
    slideStyle: SlideStyleName;
    canvasWidth: number;
    canvasHeight: number;
    fontPaths: string[];

    // Encoding
    videoFps: number;
    maxVideoSeconds: number;
    truncationPolicy: TruncationPolicy;
    audioTailBufferSeconds: number;
    ffmpegTimeoutSeconds: number;
    ffprobeTimeoutMs: number;
    ffmpegPath?: string;
    ffprobePath?: string;

    // Narration
    ttsProvider: TTSProvider;
    ttsVoice: string;
    ttsSpeed: number;
    ttsTimeoutMs: number;
    openaiApiKey: string;
    fishAudioApiKey: string;
    fishAudioBaseUrl: string;

    // Lesson generation (OpenAI-compatible chat completions)
    llmApiKey: string;
    llmBaseUrl: string;
    llmModel: string;

    // Telegram
    telegramBotToken: string;
    telegramChannelId: string;

    // YouTube
    youtubeClientId: string;
    youtubeClientSecret: string;
    youtubeRefreshToken: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string): string[] {
    return getEnvVar(key, '')
        .split(',')
        .map((item) => item.trim())
        .filter(Boolean);
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value || undefined;
}

function getSlideStyle(): SlideStyleName {
    const value = getEnvVar('SLIDE_STYLE', 'premium');
    if (!isSlideStyleName(value)) {
        throw new Error(`SLIDE_STYLE must be one of classic, enhanced, premium, got: ${value}`);
    }
    return value;
}

function getTruncationPolicy(): TruncationPolicy {
    const value = getEnvVar('TRUNCATION_POLICY', 'hard-cut');
    if (value !== 'hard-cut' && value !== 'drop-trailing') {
        throw new Error(`TRUNCATION_POLICY must be hard-cut or drop-trailing, got: ${value}`);
    }
    return value;
}

function getTTSProvider(): TTSProvider {
    const value = getEnvVar('TTS_PROVIDER', 'openai');
    if (value !== 'openai' && value !== 'fish') {
        throw new Error(`TTS_PROVIDER must be openai or fish, got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const ttsProvider = getTTSProvider();

    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Output
        outputDir: getEnvVar('OUTPUT_DIR', 'videos'),
        topicsFile: getEnvVar('TOPICS_FILE', 'data/topics.json'),
        topicsStateFile: getEnvVar('TOPICS_STATE_FILE', 'data/rotation-state.json'),

        // Slides
        slideStyle: getSlideStyle(),
        canvasWidth: getEnvVarNumber('CANVAS_WIDTH', 1080),
        canvasHeight: getEnvVarNumber('CANVAS_HEIGHT', 1920),
        fontPaths: getEnvVarList('FONT_PATHS'),

        // Encoding
        videoFps: getEnvVarNumber('VIDEO_FPS', 30),
        maxVideoSeconds: getEnvVarNumber('MAX_VIDEO_SECONDS', 59),
        truncationPolicy: getTruncationPolicy(),
        audioTailBufferSeconds: getEnvVarNumber('AUDIO_TAIL_BUFFER_SECONDS', 1.0),
        ffmpegTimeoutSeconds: getEnvVarNumber('FFMPEG_TIMEOUT_SECONDS', 300),
        ffprobeTimeoutMs: getEnvVarNumber('FFPROBE_TIMEOUT_MS', 30000),
        ffmpegPath: getOptionalEnvVar('FFMPEG_PATH'),
        ffprobePath: getOptionalEnvVar('FFPROBE_PATH'),

        // Narration
        ttsProvider,
        ttsVoice: getEnvVar('TTS_VOICE', ttsProvider === 'openai' ? 'onyx' : ''),
        ttsSpeed: getEnvVarNumber('TTS_SPEED', 1.0),
        ttsTimeoutMs: getEnvVarNumber('TTS_TIMEOUT_MS', 30000),
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        fishAudioApiKey: getEnvVar('FISH_AUDIO_API_KEY', ''),
        fishAudioBaseUrl: getEnvVar('FISH_AUDIO_BASE_URL', 'https://api.fish.audio'),

        // Lesson generation
        llmApiKey: getEnvVar('LLM_API_KEY', ''),
        llmBaseUrl: getEnvVar('LLM_BASE_URL', 'https://api.mistral.ai/v1'),
        llmModel: getEnvVar('LLM_MODEL', 'mistral-large-latest'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        telegramChannelId: getEnvVar('TELEGRAM_CHANNEL_ID', ''),

        // YouTube
        youtubeClientId: getEnvVar('YOUTUBE_CLIENT_ID', ''),
        youtubeClientSecret: getEnvVar('YOUTUBE_CLIENT_SECRET', ''),
        youtubeRefreshToken: getEnvVar('YOUTUBE_REFRESH_TOKEN', ''),
    };
}

/**
 * Validates the configuration, returning one message per problem.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (config.ttsProvider === 'openai' && !config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required when TTS_PROVIDER is "openai"');
    }
    if (config.ttsProvider === 'fish') {
        if (!config.fishAudioApiKey) {
            errors.push('FISH_AUDIO_API_KEY is required when TTS_PROVIDER is "fish"');
        }
        if (!config.ttsVoice) {
            errors.push('TTS_VOICE must name a Fish Audio voice when TTS_PROVIDER is "fish"');
        }
    }
    if (config.maxVideoSeconds <= 0) {
        errors.push('MAX_VIDEO_SECONDS must be positive');
    }
    if (config.canvasWidth <= 0 || config.canvasHeight <= 0) {
        errors.push('CANVAS_WIDTH and CANVAS_HEIGHT must be positive');
    }
    if (config.videoFps <= 0) {
        errors.push('VIDEO_FPS must be positive');
    }
    if (config.audioTailBufferSeconds < 0) {
        errors.push('AUDIO_TAIL_BUFFER_SECONDS cannot be negative');
    }
    if (config.telegramBotToken && !config.telegramChannelId) {
        errors.push('TELEGRAM_CHANNEL_ID is required when TELEGRAM_BOT_TOKEN is set');
    }
    const youtubeKeys = [config.youtubeClientId, config.youtubeClientSecret, config.youtubeRefreshToken];
    if (youtubeKeys.some(Boolean) && !youtubeKeys.every(Boolean)) {
        errors.push('YOUTUBE_CLIENT_ID, YOUTUBE_CLIENT_SECRET and YOUTUBE_REFRESH_TOKEN must be set together');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
