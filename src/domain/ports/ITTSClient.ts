export type AudioFormat = 'mp3' | 'wav' | 'opus';

/**
 * TTSResult represents the output from a TTS synthesis call.
 */
export interface TTSResult {
    /** Encoded audio bytes */
    audio: Buffer;
    /** Container format of the bytes */
    format: AudioFormat;
}

/**
 * TTSOptions for customizing synthesis.
 */
export interface TTSOptions {
    /** Speed adjustment (0.9 - 1.1 range recommended) */
    speed?: number;
    /** Audio format (default: mp3) */
    format?: AudioFormat;
    /** Optional voice ID override */
    voiceId?: string;
    /** Abort the request after this many milliseconds */
    timeoutMs?: number;
}

/**
 * ITTSClient - Port for Text-to-Speech services.
 * Implementations: OpenAITTSClient, FishAudioTTSClient
 */
export interface ITTSClient {
    /**
     * Synthesizes text to speech audio.
     * @throws Error when the service cannot produce audio
     */
    synthesize(text: string, options?: TTSOptions): Promise<TTSResult>;
}
