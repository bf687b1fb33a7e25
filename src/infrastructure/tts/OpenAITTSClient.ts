import axios from 'axios';
import { ITTSClient, TTSResult, TTSOptions } from '../../domain/ports/ITTSClient';

const SPEECH_URL = 'https://api.openai.com/v1/audio/speech';

/**
 * OpenAI TTS client. The default voice is a calm, deep narrator.
 */
export class OpenAITTSClient implements ITTSClient {
    private readonly apiKey: string;
    private readonly voice: string;
    private readonly model: string;

    constructor(apiKey: string, voice: string = 'onyx', model: string = 'tts-1') {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.voice = voice;
        this.model = model;
    }

    async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
        if (!text || !text.trim()) {
            throw new Error('Text is required for TTS');
        }

        const format = options?.format || 'mp3';
        try {
            const response = await axios.post<ArrayBuffer>(
                SPEECH_URL,
                {
                    model: this.model,
                    input: text.trim(),
                    voice: options?.voiceId || this.voice,
                    response_format: format,
                    speed: options?.speed || 1.0,
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    responseType: 'arraybuffer',
                    timeout: options?.timeoutMs,
                }
            );

            const audio = Buffer.from(response.data);
            if (audio.length === 0) {
                throw new Error('OpenAI TTS returned no audio');
            }
            return { audio, format };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new Error(`OpenAI TTS failed: ${error.message}`);
            }
            throw error;
        }
    }
}
