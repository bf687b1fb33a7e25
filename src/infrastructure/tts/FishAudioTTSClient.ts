import axios from 'axios';
import { ITTSClient, TTSResult, TTSOptions } from '../../domain/ports/ITTSClient';

/**
 * Fish Audio TTS client for a cloned narrator voice.
 */
export class FishAudioTTSClient implements ITTSClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly voiceId: string;

    constructor(apiKey: string, voiceId: string, baseUrl: string = 'https://api.fish.audio') {
        if (!apiKey) {
            throw new Error('Fish Audio API key is required');
        }
        if (!voiceId) {
            throw new Error('Fish Audio voice ID is required');
        }
        this.apiKey = apiKey;
        this.voiceId = voiceId;
        this.baseUrl = baseUrl;
    }

    /**
     * Synthesizes text to speech using Fish Audio.
     */
    async synthesize(text: string, options?: TTSOptions): Promise<TTSResult> {
        if (!text || !text.trim()) {
            throw new Error('Text is required for TTS');
        }

        const format = options?.format || 'mp3';
        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/tts`,
                {
                    text: text.trim(),
                    reference_id: options?.voiceId || this.voiceId,
                    format,
                    prosody: { speed: options?.speed || 1.0 },
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

            // Some gateways answer errors with a 200 and a JSON body
            const contentType = String(response.headers['content-type'] || '');
            if (contentType.includes('application/json')) {
                const body = Buffer.from(response.data).toString('utf-8');
                throw new Error(`Fish Audio returned JSON instead of audio: ${body.slice(0, 200)}`);
            }

            const audio = Buffer.from(response.data);
            if (audio.length === 0) {
                throw new Error('Fish Audio returned no audio');
            }
            return { audio, format };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                throw new Error(`TTS synthesis failed: ${error.message}`);
            }
            throw error;
        }
    }
}
