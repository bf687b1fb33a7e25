import nock from 'nock';
import { FishAudioTTSClient } from '../../../src/infrastructure/tts/FishAudioTTSClient';

describe('FishAudioTTSClient', () => {
    const apiKey = 'test-api-key';
    const voiceId = 'test-voice-id';
    const baseUrl = 'https://api.fish.audio';

    beforeEach(() => {
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    describe('Constructor validation', () => {
        it('should throw error when API key is missing', () => {
            expect(() => new FishAudioTTSClient('', voiceId, baseUrl)).toThrow('Fish Audio API key is required');
        });

        it('should throw error when voice ID is missing', () => {
            expect(() => new FishAudioTTSClient(apiKey, '', baseUrl)).toThrow('Fish Audio voice ID is required');
        });
    });

    describe('synthesize()', () => {
        it('should throw error for empty text', async () => {
            const client = new FishAudioTTSClient(apiKey, voiceId, baseUrl);
            await expect(client.synthesize('')).rejects.toThrow('Text is required for TTS');
        });

        it('should send the reference voice and return audio', async () => {
            const client = new FishAudioTTSClient(apiKey, voiceId, baseUrl);
            const scope = nock(baseUrl)
                .matchHeader('authorization', `Bearer ${apiKey}`)
                .post('/v1/tts', {
                    text: 'Clinical case.',
                    reference_id: voiceId,
                    format: 'mp3',
                    prosody: { speed: 1.0 },
                })
                .reply(200, Buffer.from('fish-audio'), { 'Content-Type': 'audio/mpeg' });

            const result = await client.synthesize('Clinical case.');

            expect(result.audio.toString()).toBe('fish-audio');
            expect(result.format).toBe('mp3');
            expect(scope.isDone()).toBe(true);
        });

        it('should reject a JSON body answered with 200', async () => {
            const client = new FishAudioTTSClient(apiKey, voiceId, baseUrl);
            nock(baseUrl)
                .post('/v1/tts')
                .reply(200, JSON.stringify({ error: 'voice not found' }), { 'Content-Type': 'application/json' });

            await expect(client.synthesize('Hello')).rejects.toThrow(
                'Fish Audio returned JSON instead of audio: {"error":"voice not found"}'
            );
        });

        it('should report HTTP failures', async () => {
            const client = new FishAudioTTSClient(apiKey, voiceId, baseUrl);
            nock(baseUrl).post('/v1/tts').reply(402, 'Payment required');

            await expect(client.synthesize('Hello')).rejects.toThrow('TTS synthesis failed: Request failed with status code 402');
        });
    });
});
