import fs from 'fs';
import path from 'path';
import axios from 'axios';
import FormData from 'form-data';
import { ILessonPoster, LessonPost } from '../../domain/ports/IDistribution';
import { formatTelegramMessage } from '../../domain/services/LessonFormatter';
import { isRetryableHttpError, withRetry, RetryOptions } from '../resilience/RetryUtils';

interface TelegramResponse {
    ok: boolean;
    description?: string;
    result?: { message_id: number };
}

function isTelegramResponse(value: unknown): value is TelegramResponse {
    if (typeof value !== 'object' || value === null || !('ok' in value) || typeof value.ok !== 'boolean') {
        return false;
    }
    if (!('result' in value) || value.result === undefined) {
        return true;
    }
    const result = value.result;
    return typeof result === 'object' && result !== null &&
        'message_id' in result && typeof result.message_id === 'number';
}

export interface TelegramPosterOptions {
    baseUrl?: string;
    timeoutMs?: number;
    retry?: RetryOptions;
}

/**
 * Posts lessons to a Telegram channel through the Bot API.
 * Failures are logged and reported as null; they never reach the caller.
 */
export class TelegramLessonPoster implements ILessonPoster {
    private readonly apiUrl: string;
    private readonly timeoutMs: number;
    private readonly retry: RetryOptions;

    constructor(
        botToken: string,
        private readonly channelId: string,
        options: TelegramPosterOptions = {}
    ) {
        if (!botToken) {
            throw new Error('Telegram bot token is required');
        }
        if (!channelId) {
            throw new Error('Telegram channel ID is required');
        }
        this.apiUrl = `${options.baseUrl ?? 'https://api.telegram.org'}/bot${botToken}`;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.retry = { isRetryable: isRetryableHttpError, ...options.retry };
    }

    async postLesson(post: LessonPost, videoUrl: string | null): Promise<string | null> {
        const text = formatTelegramMessage(post.topic, post.subtopic, post.lesson, videoUrl);
        try {
            const response = await withRetry(
                () => axios.post<unknown>(
                    `${this.apiUrl}/sendMessage`,
                    {
                        chat_id: this.channelId,
                        text,
                        parse_mode: 'HTML',
                        disable_web_page_preview: false,
                    },
                    { timeout: this.timeoutMs }
                ),
                this.retry
            );
            return this.messageId(response.data, 'sendMessage');
        } catch (error) {
            console.error(`[Telegram] ❌ Failed to post lesson to ${this.channelId}:`, describe(error));
            return null;
        }
    }

    async sendVideo(videoPath: string, caption: string): Promise<string | null> {
        try {
            const response = await withRetry(() => {
                const form = new FormData();
                form.append('chat_id', this.channelId);
                form.append('caption', caption);
                form.append('parse_mode', 'HTML');
                form.append('supports_streaming', 'true');
                form.append('video', fs.createReadStream(videoPath), {
                    filename: path.basename(videoPath),
                    contentType: 'video/mp4',
                });
                return axios.post<unknown>(`${this.apiUrl}/sendVideo`, form, {
                    headers: form.getHeaders(),
                    timeout: this.timeoutMs * 4,
                    maxBodyLength: Infinity,
                });
            }, this.retry);
            return this.messageId(response.data, 'sendVideo');
        } catch (error) {
            console.error(`[Telegram] ❌ Failed to send video ${videoPath}:`, describe(error));
            return null;
        }
    }

    private messageId(data: unknown, method: string): string | null {
        if (!isTelegramResponse(data) || !data.ok || !data.result) {
            const reason = isTelegramResponse(data) ? data.description : 'unexpected response';
            console.error(`[Telegram] ❌ ${method} rejected: ${reason}`);
            return null;
        }
        const id = String(data.result.message_id);
        console.log(`[Telegram] ✅ ${method} ok (message ${id})`);
        return id;
    }
}

function describe(error: unknown): string {
    if (axios.isAxiosError(error)) {
        return error.response ? `HTTP ${error.response.status}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
