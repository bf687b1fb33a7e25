import fs from 'fs';
import axios from 'axios';
import { IVideoPublisher, LessonPost, PublishedVideo } from '../../domain/ports/IDistribution';
import {
    formatYouTubeDescription,
    formatYouTubeTags,
    formatYouTubeTitle,
} from '../../domain/services/LessonFormatter';
import { isRetryableHttpError, withRetry, RetryOptions } from '../resilience/RetryUtils';

/** YouTube category "Education" */
const EDUCATION_CATEGORY_ID = '27';

export interface YouTubeCredentials {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
}

export interface YouTubePublisherOptions {
    tokenUrl?: string;
    uploadUrl?: string;
    privacyStatus?: 'public' | 'unlisted' | 'private';
    timeoutMs?: number;
    retry?: RetryOptions;
}

function readString(value: unknown, key: string): string | undefined {
    if (typeof value !== 'object' || value === null || !(key in value)) {
        return undefined;
    }
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' && field ? field : undefined;
}

/**
 * Uploads finished videos as YouTube Shorts with the Data API's resumable
 * upload protocol. Access tokens come from a stored OAuth refresh token.
 */
export class YouTubeShortsPublisher implements IVideoPublisher {
    private readonly tokenUrl: string;
    private readonly uploadUrl: string;
    private readonly privacyStatus: string;
    private readonly timeoutMs: number;
    private readonly retry: RetryOptions;

    constructor(
        private readonly credentials: YouTubeCredentials,
        options: YouTubePublisherOptions = {}
    ) {
        if (!credentials.clientId || !credentials.clientSecret || !credentials.refreshToken) {
            throw new Error('YouTube client ID, client secret and refresh token are required');
        }
        this.tokenUrl = options.tokenUrl ?? 'https://oauth2.googleapis.com/token';
        this.uploadUrl = options.uploadUrl ?? 'https://www.googleapis.com/upload/youtube/v3/videos';
        this.privacyStatus = options.privacyStatus ?? 'public';
        this.timeoutMs = options.timeoutMs ?? 60000;
        this.retry = { isRetryable: isRetryableHttpError, ...options.retry };
    }

    async publish(videoPath: string, post: LessonPost): Promise<PublishedVideo> {
        const stats = await fs.promises.stat(videoPath);
        const accessToken = await this.fetchAccessToken();
        const sessionUrl = await this.startUploadSession(accessToken, stats.size, post);

        console.log(`[YouTube] Uploading ${videoPath} (${stats.size} bytes)...`);
        const response = await withRetry(
            () => axios.put<unknown>(sessionUrl, fs.createReadStream(videoPath), {
                headers: {
                    Authorization: `Bearer ${accessToken}`,
                    'Content-Type': 'video/mp4',
                    'Content-Length': stats.size,
                },
                timeout: this.timeoutMs * 10,
                maxBodyLength: Infinity,
            }),
            this.retry
        );

        const videoId = readString(response.data, 'id');
        if (!videoId) {
            throw new Error('YouTube upload finished without a video id');
        }

        const videoUrl = `https://youtube.com/shorts/${videoId}`;
        console.log(`[YouTube] ✅ Published ${videoUrl}`);
        return { videoId, videoUrl };
    }

    private async fetchAccessToken(): Promise<string> {
        const form = new URLSearchParams({
            client_id: this.credentials.clientId,
            client_secret: this.credentials.clientSecret,
            refresh_token: this.credentials.refreshToken,
            grant_type: 'refresh_token',
        });

        const response = await withRetry(
            () => axios.post<unknown>(this.tokenUrl, form.toString(), {
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                timeout: this.timeoutMs,
            }),
            this.retry
        );

        const token = readString(response.data, 'access_token');
        if (!token) {
            throw new Error('YouTube token endpoint returned no access token');
        }
        return token;
    }

    private async startUploadSession(accessToken: string, size: number, post: LessonPost): Promise<string> {
        const metadata = {
            snippet: {
                title: formatYouTubeTitle(post.topic, post.subtopic),
                description: formatYouTubeDescription(post.topic, post.subtopic, post.lesson),
                tags: formatYouTubeTags(post.topic, post.subtopic),
                categoryId: EDUCATION_CATEGORY_ID,
            },
            status: {
                privacyStatus: this.privacyStatus,
                selfDeclaredMadeForKids: false,
            },
        };

        const response = await withRetry(
            () => axios.post<unknown>(this.uploadUrl, metadata, {
                params: { uploadType: 'resumable', part: 'snippet,status' },
                headers: {
                    Authorization: `Bearer ${accessToken}`,
                    'Content-Type': 'application/json; charset=UTF-8',
                    'X-Upload-Content-Type': 'video/mp4',
                    'X-Upload-Content-Length': size,
                },
                timeout: this.timeoutMs,
            }),
            this.retry
        );

        const location = response.headers['location'];
        if (typeof location !== 'string' || !location) {
            throw new Error('YouTube did not return an upload session URL');
        }
        return location;
    }
}
