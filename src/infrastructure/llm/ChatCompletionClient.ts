import axios from 'axios';
import { isRetryableHttpError, withRetry, RetryOptions } from '../resilience/RetryUtils';

export interface ChatCompletionOptions {
    temperature?: number;
    maxTokens?: number;
    jsonMode?: boolean;
}

/**
 * Minimal client for OpenAI-compatible chat completion APIs.
 * baseUrl includes the version segment, e.g. https://api.mistral.ai/v1.
 */
export class ChatCompletionClient {
    private readonly retry: RetryOptions;

    constructor(
        private readonly apiKey: string,
        private readonly model: string,
        private readonly baseUrl: string,
        private readonly timeoutMs: number = 60000,
        retry: RetryOptions = {}
    ) {
        if (!apiKey) {
            throw new Error('LLM API key is required');
        }
        this.retry = {
            isRetryable: isRetryableHttpError,
            onRetry: (attempt, _error, delay) => {
                console.warn(`[LLM] Transient error on attempt ${attempt}, retrying in ${Math.round(delay)}ms...`);
            },
            ...retry,
        };
    }

    /**
     * Executes a chat completion request and returns the first message's content.
     */
    async complete(prompt: string, systemPrompt: string, options: ChatCompletionOptions = {}): Promise<string> {
        const { temperature = 0.7, maxTokens, jsonMode = false } = options;

        try {
            const response = await withRetry(
                () => axios.post<unknown>(
                    `${this.baseUrl.replace(/\/$/, '')}/chat/completions`,
                    {
                        model: this.model,
                        messages: [
                            { role: 'system', content: systemPrompt },
                            { role: 'user', content: prompt },
                        ],
                        temperature,
                        ...(maxTokens !== undefined && { max_tokens: maxTokens }),
                        ...(jsonMode && { response_format: { type: 'json_object' } }),
                    },
                    {
                        headers: {
                            Authorization: `Bearer ${this.apiKey}`,
                            'Content-Type': 'application/json',
                        },
                        timeout: this.timeoutMs,
                    }
                ),
                this.retry
            );

            const content = firstMessageContent(response.data);
            if (content === undefined) {
                throw new Error('LLM response has no message content');
            }
            return content;
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                throw new Error(`LLM call failed${status ? ` (HTTP ${status})` : ''}: ${error.message}`);
            }
            throw error;
        }
    }
}

function firstMessageContent(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('choices' in data) || !Array.isArray(data.choices)) {
        return undefined;
    }
    const choice: unknown = data.choices[0];
    if (typeof choice !== 'object' || choice === null || !('message' in choice)) {
        return undefined;
    }
    const message = choice.message;
    if (typeof message !== 'object' || message === null || !('content' in message)) {
        return undefined;
    }
    return typeof message.content === 'string' ? message.content : undefined;
}

/**
 * Pulls the first JSON value of the given kind out of a model reply,
 * ignoring markdown fences and surrounding prose.
 */
export function extractJson(text: string, kind: 'object' | 'array'): unknown {
    const pattern = kind === 'object' ? /\{[\s\S]*\}/ : /\[[\s\S]*\]/;
    const match = text.match(pattern);
    const candidate = match ? match[0] : text.replace(/```json\n?|\n?```/g, '').trim();
    try {
        return JSON.parse(candidate);
    } catch {
        throw new Error(`Failed to parse LLM response as JSON: ${text.substring(0, 200)}...`);
    }
}
