import { LessonContent, validateLessonContent } from '../../domain/entities/LessonContent';
import { LessonValidationError } from '../../domain/errors/PipelineErrors';
import { IContentGenerator, TopicIdea } from '../../domain/ports/IContentGenerator';
import { ChatCompletionClient, extractJson } from './ChatCompletionClient';
import {
    LESSON_PROMPT,
    LESSON_SYSTEM_PROMPT,
    TOPICS_PROMPT,
    TOPICS_SYSTEM_PROMPT,
    fillPrompt,
} from './LessonPrompts';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Maps the model's snake_case reply onto LessonContent's field names.
 * Answer labels are upper-cased; everything else is left to validation.
 */
export function lessonFromWire(data: unknown): unknown {
    if (!isRecord(data)) {
        return data;
    }
    const answers = isRecord(data.answers)
        ? Object.fromEntries(
            Object.entries(data.answers).map(([k, v]) => [k.trim(), typeof v === 'string' ? v.trim().toUpperCase() : v])
        )
        : data.answers;

    return {
        caseText: data.case_text,
        caseQuestions: data.case_based_mcqs,
        independentQuestions: data.independent_mcqs,
        answers,
        mnemonic: data.mnemonic,
    };
}

/**
 * Writes lessons and topic ideas with an OpenAI-compatible chat model.
 */
export class ChatCompletionLessonGenerator implements IContentGenerator {
    constructor(private readonly client: ChatCompletionClient) { }

    async generateLesson(topic: string, subtopic: string): Promise<LessonContent> {
        const reply = await this.client.complete(
            fillPrompt(LESSON_PROMPT, { topic, subtopic }),
            LESSON_SYSTEM_PROMPT,
            { temperature: 0.8, maxTokens: 2000 }
        );

        let parsed: unknown;
        try {
            parsed = extractJson(reply, 'object');
        } catch (error) {
            throw new LessonValidationError([error instanceof Error ? error.message : String(error)]);
        }

        const lesson = validateLessonContent(lessonFromWire(parsed));
        console.log(`[LLM] Lesson ready for ${topic} / ${subtopic}`);
        return lesson;
    }

    async generateTopics(subject: string, count: number): Promise<TopicIdea[]> {
        try {
            const reply = await this.client.complete(
                fillPrompt(TOPICS_PROMPT, { subject, count }),
                TOPICS_SYSTEM_PROMPT,
                { temperature: 0.9, maxTokens: 1500 }
            );
            const parsed = extractJson(reply, 'array');
            if (!Array.isArray(parsed)) {
                return [];
            }

            const ideas: TopicIdea[] = [];
            for (const item of parsed) {
                if (isRecord(item) && typeof item.topic === 'string' && typeof item.subtopic === 'string'
                    && item.topic.trim() && item.subtopic.trim()) {
                    ideas.push({ topic: item.topic.trim(), subtopic: item.subtopic.trim() });
                }
            }
            return ideas.slice(0, count);
        } catch (error) {
            console.error(`[LLM] Topic generation failed for ${subject}:`, error instanceof Error ? error.message : error);
            return [];
        }
    }
}
