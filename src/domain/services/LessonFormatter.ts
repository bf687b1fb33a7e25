import { LessonContent, allQuestions, formatAnswerKey } from '../entities/LessonContent';
import { truncateToBudget } from './TextLayout';

export const TELEGRAM_MESSAGE_LIMIT = 4096;
export const TELEGRAM_CAPTION_LIMIT = 1024;
export const TELEGRAM_QUESTION_LIMIT = 100;
export const YOUTUBE_TITLE_LIMIT = 100;
export const YOUTUBE_DESCRIPTION_LIMIT = 5000;

export const YOUTUBE_HASHTAGS = '#Medical #USMLE #PLAB #Shorts #MedicalEducation #MedicalStudent';

const BASE_TAGS = [
    'medical education',
    'USMLE',
    'PLAB',
    'medical student',
    'medicine',
    'clinical case',
    'MCQ',
    'medical exam',
];

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/**
 * Telegram HTML post for a lesson. Questions are shortened to 100 characters;
 * when the whole post is over Telegram's limit the case text is shortened.
 */
export function formatTelegramMessage(
    topic: string,
    subtopic: string,
    lesson: LessonContent,
    videoUrl?: string | null
): string {
    const build = (caseText: string): string => {
        let message = `🩺 <b>${escapeHtml(`${topic}: ${subtopic}`)}</b>\n\n`;
        message += `📌 <b>Case:</b>\n${escapeHtml(caseText)}\n\n`;
        message += '❓ <b>MCQs:</b>\n';
        allQuestions(lesson).forEach((q, i) => {
            message += `${i + 1}) ${escapeHtml(truncateToBudget(q.question, TELEGRAM_QUESTION_LIMIT))}\n`;
        });
        message += `\n🧠 <b>Mnemonic:</b>\n${escapeHtml(lesson.mnemonic)}\n`;
        if (videoUrl) {
            message += `\n▶ <a href="${escapeHtml(videoUrl)}">Watch Video</a>`;
        }
        return message;
    };

    const full = build(lesson.caseText);
    if (full.length <= TELEGRAM_MESSAGE_LIMIT) {
        return full;
    }
    const overflow = full.length - TELEGRAM_MESSAGE_LIMIT;
    // Escaping can only grow the case text, so shorten the raw text by the overflow and retry once
    const shortened = build(truncateToBudget(lesson.caseText, Math.max(3, lesson.caseText.length - overflow)));
    return shortened.length <= TELEGRAM_MESSAGE_LIMIT ? shortened : shortened.slice(0, TELEGRAM_MESSAGE_LIMIT);
}

/**
 * Caption for a video posted straight to Telegram.
 */
export function formatVideoCaption(topic: string, subtopic: string, lesson: LessonContent): string {
    const caption =
        `🩺 <b>${escapeHtml(`${topic}: ${subtopic}`)}</b>\n\n` +
        `✅ <b>Answers:</b> ${escapeHtml(formatAnswerKey(lesson))}\n` +
        `🧠 ${escapeHtml(lesson.mnemonic)}`;
    return caption.length <= TELEGRAM_CAPTION_LIMIT ? caption : caption.slice(0, TELEGRAM_CAPTION_LIMIT);
}

export function formatYouTubeTitle(topic: string, subtopic: string): string {
    return truncateToBudget(`${topic}: ${subtopic}`, YOUTUBE_TITLE_LIMIT);
}

export function formatYouTubeDescription(topic: string, subtopic: string, lesson: LessonContent): string {
    let description = `🩺 ${topic}: ${subtopic}\n\n`;
    description += `📌 Case:\n${lesson.caseText}\n\n`;
    description += '❓ MCQs:\n';
    allQuestions(lesson).forEach((q, i) => {
        description += `${i + 1}) ${q.question}\n`;
    });
    description += `\n✅ Answers:\n${formatAnswerKey(lesson)}\n\n`;
    description += `🧠 Mnemonic:\n${lesson.mnemonic}\n\n`;

    const room = YOUTUBE_DESCRIPTION_LIMIT - YOUTUBE_HASHTAGS.length;
    return truncateToBudget(description, room) + YOUTUBE_HASHTAGS;
}

export function formatYouTubeTags(topic: string, subtopic: string): string[] {
    return [...BASE_TAGS, topic.toLowerCase(), subtopic.toLowerCase()];
}
