import {
    LessonContent,
    OPTION_LABELS,
    Question,
    allQuestions,
    formatAnswerKey,
} from '../entities/LessonContent';
import { SlideSpec, TextElement } from '../entities/SlideSpec';
import { SlideStyle, scaledLength } from './SlideStyles';

/** Length of the "A) " prefix drawn in front of every option. */
const OPTION_PREFIX_LENGTH = 3;

/**
 * Builds the ordered slides for a lesson.
 * The slide count depends only on the style's template, never on the content.
 */
export function buildSlides(
    lesson: LessonContent,
    topic: string,
    subtopic: string,
    style: SlideStyle
): SlideSpec[] {
    return style.template === 'short'
        ? buildShortSlides(lesson, style)
        : buildQuizSlides(lesson, topic, subtopic, style);
}

/**
 * Number of slides a template always produces.
 */
export function slideCountFor(style: SlideStyle): number {
    return style.template === 'short' ? 6 : 4;
}

/**
 * First two sentences of the case, the part that fits a single slide.
 */
export function summarizeCase(caseText: string): string {
    const sentences = caseText.trim().split(/(?<=[.!?])\s+/).filter(Boolean);
    const summary = sentences.slice(0, 2).join(' ');
    return /[.!?]$/.test(summary) ? summary : `${summary}.`;
}

// --- 'quiz' template -------------------------------------------------------

function buildQuizSlides(
    lesson: LessonContent,
    topic: string,
    subtopic: string,
    style: SlideStyle
): SlideSpec[] {
    const { palette, sizes } = style;
    const wrapWidth = contentWidth(style);
    const answerKey = formatAnswerKey(lesson);

    const caseSlide: SlideSpec = {
        name: 'case',
        elements: [
            centered(topic, sizes.title, palette.text, 150, style, { bold: true }),
            centered(subtopic, sizes.subtitle, palette.accent, 40, style, { flow: true }),
            centered('Clinical Case', sizes.subtitle, palette.highlight, 150, style, { flow: true }),
            centered(lesson.caseText, sizes.body, palette.text, 50, style, { flow: true }),
        ],
        narration: `${topic}. ${subtopic}. Case: ${lesson.caseText}`,
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    const shown = allQuestions(lesson).slice(0, style.questionsShown);
    const questionElements: TextElement[] = [
        centered('Questions', sizes.title, palette.highlight, 100, style, { bold: true }),
    ];
    shown.forEach((question, i) => {
        questionElements.push({
            text: `${i + 1}. ${question.question}`,
            fontSize: sizes.question,
            color: palette.text,
            y: scaledLength(style, i === 0 ? 60 : 40),
            flow: true,
            align: 'left',
            x: style.marginX,
            wrapWidth,
        });
        questionElements.push(...optionElements(question, style, 20, 10));
    });

    const questionSlide: SlideSpec = {
        name: 'questions',
        elements: questionElements,
        narration: [
            'Here are the questions.',
            ...shown.map((q, i) => `Question ${i + 1}: ${q.question}`),
        ].join(' '),
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    const thinkSlide: SlideSpec = {
        name: 'think',
        elements: [centered(style.copy.thinkPrompt, sizes.banner, palette.highlight, 900, style)],
        narration: style.copy.thinkNarration,
        defaultDurationSeconds: style.defaultSlideSeconds,
    };

    const answerSlide: SlideSpec = {
        name: 'answers',
        elements: [
            centered('Answers', sizes.title, palette.highlight, 200, style, { bold: true }),
            centered(answerKey, sizes.answer, palette.text, 150, style, { flow: true, bold: true }),
            centered('Mnemonic', sizes.title, palette.accent, 250, style, { flow: true }),
            centered(lesson.mnemonic, sizes.body, palette.text, 80, style, { flow: true }),
        ],
        narration: `The answers are: ${answerKey}. Here's a mnemonic to remember: ${lesson.mnemonic}`,
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    return [caseSlide, questionSlide, thinkSlide, answerSlide];
}

// --- 'short' template ------------------------------------------------------

function buildShortSlides(lesson: LessonContent, style: SlideStyle): SlideSpec[] {
    const { palette, sizes, copy } = style;
    const caseDisplay = summarizeCase(lesson.caseText);
    const [firstQuestion] = lesson.caseQuestions;
    const answerLabel = lesson.answers['1'];
    const answerText = firstQuestion.options[answerLabel];

    const hook: SlideSpec = {
        name: 'hook',
        elements: [
            centered(copy.hookTitle, sizes.title, palette.text, 600, style),
            centered(copy.hookQuestion, sizes.question, palette.accent, 850, style, { bold: true }),
            centered(copy.hookPrompt, sizes.body, palette.text, 1050, style),
        ],
        narration: copy.hookNarration,
        defaultDurationSeconds: style.defaultSlideSeconds,
    };

    const caseSlide: SlideSpec = {
        name: 'case',
        elements: [
            centered('Clinical Case', sizes.banner, palette.caseAccent, 350, style),
            centered(caseDisplay, sizes.body, palette.text, 600, style),
        ],
        narration: `Clinical case. ${caseDisplay}`,
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    const questionSlide: SlideSpec = {
        name: 'question',
        elements: [
            centered(firstQuestion.question, sizes.subtitle, palette.accent, 300, style, { bold: true }),
            ...optionElements(firstQuestion, style, 80, 50),
        ],
        narration:
            `${firstQuestion.question} ` +
            `A, ${firstQuestion.options.A}. B, ${firstQuestion.options.B}. ` +
            `C, ${firstQuestion.options.C}. or D, ${firstQuestion.options.D}.`,
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    const pause: SlideSpec = {
        name: 'think',
        elements: [
            centered(`Think for ${style.defaultSlideSeconds} seconds`, sizes.banner, palette.text, 900, style),
        ],
        defaultDurationSeconds: style.defaultSlideSeconds,
    };

    const answer: SlideSpec = {
        name: 'answer',
        elements: [
            centered(`Correct Answer: ${answerLabel}`, sizes.answer, palette.highlight, 350, style),
            centered(answerText, sizes.body, palette.text, 60, style, { flow: true }),
            centered('Mnemonic', sizes.banner, palette.caseAccent, 200, style, { flow: true }),
            centered(lesson.mnemonic, sizes.body, palette.text, 60, style, { flow: true }),
        ],
        narration: `The correct answer is ${answerLabel}, ${answerText}. Here is a mnemonic: ${lesson.mnemonic}`,
        defaultDurationSeconds: style.contentSlideSeconds,
    };

    const cta: SlideSpec = {
        name: 'cta',
        elements: [
            centered(copy.ctaLine, sizes.title, palette.text, 800, style),
            centered(copy.ctaAction, sizes.answer, palette.accent, 1000, style, { bold: true }),
        ],
        narration: copy.ctaNarration,
        defaultDurationSeconds: style.defaultSlideSeconds,
    };

    return [hook, caseSlide, questionSlide, pause, answer, cta];
}

// --- element helpers -------------------------------------------------------

function contentWidth(style: SlideStyle): number {
    return style.canvas.width - 2 * style.marginX;
}

function centered(
    text: string,
    fontSize: number,
    color: string,
    y: number,
    style: SlideStyle,
    extra: { bold?: boolean; flow?: boolean } = {}
): TextElement {
    return {
        text,
        fontSize,
        color,
        y: scaledLength(style, y),
        align: 'center',
        wrapWidth: contentWidth(style),
        ...extra,
    };
}

/**
 * One left-aligned, single-line element per option, cut to the style's budget.
 */
function optionElements(
    question: Question,
    style: SlideStyle,
    firstGap: number,
    gap: number
): TextElement[] {
    const x = style.marginX + scaledLength(style, 20);
    return OPTION_LABELS.map((label, i) => ({
        text: `${label}) ${question.options[label]}`,
        fontSize: style.sizes.option,
        color: style.palette.accent,
        y: scaledLength(style, i === 0 ? firstGap : gap),
        flow: true,
        align: 'left' as const,
        x,
        maxChars: style.optionMaxChars + OPTION_PREFIX_LENGTH,
    }));
}
