import Ajv from 'ajv';
import { LessonValidationError } from '../errors/PipelineErrors';

export type OptionLabel = 'A' | 'B' | 'C' | 'D';

export const OPTION_LABELS: readonly OptionLabel[] = ['A', 'B', 'C', 'D'];

/** Case-linked questions every lesson carries. */
export const CASE_QUESTION_COUNT = 3;
/** Questions on the same subtopic that do not depend on the case. */
export const INDEPENDENT_QUESTION_COUNT = 2;
export const TOTAL_QUESTION_COUNT = CASE_QUESTION_COUNT + INDEPENDENT_QUESTION_COUNT;

/**
 * A multiple-choice question with exactly four labeled options.
 */
export interface Question {
    question: string;
    options: Record<OptionLabel, string>;
}

/**
 * LessonContent is the structured record a video is built from.
 * Produced by the content generator, consumed once per pipeline run.
 */
export interface LessonContent {
    /** Short clinical case narrative that hooks the viewer */
    caseText: string;
    /** Questions tied to the case (always 3) */
    caseQuestions: Question[];
    /** Questions on the subtopic that stand alone (always 2) */
    independentQuestions: Question[];
    /** Question number ("1".."5") to the correct option label */
    answers: Record<string, OptionLabel>;
    /** One short memory aid */
    mnemonic: string;
}

const questionSchema = {
    type: 'object',
    properties: {
        question: { type: 'string', minLength: 1 },
        options: {
            type: 'object',
            properties: {
                A: { type: 'string', minLength: 1 },
                B: { type: 'string', minLength: 1 },
                C: { type: 'string', minLength: 1 },
                D: { type: 'string', minLength: 1 },
            },
            required: ['A', 'B', 'C', 'D'],
            additionalProperties: false,
        },
    },
    required: ['question', 'options'],
};

const lessonSchema = {
    type: 'object',
    properties: {
        caseText: { type: 'string', minLength: 1 },
        caseQuestions: {
            type: 'array',
            items: questionSchema,
            minItems: CASE_QUESTION_COUNT,
            maxItems: CASE_QUESTION_COUNT,
        },
        independentQuestions: {
            type: 'array',
            items: questionSchema,
            minItems: INDEPENDENT_QUESTION_COUNT,
            maxItems: INDEPENDENT_QUESTION_COUNT,
        },
        answers: {
            type: 'object',
            additionalProperties: { type: 'string', enum: [...OPTION_LABELS] },
        },
        mnemonic: { type: 'string', minLength: 1 },
    },
    required: ['caseText', 'caseQuestions', 'independentQuestions', 'answers', 'mnemonic'],
};

const ajv = new Ajv({ allErrors: true });
const validateShape = ajv.compile<LessonContent>(lessonSchema);

/**
 * Validates an untrusted lesson record and returns it typed.
 * Every problem found is reported at once.
 */
export function validateLessonContent(raw: unknown): LessonContent {
    if (!validateShape(raw)) {
        const problems = (validateShape.errors ?? []).map(
            (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`
        );
        throw new LessonValidationError(problems);
    }

    const problems: string[] = [];
    const expectedKeys = Array.from({ length: TOTAL_QUESTION_COUNT }, (_, i) => String(i + 1));
    for (const key of expectedKeys) {
        if (!(key in raw.answers)) {
            problems.push(`answers is missing question ${key}`);
        }
    }
    for (const key of Object.keys(raw.answers)) {
        if (!expectedKeys.includes(key)) {
            problems.push(`answers has no question ${key}`);
        }
    }
    if (problems.length > 0) {
        throw new LessonValidationError(problems);
    }

    return raw;
}

/**
 * Case-linked questions followed by independent ones, in display order.
 */
export function allQuestions(lesson: LessonContent): Question[] {
    return [...lesson.caseQuestions, ...lesson.independentQuestions];
}

/**
 * Renders the answer key as "1-B 2-A 3-D 4-C 5-A", ordered by question number.
 */
export function formatAnswerKey(lesson: LessonContent): string {
    return Object.entries(lesson.answers)
        .sort(([a], [b]) => Number(a) - Number(b))
        .map(([index, label]) => `${index}-${label}`)
        .join(' ');
}
