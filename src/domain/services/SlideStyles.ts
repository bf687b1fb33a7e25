/**
 * SlideStyles
 *
 * Visual presets for lesson slides. One renderer and one set of templates
 * serve every preset; a preset only changes sizes, colors, the background
 * and which slide template is used.
 */

import { Background, HexColor } from '../entities/SlideSpec';

export type SlideStyleName = 'classic' | 'enhanced' | 'premium';

/**
 * - 'quiz': case, questions, think pause, answers + mnemonic (4 slides)
 * - 'short': hook, case, one question, silent pause, answer + mnemonic, call to action (6 slides)
 */
export type SlideTemplateName = 'quiz' | 'short';

export interface SlideStyle {
    name: SlideStyleName;
    template: SlideTemplateName;
    canvas: { width: number; height: number };
    /** Factor applied to the 1080x1920 layout's positions and gaps */
    scale: number;
    background: Background;
    fontFamily: string;
    palette: {
        text: HexColor;
        accent: HexColor;
        highlight: HexColor;
        caseAccent: HexColor;
    };
    sizes: {
        title: number;
        subtitle: number;
        body: number;
        question: number;
        option: number;
        answer: number;
        banner: number;
    };
    /** Line advance as a multiple of font size */
    lineSpacing: number;
    /** Horizontal margin; wrapped text never gets closer to either edge */
    marginX: number;
    /** Questions shown on the quiz template's question slide */
    questionsShown: number;
    /** Character budget for a single answer option */
    optionMaxChars: number;
    /** Length of a short slide (hook, pause, call to action) when it has no narration audio */
    defaultSlideSeconds: number;
    /** Length of a content slide (case, question, answer) when it has no narration audio */
    contentSlideSeconds: number;
    /** Copy for the slides that do not come from the lesson (hook, pause, call to action) */
    copy: {
        hookTitle: string;
        hookQuestion: string;
        hookPrompt: string;
        thinkPrompt: string;
        ctaLine: string;
        ctaAction: string;
        hookNarration: string;
        thinkNarration: string;
        ctaNarration: string;
    };
}

const PORTRAIT = { width: 1080, height: 1920 };

const SHARED_COPY: SlideStyle['copy'] = {
    hookTitle: 'DAILY MEDICAL CASE',
    hookQuestion: 'Can you diagnose this?',
    hookPrompt: 'Think before the answer',
    thinkPrompt: 'Think about it...',
    ctaLine: 'Daily medical cases',
    ctaAction: 'Follow for more!',
    hookNarration: 'Daily medical case. Can you diagnose this? Think before the answer.',
    thinkNarration: 'Take a moment to think about your answers.',
    ctaNarration: 'Follow for more daily medical cases.',
};

export const SLIDE_STYLES: Record<SlideStyleName, SlideStyle> = {
    classic: {
        name: 'classic',
        template: 'quiz',
        canvas: PORTRAIT,
        scale: 1,
        background: { kind: 'solid', color: '#0F172A' },
        fontFamily: 'DejaVu Sans',
        palette: { text: '#FFFFFF', accent: '#3B82F6', highlight: '#22C55E', caseAccent: '#22C55E' },
        sizes: { title: 60, subtitle: 45, body: 38, question: 32, option: 28, answer: 70, banner: 80 },
        lineSpacing: 1.4,
        marginX: 60,
        questionsShown: 3,
        optionMaxChars: 40,
        defaultSlideSeconds: 3,
        contentSlideSeconds: 3,
        copy: SHARED_COPY,
    },
    enhanced: {
        name: 'enhanced',
        template: 'quiz',
        canvas: PORTRAIT,
        scale: 1,
        background: { kind: 'solid', color: '#0F172A' },
        fontFamily: 'DejaVu Sans',
        palette: { text: '#FFFFFF', accent: '#3B82F6', highlight: '#22C55E', caseAccent: '#22C55E' },
        sizes: { title: 80, subtitle: 60, body: 50, question: 45, option: 40, answer: 90, banner: 100 },
        lineSpacing: 1.4,
        marginX: 60,
        questionsShown: 2,
        optionMaxChars: 35,
        defaultSlideSeconds: 3,
        contentSlideSeconds: 3,
        copy: SHARED_COPY,
    },
    premium: {
        name: 'premium',
        template: 'short',
        canvas: PORTRAIT,
        scale: 1,
        background: { kind: 'gradient', from: '#0F172A', to: '#020617' },
        fontFamily: 'DejaVu Sans',
        palette: { text: '#FFFFFF', accent: '#00FFFF', highlight: '#00FF00', caseAccent: '#FFA500' },
        sizes: { title: 72, subtitle: 62, body: 58, question: 85, option: 44, answer: 90, banner: 80 },
        lineSpacing: 1.4,
        marginX: 80,
        questionsShown: 1,
        optionMaxChars: 40,
        defaultSlideSeconds: 5,
        contentSlideSeconds: 10,
        copy: SHARED_COPY,
    },
};

export function isSlideStyleName(value: string): value is SlideStyleName {
    return value === 'classic' || value === 'enhanced' || value === 'premium';
}

/**
 * Resolves a preset by name. A canvas override scales type sizes, margins and
 * positions by the tighter of the two axes, so the whole layout stays on the
 * canvas.
 */
export function resolveSlideStyle(
    name: SlideStyleName,
    canvas?: { width: number; height: number }
): SlideStyle {
    const base = SLIDE_STYLES[name];
    if (!canvas) {
        return base;
    }
    if (!(canvas.width > 0 && canvas.height > 0)) {
        throw new Error(`Invalid canvas size ${canvas.width}x${canvas.height}`);
    }

    const scale = Math.min(canvas.width / PORTRAIT.width, canvas.height / PORTRAIT.height);
    const size = (value: number): number => Math.max(1, Math.round(value * scale));
    return {
        ...base,
        canvas,
        scale,
        marginX: Math.round(base.marginX * scale),
        sizes: {
            title: size(base.sizes.title),
            subtitle: size(base.sizes.subtitle),
            body: size(base.sizes.body),
            question: size(base.sizes.question),
            option: size(base.sizes.option),
            answer: size(base.sizes.answer),
            banner: size(base.sizes.banner),
        },
    };
}

/**
 * A position or gap from the 1080x1920 layout, scaled to the style's canvas.
 */
export function scaledLength(style: SlideStyle, value: number): number {
    return Math.round(value * style.scale);
}
