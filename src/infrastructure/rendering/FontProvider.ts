import fs from 'fs';
import { GlobalFonts } from '@napi-rs/canvas';

/** Generic family every canvas build can draw with. */
export const BUILTIN_FONT_FAMILY = 'sans-serif';

/**
 * A font file, with an optional bold face registered alongside it.
 */
export interface FontCandidate {
    path: string;
    boldPath?: string;
}

/**
 * Common install locations, tried in order after any configured candidates.
 */
export const DEFAULT_FONT_CANDIDATES: readonly FontCandidate[] = [
    {
        path: '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
        boldPath: '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
    },
    { path: '/usr/share/fonts/dejavu/DejaVuSans.ttf', boldPath: '/usr/share/fonts/dejavu/DejaVuSans-Bold.ttf' },
    {
        path: '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
        boldPath: '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
    },
    { path: '/System/Library/Fonts/Supplemental/Arial.ttf', boldPath: '/System/Library/Fonts/Supplemental/Arial Bold.ttf' },
    { path: 'C:\\Windows\\Fonts\\arial.ttf', boldPath: 'C:\\Windows\\Fonts\\arialbd.ttf' },
];

export interface FontHandle {
    /** Family the text is actually drawn with */
    family: string;
    size: number;
    bold: boolean;
    /** 'registered' when a font file backs the family, 'builtin' for the last resort */
    source: 'registered' | 'builtin';
    /** Value for CanvasRenderingContext2D.font */
    css: string;
}

/**
 * The part of the canvas font registry the provider needs.
 */
export interface FontRegistry {
    /** Returns a key for the registered face, or null when the file cannot be loaded */
    registerFromPath(path: string, nameAlias?: string): object | null;
    has(family: string): boolean;
}

export interface FontProviderOptions {
    /** Font files tried in order before DEFAULT_FONT_CANDIDATES */
    candidates?: FontCandidate[];
    /** Skip DEFAULT_FONT_CANDIDATES */
    skipDefaults?: boolean;
    registry?: FontRegistry;
    fileExists?: (path: string) => boolean;
}

/**
 * Resolves a font family and size to something the canvas can draw with.
 *
 * The first candidate that loads is registered under the requested family the
 * first time it is asked for, together with its bold face when it has one.
 * When none can be loaded the provider logs and hands out the built-in family.
 * resolve() never throws.
 */
export class FontProvider {
    private readonly candidates: FontCandidate[];
    private readonly registry: FontRegistry;
    private readonly fileExists: (path: string) => boolean;
    private readonly resolved = new Map<string, 'registered' | 'builtin'>();

    constructor(options: FontProviderOptions = {}) {
        this.candidates = [
            ...(options.candidates ?? []),
            ...(options.skipDefaults ? [] : DEFAULT_FONT_CANDIDATES),
        ];
        this.registry = options.registry ?? GlobalFonts;
        this.fileExists = options.fileExists ?? fs.existsSync;
    }

    resolve(family: string, size: number, bold: boolean = false): FontHandle {
        const source = this.load(family);
        const drawnFamily = source === 'registered' ? family : BUILTIN_FONT_FAMILY;
        return {
            family: drawnFamily,
            size,
            bold,
            source,
            css: toCss(drawnFamily, size, bold),
        };
    }

    private load(family: string): 'registered' | 'builtin' {
        const known = this.resolved.get(family);
        if (known) {
            return known;
        }

        let source: 'registered' | 'builtin' = 'builtin';
        for (const candidate of this.candidates) {
            if (this.register(candidate, family)) {
                source = 'registered';
                break;
            }
        }
        if (source === 'builtin' && this.registry.has(family)) {
            source = 'registered';
        }

        if (source === 'builtin') {
            console.warn(`[Fonts] No font file found for "${family}", using ${BUILTIN_FONT_FAMILY}`);
        }
        this.resolved.set(family, source);
        return source;
    }

    private register(candidate: FontCandidate, family: string): boolean {
        if (!this.fileExists(candidate.path)) {
            return false;
        }
        try {
            if (this.registry.registerFromPath(candidate.path, family) === null) {
                console.warn(`[Fonts] Could not load ${candidate.path}`);
                return false;
            }
            if (candidate.boldPath && this.fileExists(candidate.boldPath)) {
                this.registry.registerFromPath(candidate.boldPath, family);
            }
            return true;
        } catch (error) {
            console.warn(`[Fonts] Could not load ${candidate.path}:`, error);
            return false;
        }
    }
}

function toCss(family: string, size: number, bold: boolean): string {
    const weight = bold ? 700 : 400;
    const name = family === BUILTIN_FONT_FAMILY ? family : `"${family}", ${BUILTIN_FONT_FAMILY}`;
    return `${weight} ${size}px ${name}`;
}
