/**
 * Font resolution for DOCX → PDF conversion.
 *
 * A run's font name is resolved through an ordered list of strategies:
 * a TrueType file named after the font in the font directory, then one
 * standard PDF font. The first strategy that yields a usable program wins;
 * each strategy is attempted at most once per call.
 */

import fs from 'fs/promises';
import path from 'path';
import { createRequire } from 'module';
import { Font, FontNames } from '@pdf-lib/standard-fonts';
import type { PDFDocument, PDFFont } from 'pdf-lib';
import type { Fontkit } from 'pdf-lib/cjs/types/fontkit.js';
import { DEFAULT_FALLBACK_FONT, FONT_FILE_EXTENSION } from './constants.js';
import { createLoggerDiagnostics, type Diagnostics } from './diagnostics.js';
import { DocxError, DocxErrorCode, describeError } from './errors.js';

export type FontProgram =
    | {
          kind: 'truetype';
          name: string;
          path: string;
          bytes: Uint8Array;
          glyphCount: number;
      }
    | {
          kind: 'standard';
          name: FontNames;
      };

export type FontTier = 'primary' | 'fallback';

export interface FontAttemptFailure {
    tier: FontTier;
    reason: string;
}

export type FontResolutionResult =
    | { tier: FontTier; program: FontProgram; attempts: FontAttemptFailure[] }
    | { tier: 'failed'; error: DocxError; attempts: FontAttemptFailure[] };

export interface FontStrategy {
    readonly tier: FontTier;
    readonly description: string;
    load(): Promise<FontProgram>;
}

export interface LoadFontOptions {
    /** Standard font tried when the requested one cannot be loaded. */
    fallbackFont?: string;
    diagnostics?: Diagnostics;
}

const require = createRequire(import.meta.url);
const fontkit: Fontkit = require('@pdf-lib/fontkit');

const defaultDiagnostics = createLoggerDiagnostics('fonts');

/** Path looked up for a font: `<directory>/<name>.ttf`, name taken verbatim. */
export function fontFilePath(name: string, searchDirectory: string): string {
    return path.join(searchDirectory, `${name}${FONT_FILE_EXTENSION}`);
}

/** Tables pdf-lib reads when it embeds a font and measures text with it. */
const REQUIRED_TABLES = ['cmap', 'head', 'hhea', 'hmtx', 'maxp', 'name'] as const;

type FontkitFont = ReturnType<Fontkit['create']>;

// fontkit decodes tables on first access, so a parsed file can still lack
// everything but maxp. Touch each table pdf-lib depends on here.
function assertEmbeddable(font: FontkitFont, filePath: string): void {
    if (typeof font.numGlyphs !== 'number' || font.numGlyphs < 1) {
        throw new Error(`${filePath} holds no usable glyphs`);
    }
    const missing = REQUIRED_TABLES.filter((tag) => !(tag in font));
    if (missing.length > 0) {
        throw new Error(`${filePath} is missing the ${missing.join(', ')} tables`);
    }
    if (!(font.unitsPerEm > 0)) {
        throw new Error(`${filePath} declares no units per em`);
    }
    if (typeof font.ascent !== 'number') {
        throw new Error(`${filePath} has no horizontal metrics`);
    }
    if (font.characterSet.length === 0) {
        throw new Error(`${filePath} maps no characters`);
    }
}

export function trueTypeFileStrategy(name: string, searchDirectory: string): FontStrategy {
    const filePath = fontFilePath(name, searchDirectory);
    return {
        tier: 'primary',
        description: filePath,
        async load() {
            if (name.length === 0) {
                throw new Error('Empty font name');
            }
            const bytes = await fs.readFile(filePath);
            const font = fontkit.create(bytes);
            assertEmbeddable(font, filePath);
            return { kind: 'truetype', name, path: filePath, bytes, glyphCount: font.numGlyphs };
        },
    };
}

export function standardFontStrategy(fontName: string): FontStrategy {
    return {
        tier: 'fallback',
        description: `standard font ${fontName}`,
        async load() {
            const standardName = Object.values(FontNames).find((value) => value === fontName);
            if (!standardName) {
                throw new Error(`${fontName} is not a standard PDF font`);
            }
            // Loading the metrics proves the font is usable.
            Font.load(standardName);
            return { kind: 'standard', name: standardName };
        },
    };
}

/**
 * Try each strategy in order and return the first program obtained.
 * Strategies are not retried and the failure kind does not alter the order.
 */
export async function resolveFont(
    strategies: readonly FontStrategy[],
    diagnostics: Diagnostics = defaultDiagnostics,
): Promise<FontResolutionResult> {
    const attempts: FontAttemptFailure[] = [];

    for (const strategy of strategies) {
        try {
            const program = await strategy.load();
            if (attempts.length > 0) {
                diagnostics.warn(`Using ${strategy.description} instead`, { tier: strategy.tier });
            }
            return { tier: strategy.tier, program, attempts };
        } catch (error) {
            const reason = describeError(error);
            attempts.push({ tier: strategy.tier, reason });
            diagnostics.warn(`Could not load ${strategy.description}`, { tier: strategy.tier, reason });
        }
    }

    const error = new DocxError('No usable font program found', DocxErrorCode.FONT_LOAD_FAILURE, { attempts });
    diagnostics.error(error.message, { attempts });
    return { tier: 'failed', error, attempts };
}

/**
 * Load `name` from `searchDirectory`, falling back to a standard font.
 * Never throws; total failure is reported as `{ tier: 'failed' }`.
 */
export async function loadFont(
    name: string,
    searchDirectory: string,
    options: LoadFontOptions = {},
): Promise<FontResolutionResult> {
    const strategies = [
        trueTypeFileStrategy(name, searchDirectory),
        standardFontStrategy(options.fallbackFont ?? DEFAULT_FALLBACK_FONT),
    ];
    return resolveFont(strategies, options.diagnostics ?? defaultDiagnostics);
}

/** Embed a resolved program into a pdf-lib document. */
export async function embedFontProgram(pdfDoc: PDFDocument, program: FontProgram): Promise<PDFFont> {
    if (program.kind === 'standard') {
        return pdfDoc.embedFont(program.name);
    }
    pdfDoc.registerFontkit(fontkit);
    return pdfDoc.embedFont(program.bytes, { subset: true });
}
