/**
 * Color tokens from w:color / w:highlight / w:shd attributes → RGB.
 */

import { rgb, type RGB } from 'pdf-lib';
import { DocxError, DocxErrorCode } from './errors.js';

export interface ColorValue {
    r: number;
    g: number;
    b: number;
}

export const BLACK: Readonly<ColorValue> = Object.freeze({ r: 0, g: 0, b: 0 });

/** Word renders "auto" text as black on a light background. */
export const AUTO_COLOR = 'auto';

/**
 * Recognised color names, matched case-sensitively: thirteen basic colors
 * in camelCase and UPPER_SNAKE spellings, plus the dark shades of the
 * WordprocessingML highlight palette.
 */
export const NAMED_COLORS: Readonly<Record<string, Readonly<ColorValue>>> = Object.freeze({
    black: { r: 0, g: 0, b: 0 },
    BLACK: { r: 0, g: 0, b: 0 },
    white: { r: 255, g: 255, b: 255 },
    WHITE: { r: 255, g: 255, b: 255 },
    red: { r: 255, g: 0, b: 0 },
    RED: { r: 255, g: 0, b: 0 },
    green: { r: 0, g: 255, b: 0 },
    GREEN: { r: 0, g: 255, b: 0 },
    blue: { r: 0, g: 0, b: 255 },
    BLUE: { r: 0, g: 0, b: 255 },
    yellow: { r: 255, g: 255, b: 0 },
    YELLOW: { r: 255, g: 255, b: 0 },
    cyan: { r: 0, g: 255, b: 255 },
    CYAN: { r: 0, g: 255, b: 255 },
    magenta: { r: 255, g: 0, b: 255 },
    MAGENTA: { r: 255, g: 0, b: 255 },
    gray: { r: 128, g: 128, b: 128 },
    GRAY: { r: 128, g: 128, b: 128 },
    darkGray: { r: 64, g: 64, b: 64 },
    DARK_GRAY: { r: 64, g: 64, b: 64 },
    lightGray: { r: 192, g: 192, b: 192 },
    LIGHT_GRAY: { r: 192, g: 192, b: 192 },
    orange: { r: 255, g: 200, b: 0 },
    ORANGE: { r: 255, g: 200, b: 0 },
    pink: { r: 255, g: 175, b: 175 },
    PINK: { r: 255, g: 175, b: 175 },
    darkRed: { r: 128, g: 0, b: 0 },
    darkGreen: { r: 0, g: 128, b: 0 },
    darkBlue: { r: 0, g: 0, b: 128 },
    darkYellow: { r: 128, g: 128, b: 0 },
    darkCyan: { r: 0, g: 128, b: 128 },
    darkMagenta: { r: 128, g: 0, b: 128 },
});

const HEX_COLOR = /^#?([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/;

function channel(hex: string): number {
    return parseInt(hex, 16);
}

/**
 * Parse a color token: "auto", a known name, or a 3/6 digit hex triplet
 * with optional "#". Short hex doubles each digit ("#abc" is "#aabbcc").
 * Throws INVALID_COLOR_FORMAT for anything else.
 */
export function parseColor(token: string): ColorValue {
    if (token === AUTO_COLOR) {
        return { ...BLACK };
    }

    if (Object.prototype.hasOwnProperty.call(NAMED_COLORS, token)) {
        return { ...NAMED_COLORS[token] };
    }

    const match = HEX_COLOR.exec(token);
    if (!match) {
        throw new DocxError(`Unrecognized color "${token}"`, DocxErrorCode.INVALID_COLOR_FORMAT, { token });
    }

    let digits = match[1];
    if (digits.length === 3) {
        digits = digits
            .split('')
            .map((d) => d + d)
            .join('');
    }
    return {
        r: channel(digits.slice(0, 2)),
        g: channel(digits.slice(2, 4)),
        b: channel(digits.slice(4, 6)),
    };
}

/** Like parseColor, but returns undefined instead of throwing. */
export function tryParseColor(token: string): ColorValue | undefined {
    try {
        return parseColor(token);
    } catch (error) {
        if (error instanceof DocxError && error.code === DocxErrorCode.INVALID_COLOR_FORMAT) {
            return undefined;
        }
        throw error;
    }
}

/** "RRGGBB", upper case, no "#", the form w:color uses. */
export function colorToHex(color: ColorValue): string {
    return [color.r, color.g, color.b]
        .map((c) => c.toString(16).padStart(2, '0'))
        .join('')
        .toUpperCase();
}

export function toPdfColor(color: ColorValue): RGB {
    return rgb(color.r / 255, color.g / 255, color.b / 255);
}
