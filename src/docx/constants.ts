/**
 * DOCX constants — shared values used across the module.
 */

// ═══════════════════════════════════════════════════════════════════════
// File paths
// ═══════════════════════════════════════════════════════════════════════

export const DOCX_PATHS = {
    DOCUMENT_XML: 'word/document.xml',
    DOCUMENT_RELS: 'word/_rels/document.xml.rels',
    WORD_FOLDER: 'word',
    MEDIA_FOLDER: 'word/media',
} as const;

/** Media lookups by name assume this extension unless told otherwise. */
export const DEFAULT_MEDIA_EXTENSION = 'png';

// ═══════════════════════════════════════════════════════════════════════
// Fonts
// ═══════════════════════════════════════════════════════════════════════

export const FONT_FILE_EXTENSION = '.ttf';

/** Standard (base-14) font used when a requested font cannot be loaded. */
export const DEFAULT_FALLBACK_FONT = 'Helvetica';

// ═══════════════════════════════════════════════════════════════════════
// Image MIME types
// ═══════════════════════════════════════════════════════════════════════

export const IMAGE_MIME_TYPES: Record<string, string> = {
    '.png': 'image/png',
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.gif': 'image/gif',
    '.bmp': 'image/bmp',
    '.tiff': 'image/tiff',
    '.tif': 'image/tiff',
    '.svg': 'image/svg+xml',
    '.webp': 'image/webp',
    '.emf': 'image/x-emf',
    '.wmf': 'image/x-wmf',
};

export function getMimeType(ext: string): string {
    return IMAGE_MIME_TYPES[ext.toLowerCase()] ?? 'application/octet-stream';
}
