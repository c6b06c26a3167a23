/**
 * DOCX ZIP I/O — Single Responsibility: file ↔ zip ↔ entry bytes.
 *
 * Every lookup accepts a path, raw bytes or an already opened container.
 * Paths and bytes are opened for the duration of one call and nothing is
 * retained; pass a DocxContainer to reuse one archive across many reads.
 */

import fs from 'fs/promises';
import PizZip from 'pizzip';
import { DEFAULT_MEDIA_EXTENSION, DOCX_PATHS } from './constants.js';
import { DocxError, DocxErrorCode, describeError, withErrorContext } from './errors.js';

export interface DocxContainer {
    /** File path, or `<memory>` for containers opened from bytes. */
    readonly source: string;
    readonly zip: PizZip;
}

export type ContainerSource = string | Uint8Array | DocxContainer;

export interface MediaLookupOptions {
    /** Extension appended to the media name, without the dot. */
    extension?: string;
}

function parseArchive(bytes: Uint8Array, source: string): DocxContainer {
    try {
        return { source, zip: new PizZip(bytes) };
    } catch (error) {
        throw new DocxError(
            `Container is not a valid zip archive: ${describeError(error)}`,
            DocxErrorCode.CONTAINER_UNREADABLE,
            { source },
        );
    }
}

/**
 * Open a .docx container. Fails with CONTAINER_UNREADABLE when the file
 * cannot be read or does not hold a zip archive.
 */
export async function openContainer(source: ContainerSource): Promise<DocxContainer> {
    if (typeof source === 'string') {
        const filePath = source;
        const bytes = await withErrorContext(() => fs.readFile(filePath), DocxErrorCode.CONTAINER_UNREADABLE, {
            source: filePath,
        });
        return parseArchive(bytes, filePath);
    }
    if (source instanceof Uint8Array) {
        return parseArchive(source, '<memory>');
    }
    return source;
}

function findEntry(container: DocxContainer, logicalPath: string): PizZip.ZipObject {
    const entry = container.zip.file(logicalPath);
    if (!entry || entry.dir) {
        throw new DocxError(
            `Entry ${logicalPath} not found in ${container.source}`,
            DocxErrorCode.ENTRY_NOT_FOUND,
            { source: container.source, path: logicalPath },
        );
    }
    return entry;
}

/**
 * Read the bytes of a named entry.
 * Throws ENTRY_NOT_FOUND if the entry is missing.
 */
export async function getEntry(source: ContainerSource, logicalPath: string): Promise<Buffer> {
    const container = await openContainer(source);
    return findEntry(container, logicalPath).asNodeBuffer();
}

/** Read a named entry as UTF-8 text. */
export async function getEntryText(source: ContainerSource, logicalPath: string): Promise<string> {
    const container = await openContainer(source);
    return findEntry(container, logicalPath).asText();
}

export async function hasEntry(source: ContainerSource, logicalPath: string): Promise<boolean> {
    const container = await openContainer(source);
    const entry = container.zip.file(logicalPath);
    return entry !== null && !entry.dir;
}

/** The main document part, word/document.xml. */
export async function getDocumentBody(source: ContainerSource): Promise<Buffer> {
    return getEntry(source, DOCX_PATHS.DOCUMENT_XML);
}

/**
 * Media parts are addressed by base name: the name is lower-cased and the
 * extension appended, so "Image1" becomes word/media/image1.png.
 */
export function mediaPathFor(name: string, extension: string = DEFAULT_MEDIA_EXTENSION): string {
    const ext = extension.replace(/^\./, '');
    return `${DOCX_PATHS.MEDIA_FOLDER}/${name.toLowerCase()}.${ext}`;
}

export async function getMediaEntry(
    source: ContainerSource,
    name: string,
    options: MediaLookupOptions = {},
): Promise<Buffer> {
    return getEntry(source, mediaPathFor(name, options.extension));
}
