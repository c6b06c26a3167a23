/**
 * DOCX relationship resolution — Single Responsibility: turn
 * word/_rels/document.xml.rels into an id → target table and answer lookups.
 *
 * Document parts reference hyperlinks, images and other resources by
 * relationship id (r:id="rId7"); this module maps those ids to targets.
 */

import path from 'path';
import { DOCX_PATHS, getMimeType } from './constants.js';
import { createLoggerDiagnostics, silentDiagnostics, type Diagnostics } from './diagnostics.js';
import { getElementChildren, localNameOf, parseXml } from './dom.js';
import { DocxError, DocxErrorCode } from './errors.js';
import { getEntry, getEntryText, hasEntry, openContainer, type ContainerSource } from './zip.js';

export type TargetMode = 'Internal' | 'External';

export interface RelationshipEntry {
    readonly id: string;
    readonly type: string;
    readonly target: string;
    readonly targetMode: TargetMode;
}

export interface RelationshipPart {
    readonly id: string;
    readonly path: string;
    readonly mimeType: string;
    readonly data: Buffer;
}

export type RelationshipTableResult =
    | { ok: true; table: RelationshipTable }
    | { ok: false; error: DocxError };

export interface RelationshipOptions {
    diagnostics?: Diagnostics;
}

const defaultDiagnostics = createLoggerDiagnostics('relationships');

/**
 * Immutable id → relationship map for one document part.
 * When the source lists an id twice, the first entry wins.
 */
export class RelationshipTable {
    private readonly byId: ReadonlyMap<string, RelationshipEntry>;

    constructor(entries: Iterable<RelationshipEntry>, diagnostics: Diagnostics = defaultDiagnostics) {
        const map = new Map<string, RelationshipEntry>();
        for (const entry of entries) {
            if (map.has(entry.id)) {
                diagnostics.warn(`Duplicate relationship id ${entry.id}; keeping the first entry`, {
                    ignoredTarget: entry.target,
                });
                continue;
            }
            map.set(entry.id, Object.freeze({ ...entry }));
        }
        this.byId = map;
        Object.freeze(this);
    }

    static empty(): RelationshipTable {
        return new RelationshipTable([], silentDiagnostics);
    }

    get size(): number {
        return this.byId.size;
    }

    has(id: string): boolean {
        return this.byId.has(id);
    }

    get(id: string): RelationshipEntry | undefined {
        return this.byId.get(id);
    }

    entries(): RelationshipEntry[] {
        return [...this.byId.values()];
    }

    /**
     * Entries whose type ends with `/<suffix>`, e.g. "hyperlink" or "image".
     */
    byType(suffix: string): RelationshipEntry[] {
        return this.entries().filter((entry) => entry.type.endsWith(`/${suffix}`));
    }
}

function parseFailure(message: string, context?: Record<string, unknown>): RelationshipTableResult {
    return {
        ok: false,
        error: new DocxError(message, DocxErrorCode.RELATIONSHIP_PARSE_ERROR, context),
    };
}

/**
 * Parse the XML of a relationship part. Malformed XML or an unexpected
 * structure yields `{ ok: false }`; nothing is thrown.
 */
export function parseRelationships(xml: string, options: RelationshipOptions = {}): RelationshipTableResult {
    const diagnostics = options.diagnostics ?? defaultDiagnostics;
    const { document, errors, warnings } = parseXml(xml);

    for (const warning of warnings) {
        diagnostics.debug(`XML warning in relationship part: ${warning}`);
    }
    if (errors.length > 0) {
        return parseFailure(`Malformed relationship XML: ${errors[0]}`, { errors });
    }

    const root = document?.documentElement;
    if (!root) {
        return parseFailure('Relationship part has no root element');
    }
    if (localNameOf(root) !== 'Relationships') {
        return parseFailure(`Unexpected root element <${root.nodeName}> in relationship part`, {
            root: root.nodeName,
        });
    }

    const entries: RelationshipEntry[] = [];
    for (const element of getElementChildren(root)) {
        if (localNameOf(element) !== 'Relationship') continue;

        const id = element.getAttribute('Id');
        const type = element.getAttribute('Type');
        const target = element.getAttribute('Target');
        if (!id || !type || !target) {
            return parseFailure('Relationship element is missing Id, Type or Target', {
                index: entries.length,
                id,
            });
        }
        const targetMode: TargetMode = element.getAttribute('TargetMode') === 'External' ? 'External' : 'Internal';
        entries.push({ id, type, target, targetMode });
    }

    const table = new RelationshipTable(entries, diagnostics);
    diagnostics.debug(`Parsed ${table.size} relationships`);
    return { ok: true, table };
}

/**
 * Build the relationship table of a container's main document part.
 * A container without word/_rels/document.xml.rels has no relationships.
 */
export async function buildRelationshipTable(
    source: ContainerSource,
    options: RelationshipOptions = {},
): Promise<RelationshipTableResult> {
    const diagnostics = options.diagnostics ?? defaultDiagnostics;
    const container = await openContainer(source);

    if (!(await hasEntry(container, DOCX_PATHS.DOCUMENT_RELS))) {
        diagnostics.info(`No relationship part in ${container.source}`);
        return { ok: true, table: RelationshipTable.empty() };
    }

    const xml = await getEntryText(container, DOCX_PATHS.DOCUMENT_RELS);
    const result = parseRelationships(xml, { diagnostics });
    if (!result.ok) {
        diagnostics.error(`Cannot parse ${DOCX_PATHS.DOCUMENT_RELS} in ${container.source}`, {
            reason: result.error.message,
        });
    }
    return result;
}

/**
 * Target of relationship `id`.
 * Throws RELATIONSHIP_NOT_FOUND if the table has no such id.
 */
export function resolveRelationship(table: RelationshipTable, id: string): string {
    const entry = table.get(id);
    if (!entry) {
        throw new DocxError(`Relationship ${id} not found`, DocxErrorCode.RELATIONSHIP_NOT_FOUND, { id });
    }
    return entry.target;
}

/**
 * Archive path of an internal target. Targets are relative to the word/
 * folder unless they start with "/", which anchors them at the package root.
 */
export function resolvePartPath(entry: RelationshipEntry): string {
    if (entry.targetMode === 'External') {
        throw new DocxError(
            `Relationship ${entry.id} points outside the package: ${entry.target}`,
            DocxErrorCode.INVALID_PATH,
            { id: entry.id, target: entry.target },
        );
    }
    const resolved = entry.target.startsWith('/')
        ? path.posix.normalize(entry.target).replace(/^\/+/, '')
        : path.posix.normalize(path.posix.join(DOCX_PATHS.WORD_FOLDER, entry.target));
    if (resolved === '..' || resolved.startsWith('../')) {
        throw new DocxError(
            `Relationship ${entry.id} target escapes the package: ${entry.target}`,
            DocxErrorCode.INVALID_PATH,
            { id: entry.id, target: entry.target },
        );
    }
    return resolved;
}

/** Build the table and resolve one hyperlink id in a single call. */
export async function getHyperlink(
    source: ContainerSource,
    id: string,
    options: RelationshipOptions = {},
): Promise<string> {
    const result = await buildRelationshipTable(source, options);
    if (!result.ok) throw result.error;
    return resolveRelationship(result.table, id);
}

/**
 * Read the package part an internal relationship points at, e.g. the image
 * behind an <a:blip r:embed="rId5"/>.
 */
export async function readRelationshipPart(
    source: ContainerSource,
    table: RelationshipTable,
    id: string,
): Promise<RelationshipPart> {
    const entry = table.get(id);
    if (!entry) {
        throw new DocxError(`Relationship ${id} not found`, DocxErrorCode.RELATIONSHIP_NOT_FOUND, { id });
    }
    const partPath = resolvePartPath(entry);
    const data = await getEntry(source, partPath);
    return { id, path: partPath, mimeType: getMimeType(path.posix.extname(partPath)), data };
}
