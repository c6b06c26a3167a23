import PizZip from 'pizzip';
import type { Diagnostics } from '../docx/diagnostics.js';

export const RELS_NS = 'http://schemas.openxmlformats.org/package/2006/relationships';
export const REL_TYPE = 'http://schemas.openxmlformats.org/officeDocument/2006/relationships';

export const DOCUMENT_XML =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>' +
  '<w:document xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">' +
  '<w:body><w:p><w:r><w:t>Hello</w:t></w:r></w:p></w:body></w:document>';

/** Build an in-memory .docx from a path → content list. */
export function buildDocx(files: Record<string, string | Uint8Array>): Buffer {
  const zip = new PizZip();
  for (const [path, data] of Object.entries(files)) {
    zip.file(path, data);
  }
  return zip.generate({ type: 'nodebuffer' });
}

export interface RelFixture {
  id: string;
  type: string;
  target: string;
  external?: boolean;
}

export function relsXml(rels: RelFixture[]): string {
  const body = rels
    .map(
      (rel) =>
        `<Relationship Id="${rel.id}" Type="${REL_TYPE}/${rel.type}" Target="${rel.target}"` +
        (rel.external ? ' TargetMode="External"' : '') +
        '/>'
    )
    .join('\n  ');
  return (
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n' +
    `<Relationships xmlns="${RELS_NS}">\n  ${body}\n</Relationships>`
  );
}

export interface RecordedMessage {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export function createRecordingDiagnostics(): Diagnostics & { messages: RecordedMessage[] } {
  const messages: RecordedMessage[] = [];
  const record = (level: RecordedMessage['level']) => (message: string, context?: Record<string, unknown>) => {
    messages.push({ level, message, context });
  };
  return {
    messages,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
  };
}

/** Assemble an sfnt file from raw tables, padding each to four bytes. */
export function buildSfnt(tables: Record<string, Buffer>): Buffer {
  const tags = Object.keys(tables).sort();
  const header = Buffer.alloc(12 + 16 * tags.length);
  header.writeUInt32BE(0x00010000, 0); // sfnt version 1.0
  header.writeUInt16BE(tags.length, 4);

  const bodies: Buffer[] = [];
  let offset = header.length;
  tags.forEach((tag, index) => {
    const data = tables[tag];
    const record = 12 + 16 * index;
    header.write(tag, record, 'ascii');
    header.writeUInt32BE(0, record + 4); // checksum, unchecked by fontkit
    header.writeUInt32BE(offset, record + 8);
    header.writeUInt32BE(data.length, record + 12);
    const padded = Buffer.alloc(Math.ceil(data.length / 4) * 4);
    data.copy(padded);
    bodies.push(padded);
    offset += padded.length;
  });
  return Buffer.concat([header, ...bodies]);
}

export function maxpTable(glyphCount: number): Buffer {
  const maxp = Buffer.alloc(32);
  maxp.writeUInt32BE(0x00010000, 0);
  maxp.writeUInt16BE(glyphCount, 4);
  return maxp;
}

/**
 * Minimal TrueType font: head, hhea, hmtx, maxp, an empty name table and a
 * byte-encoding cmap that maps "A" to glyph 1. Glyph outlines are left out.
 */
export function buildTrueTypeFont(glyphCount: number): Buffer {
  const head = Buffer.alloc(54);
  head.writeUInt32BE(0x00010000, 0);
  head.writeUInt32BE(0x5f0f3cf5, 12); // magic number
  head.writeUInt16BE(1000, 18); // unitsPerEm

  const metricCount = Math.max(glyphCount, 1);
  const hhea = Buffer.alloc(36);
  hhea.writeUInt32BE(0x00010000, 0);
  hhea.writeInt16BE(800, 4); // ascent
  hhea.writeInt16BE(-200, 6); // descent
  hhea.writeUInt16BE(500, 10); // advanceWidthMax
  hhea.writeUInt16BE(metricCount, 34);

  const hmtx = Buffer.alloc(metricCount * 4);
  for (let glyph = 0; glyph < metricCount; glyph++) {
    hmtx.writeUInt16BE(500, glyph * 4);
  }

  // Windows Unicode BMP record pointing at a format 0 subtable.
  const cmap = Buffer.alloc(12 + 262);
  cmap.writeUInt16BE(1, 2); // numSubtables
  cmap.writeUInt16BE(3, 4); // platformID
  cmap.writeUInt16BE(1, 6); // encodingID
  cmap.writeUInt32BE(12, 8); // subtable offset
  cmap.writeUInt16BE(0, 12); // format
  cmap.writeUInt16BE(262, 14); // length
  if (glyphCount > 1) {
    cmap.writeUInt8(1, 18 + 'A'.charCodeAt(0));
  }

  const name = Buffer.alloc(6);
  name.writeUInt16BE(6, 4); // stringOffset, no records

  return buildSfnt({ cmap, head, hhea, hmtx, maxp: maxpTable(glyphCount), name });
}
