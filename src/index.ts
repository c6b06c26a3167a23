/**
 * docx-resource-resolver — Public API
 *
 * Locates parts in a DOCX container, resolves relationship ids, loads fonts
 * with a fallback chain and parses color tokens. The four groups are
 * independent; a conversion pipeline calls whichever it needs.
 *
 * @module docx-resource-resolver
 */

// ── Archive access ──────────────────────────────────────────────────────────
export {
  openContainer,
  getEntry,
  getEntryText,
  hasEntry,
  getDocumentBody,
  getMediaEntry,
  mediaPathFor,
} from './docx/zip.js';
export type { DocxContainer, ContainerSource, MediaLookupOptions } from './docx/zip.js';

// ── Relationships ───────────────────────────────────────────────────────────
export {
  RelationshipTable,
  parseRelationships,
  buildRelationshipTable,
  resolveRelationship,
  resolvePartPath,
  readRelationshipPart,
  getHyperlink,
} from './docx/relationships.js';
export type {
  RelationshipEntry,
  RelationshipPart,
  RelationshipTableResult,
  RelationshipOptions,
  TargetMode,
} from './docx/relationships.js';

// ── Fonts ───────────────────────────────────────────────────────────────────
export {
  loadFont,
  resolveFont,
  trueTypeFileStrategy,
  standardFontStrategy,
  fontFilePath,
  embedFontProgram,
} from './docx/fonts.js';
export type {
  FontProgram,
  FontTier,
  FontStrategy,
  FontAttemptFailure,
  FontResolutionResult,
  LoadFontOptions,
} from './docx/fonts.js';

// ── Colors ──────────────────────────────────────────────────────────────────
export { parseColor, tryParseColor, colorToHex, toPdfColor, BLACK, NAMED_COLORS } from './docx/colors.js';
export type { ColorValue } from './docx/colors.js';

// ── Constants ───────────────────────────────────────────────────────────────
export { DOCX_PATHS } from './docx/constants.js';

// ── Diagnostics, config, errors ─────────────────────────────────────────────
export { createLoggerDiagnostics, silentDiagnostics } from './docx/diagnostics.js';
export type { Diagnostics } from './docx/diagnostics.js';
export { loadConfig, applyConfig, DEFAULT_CONFIG, CONFIG_FILE } from './config.js';
export { createDocxResources } from './resources.js';
export type { DocxResources } from './resources.js';
export type { ResolverConfig } from './config.js';
export { DocxError, DocxErrorCode, isDocxError } from './docx/errors.js';
export { logToStderr, setLogLevel } from './utils/logger.js';
export type { LogLevel } from './utils/logger.js';
