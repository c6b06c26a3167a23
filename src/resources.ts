/**
 * Config-bound entry points for the per-document calls that have settings:
 * media lookups use the configured extension, font lookups the configured
 * directory and fallback font.
 */

import { DEFAULT_CONFIG, type ResolverConfig } from './config.js';
import type { Diagnostics } from './docx/diagnostics.js';
import { loadFont, type FontResolutionResult } from './docx/fonts.js';
import { getMediaEntry, type ContainerSource } from './docx/zip.js';

export interface DocxResources {
    readonly config: ResolverConfig;
    getMedia(source: ContainerSource, name: string): Promise<Buffer>;
    loadFont(name: string): Promise<FontResolutionResult>;
}

export function createDocxResources(config: ResolverConfig = DEFAULT_CONFIG, diagnostics?: Diagnostics): DocxResources {
    return {
        config,
        getMedia: (source, name) => getMediaEntry(source, name, { extension: config.mediaExtension }),
        loadFont: (name) =>
            loadFont(name, config.fontsDirectory, { fallbackFont: config.fallbackFont, diagnostics }),
    };
}
