import path from 'path';
import process from 'process';
import fs from 'fs';
import { z } from 'zod';
import { DEFAULT_FALLBACK_FONT, DEFAULT_MEDIA_EXTENSION } from './docx/constants.js';
import { logToStderr, setLogLevel } from './utils/logger.js';

export const CONFIG_FILE = path.join(process.cwd(), 'docx-resources.config.json');

export const ResolverConfigSchema = z.object({
    fontsDirectory: z.string().min(1).default('fonts'),
    fallbackFont: z.string().min(1).default(DEFAULT_FALLBACK_FONT),
    mediaExtension: z
        .string()
        .regex(/^\.?[A-Za-z0-9]+$/, 'mediaExtension must be a bare file extension')
        .default(DEFAULT_MEDIA_EXTENSION),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

export const DEFAULT_CONFIG: ResolverConfig = ResolverConfigSchema.parse({});

// Load configuration
export function loadConfig(configFile: string = CONFIG_FILE): ResolverConfig {
    try {
        if (fs.existsSync(configFile)) {
            const configContent = fs.readFileSync(configFile, 'utf8');
            const parsed = ResolverConfigSchema.safeParse(JSON.parse(configContent));
            if (parsed.success) {
                return parsed.data;
            }
            const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
            logToStderr('error', `Invalid config in ${configFile}: ${issues.join('; ')}`);
        }
    } catch (error) {
        logToStderr('error', `Error loading config ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
    }

    // Return default config if loading fails
    return { ...DEFAULT_CONFIG };
}

/** Apply process-wide settings from a loaded config. */
export function applyConfig(config: ResolverConfig): void {
    setLogLevel(config.logLevel);
}
