import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { DEFAULT_CONFIG, applyConfig, loadConfig } from '../config.js';
import { getLogLevel, logToStderr, setLogLevel } from '../utils/logger.js';

describe('loadConfig', () => {
  let tmpDir: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docx-config-'));
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses defaults when the file does not exist', () => {
    expect(loadConfig(path.join(tmpDir, 'missing.json'))).toEqual({
      fontsDirectory: 'fonts',
      fallbackFont: 'Helvetica',
      mediaExtension: 'png',
      logLevel: 'info',
    });
  });

  it('merges the file over the defaults', async () => {
    const file = path.join(tmpDir, 'partial.json');
    await fs.writeFile(file, JSON.stringify({ fontsDirectory: '/opt/fonts', logLevel: 'debug' }));
    expect(loadConfig(file)).toEqual({ ...DEFAULT_CONFIG, fontsDirectory: '/opt/fonts', logLevel: 'debug' });
  });

  it('falls back to defaults and logs when validation fails', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const file = path.join(tmpDir, 'invalid.json');
    await fs.writeFile(file, JSON.stringify({ mediaExtension: 'not an extension' }));

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(write).toHaveBeenCalledWith(
      `[docx-resources] [ERROR] Invalid config in ${file}: mediaExtension: mediaExtension must be a bare file extension\n`
    );
  });

  it('falls back to defaults when the file is not JSON', async () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const file = path.join(tmpDir, 'broken.json');
    await fs.writeFile(file, '{ fontsDirectory: ');

    expect(loadConfig(file)).toEqual(DEFAULT_CONFIG);
    expect(write).toHaveBeenCalledTimes(1);
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel('info');
    vi.restoreAllMocks();
  });

  it('writes prefixed lines to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    logToStderr('warn', 'font missing');
    expect(write).toHaveBeenCalledWith('[docx-resources] [WARN] font missing\n');
  });

  it('drops messages below the configured level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    applyConfig({ ...DEFAULT_CONFIG, logLevel: 'error' });
    expect(getLogLevel()).toBe('error');
    logToStderr('warn', 'ignored');
    logToStderr('error', 'kept');
    expect(write).toHaveBeenCalledTimes(1);
    expect(write).toHaveBeenCalledWith('[docx-resources] [ERROR] kept\n');
  });
});
