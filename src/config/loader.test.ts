/**
 * Tests for the writer configuration loader.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { ConfigValidationError, loadWriterConfig, parseWriterSettings } from './loader.js';
import { DEFAULT_SETTINGS } from './types.js';

describe('loadWriterConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `jsonld-writer-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    delete process.env.JSONLD_TEST_BASE;
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    delete process.env.JSONLD_TEST_BASE;
    vi.restoreAllMocks();
  });

  async function writeConfig(content: string): Promise<string> {
    const configPath = join(dir, 'jsonld-writer.yaml');
    await writeFile(configPath, content, 'utf-8');
    return configPath;
  }

  it('loads every setting', async () => {
    const configPath = await writeConfig([
      'format: jsonld-flatten-flat',
      'base: ${JSONLD_TEST_BASE:-http://example.org/}',
      'preferPrefixedProperties: true',
      `context: '{"name": "http://example.org/name"}'`,
      `contextSubstitution: '"http://example.org/context.jsonld"'`,
      'options:',
      '  useNativeTypes: false',
      '  compactArrays: true',
      '',
    ].join('\n'));

    const settings = await loadWriterConfig({ configPath });

    expect(settings).toEqual({
      format: 'jsonld-flatten-flat',
      base: 'http://example.org/',
      config: {
        preferPrefixedProperties: true,
        context: { name: 'http://example.org/name' },
        contextSubstitution: 'http://example.org/context.jsonld',
        transformerOptions: { useNativeTypes: false, compactArrays: true },
      },
    });
  });

  it('substitutes environment variables', async () => {
    process.env.JSONLD_TEST_BASE = 'http://example.net/';
    const configPath = await writeConfig('base: ${JSONLD_TEST_BASE:-http://example.org/}\n');

    const settings = await loadWriterConfig({ configPath });

    expect(settings.base).toBe('http://example.net/');
  });

  it('reads the frame from a file beside the config', async () => {
    await writeFile(join(dir, 'frame.jsonld'), '{"@type": "http://example.org/Person"}', 'utf-8');
    const configPath = await writeConfig('format: jsonld-frame-pretty\nframeFile: frame.jsonld\n');

    const settings = await loadWriterConfig({ configPath });

    expect(settings.format).toBe('jsonld-frame-pretty');
    expect(settings.config.frame).toEqual({ '@type': 'http://example.org/Person' });
  });

  it('returns defaults when the file is missing', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const settings = await loadWriterConfig({ configPath: join(dir, 'missing.yaml') });

    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects an unknown format', async () => {
    const configPath = await writeConfig('format: turtle\n');

    await expect(loadWriterConfig({ configPath })).rejects.toMatchObject({
      name: 'ConfigValidationError',
      path: 'format',
      value: 'turtle',
    });
  });

  it('rejects a missing context file', async () => {
    const configPath = await writeConfig('contextFile: nowhere.jsonld\n');

    await expect(loadWriterConfig({ configPath })).rejects.toMatchObject({ path: 'contextFile' });
  });
});

describe('parseWriterSettings', () => {
  it('applies defaults to an empty document', async () => {
    await expect(parseWriterSettings({})).resolves.toEqual(DEFAULT_SETTINGS);
    await expect(parseWriterSettings(null)).resolves.toEqual(DEFAULT_SETTINGS);
  });

  it('rejects unknown keys', async () => {
    await expect(parseWriterSettings({ colour: 'blue' })).rejects.toThrow(ConfigValidationError);
  });

  it('rejects values of the wrong type', async () => {
    await expect(parseWriterSettings({ preferPrefixedProperties: 'yes' })).rejects.toMatchObject({
      path: 'preferPrefixedProperties',
      value: 'yes',
    });
  });

  it('rejects malformed JSON text', async () => {
    await expect(parseWriterSettings({ context: '{name' })).rejects.toMatchObject({ path: 'context' });
  });

  it('rejects a context that is neither an object, an IRI nor an array', async () => {
    await expect(parseWriterSettings({ context: '42' })).rejects.toThrow(
      "Config validation error at 'context': must be a JSON-LD context: an object, an IRI or an array of these",
    );
  });

  it('accepts an IRI context', async () => {
    const settings = await parseWriterSettings({ context: '"http://example.org/context.jsonld"' });

    expect(settings.config.context).toBe('http://example.org/context.jsonld');
  });

  it('accepts an array of contexts', async () => {
    const settings = await parseWriterSettings({
      context: '["http://example.org/context.jsonld", {"name": "http://example.org/name"}]',
    });

    expect(settings.config.context).toEqual([
      'http://example.org/context.jsonld',
      { name: 'http://example.org/name' },
    ]);
  });

  it('rejects a frame that is not an object', async () => {
    await expect(parseWriterSettings({ frame: '["http://example.org/"]' })).rejects.toThrow(
      "Config validation error at 'frame': must be a JSON object",
    );
  });

  it('reads the framing embed policy', async () => {
    const settings = await parseWriterSettings({ options: { embed: '@never' } });

    expect(settings.config.transformerOptions).toEqual({ embed: '@never' });
  });

  it('rejects an unknown embed policy', async () => {
    await expect(parseWriterSettings({ options: { embed: '@sometimes' } })).rejects.toMatchObject({
      name: 'ConfigValidationError',
      path: 'options.embed',
      value: '@sometimes',
    });
  });

  it('rejects both an inline and a file context', async () => {
    await expect(parseWriterSettings({ context: '{}', contextFile: 'context.jsonld' }))
      .rejects.toMatchObject({ path: 'contextFile' });
  });

  it('parses a bare IRI substitution given as quoted JSON', async () => {
    const settings = await parseWriterSettings({ contextSubstitution: '"http://example.org/c.jsonld"' });

    expect(settings.config.contextSubstitution).toBe('http://example.org/c.jsonld');
  });
});
