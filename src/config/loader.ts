/**
 * Configuration loader for the JSON-LD writer.
 *
 * Loads settings from a YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 * - Context and frame documents kept in their own JSON files
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { JSONLD_FORMATS, isJsonLdFormat } from '../jsonld/formats.js';
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '../jsonld/json.js';
import type { SerializationConfig } from '../jsonld/types.js';
import type { WriterConfigFile, WriterSettings } from './types.js';
import { DEFAULT_SETTINGS } from './types.js';

/**
 * Config loading options.
 */
export interface LoadWriterConfigOptions {
  /** Path to config file (default: process.env.JSONLD_WRITER_CONFIG or './jsonld-writer.yaml') */
  configPath?: string;
}

/**
 * A config file key holds a value the writer cannot use. `path` is the
 * dotted key, e.g. `options.embed`.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

const TransformerOptionsSchema = z.object({
  base: z.string().optional(),
  useNativeTypes: z.boolean().optional(),
  useRdfType: z.boolean().optional(),
  compactArrays: z.boolean().optional(),
  compactToRelative: z.boolean().optional(),
  embed: z.enum(['@always', '@once', '@never']).optional(),
  explicit: z.boolean().optional(),
  omitGraph: z.boolean().optional(),
}).strict();

const WriterConfigFileSchema = z.object({
  format: z.string().optional(),
  base: z.string().optional(),
  preferPrefixedProperties: z.boolean().optional(),
  context: z.string().optional(),
  contextFile: z.string().optional(),
  contextSubstitution: z.string().optional(),
  frame: z.string().optional(),
  frameFile: z.string().optional(),
  options: TransformerOptionsSchema.optional(),
}).strict();

/**
 * `${NAME}` or `${NAME:-fallback}` inside any YAML string value.
 */
const ENV_REFERENCE = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Replace env references in one string. An unset variable without a
 * fallback becomes '' and is reported.
 */
function expandEnvReferences(text: string): string {
  return text.replace(ENV_REFERENCE, (_match, name: string, fallback: string | undefined) => {
    const value = process.env[name] ?? fallback;
    if (value === undefined) {
      console.warn(`Environment variable ${name} is not set and has no default`);
      return '';
    }
    return value;
  });
}

/**
 * Apply expandEnvReferences to every string in a parsed YAML tree.
 */
function expandEnvTree(node: unknown): unknown {
  if (typeof node === 'string') {
    return expandEnvReferences(node);
  }
  if (Array.isArray(node)) {
    return node.map(expandEnvTree);
  }
  if (node !== null && typeof node === 'object') {
    return Object.fromEntries(Object.entries(node).map(([key, value]) => [key, expandEnvTree(value)]));
  }
  return node;
}

/**
 * Validate the shape of a parsed config file.
 */
export function validateWriterConfig(config: unknown): WriterConfigFile {
  const result = WriterConfigFileSchema.safeParse(config ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue ? issue.path.join('.') : '';
    throw new ConfigValidationError(issue?.message ?? 'invalid configuration', path, valueAt(config, issue?.path ?? []));
  }

  const file = result.data;
  if (file.format !== undefined && !isJsonLdFormat(file.format)) {
    throw new ConfigValidationError(`format must be one of: ${JSONLD_FORMATS.join(', ')}`, 'format', file.format);
  }
  if (file.context !== undefined && file.contextFile !== undefined) {
    throw new ConfigValidationError('only one of context and contextFile may be set', 'contextFile', file.contextFile);
  }
  if (file.frame !== undefined && file.frameFile !== undefined) {
    throw new ConfigValidationError('only one of frame and frameFile may be set', 'frameFile', file.frameFile);
  }
  return file;
}

/**
 * Resolve writer settings from a parsed config object.
 *
 * @param raw - Parsed YAML (after environment substitution)
 * @param baseDir - Directory that contextFile and frameFile are relative to
 */
export async function parseWriterSettings(raw: unknown, baseDir: string = process.cwd()): Promise<WriterSettings> {
  const file = validateWriterConfig(raw);
  const format = file.format !== undefined && isJsonLdFormat(file.format) ? file.format : DEFAULT_SETTINGS.format;

  const config: SerializationConfig = {
    preferPrefixedProperties: file.preferPrefixedProperties ?? DEFAULT_SETTINGS.config.preferPrefixedProperties,
  };

  const context = file.contextFile !== undefined
    ? parseJsonContext(await readJsonFile(resolve(baseDir, file.contextFile), 'contextFile'), 'contextFile')
    : file.context !== undefined ? parseJsonContext(file.context, 'context') : undefined;
  if (context !== undefined) {
    config.context = context;
  }

  if (file.contextSubstitution !== undefined) {
    config.contextSubstitution = parseJson(file.contextSubstitution, 'contextSubstitution');
  }

  const frame = file.frameFile !== undefined
    ? parseJsonObject(await readJsonFile(resolve(baseDir, file.frameFile), 'frameFile'), 'frameFile')
    : file.frame !== undefined ? parseJsonObject(file.frame, 'frame') : undefined;
  if (frame) {
    config.frame = frame;
  }

  if (file.options) {
    config.transformerOptions = file.options;
  }

  return {
    format,
    base: file.base ?? DEFAULT_SETTINGS.base,
    config,
  };
}

/**
 * Load writer settings from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated settings
 */
export async function loadWriterConfig(options: LoadWriterConfigOptions = {}): Promise<WriterSettings> {
  const configPath = options.configPath
    ?? process.env.JSONLD_WRITER_CONFIG
    ?? './jsonld-writer.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return { ...DEFAULT_SETTINGS, config: { ...DEFAULT_SETTINGS.config } };
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigValidationError(
      `failed to parse config file: ${err instanceof Error ? err.message : String(err)}`,
      '',
      absolutePath
    );
  }

  return parseWriterSettings(expandEnvTree(parsed), dirname(absolutePath));
}

function parseJson(text: string, path: string): JsonValue {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new ConfigValidationError(
      `invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      path,
      text
    );
  }
  if (!isJsonValue(value)) {
    throw new ConfigValidationError('invalid JSON', path, text);
  }
  return value;
}

function parseJsonObject(text: string, path: string): JsonObject {
  const value = parseJson(text, path);
  if (!isJsonObject(value)) {
    throw new ConfigValidationError('must be a JSON object', path, value);
  }
  return value;
}

// An object, an IRI, or an array of either
function parseJsonContext(text: string, path: string): JsonValue {
  const value = parseJson(text, path);
  const isContext = (entry: JsonValue): boolean => typeof entry === 'string' || isJsonObject(entry);
  if (!isContext(value) && !(Array.isArray(value) && value.every(isContext))) {
    throw new ConfigValidationError('must be a JSON-LD context: an object, an IRI or an array of these', path, value);
  }
  return value;
}

async function readJsonFile(filePath: string, path: string): Promise<string> {
  if (!existsSync(filePath)) {
    throw new ConfigValidationError(`file not found: ${filePath}`, path, filePath);
  }
  return readFile(filePath, 'utf-8');
}

function valueAt(root: unknown, path: ReadonlyArray<string | number>): unknown {
  let current = root;
  for (const segment of path) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    current = Object.entries(current).find(([key]) => key === String(segment))?.[1];
  }
  return current;
}
