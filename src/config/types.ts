/**
 * Configuration types for the JSON-LD writer.
 *
 * These types define the structure of jsonld-writer.yaml and the
 * settings it resolves to.
 */

import type { JsonLdFormat } from '../jsonld/formats.js';
import type { SerializationConfig, TransformerOptions } from '../jsonld/types.js';

/**
 * jsonld-writer.yaml as written.
 *
 * `context`, `contextSubstitution` and `frame` hold JSON text, so a
 * substitution that is a bare IRI must be quoted: '"http://…"'.
 */
export interface WriterConfigFile {
  /** Output format (default: 'jsonld-compact-pretty') */
  format?: string;
  /** Base IRI (default: '') */
  base?: string;
  /** Prefer `ex:p` over `p` for derived keys (default: false) */
  preferPrefixedProperties?: boolean;
  /** Inline @context as JSON text: an object, an IRI or an array of these */
  context?: string;
  /** Path of a JSON file holding the @context, relative to the config file */
  contextFile?: string;
  /** Replacement @context value as JSON text */
  contextSubstitution?: string;
  /** Inline frame as JSON text */
  frame?: string;
  /** Path of a JSON file holding the frame, relative to the config file */
  frameFile?: string;
  /** Engine options; when present no defaults are applied */
  options?: TransformerOptions;
}

/**
 * Resolved writer settings.
 */
export interface WriterSettings {
  format: JsonLdFormat;
  base: string;
  config: SerializationConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_SETTINGS: WriterSettings = {
  format: 'jsonld-compact-pretty',
  base: '',
  config: {
    preferPrefixedProperties: false,
  },
};
