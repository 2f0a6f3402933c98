/**
 * JSON-LD output formats offered by the writer.
 */

import type { OutputForm } from './types.js';

export const JSONLD_CONTENT_TYPE = 'application/ld+json';
export const JSONLD_FILE_EXTENSION = 'jsonld';

const FORMATS = {
  'jsonld-compact-pretty': { form: 'compact', pretty: true },
  'jsonld-compact-flat': { form: 'compact', pretty: false },
  'jsonld-expand-pretty': { form: 'expand', pretty: true },
  'jsonld-expand-flat': { form: 'expand', pretty: false },
  'jsonld-flatten-pretty': { form: 'flatten', pretty: true },
  'jsonld-flatten-flat': { form: 'flatten', pretty: false },
  'jsonld-frame-pretty': { form: 'frame', pretty: true },
  'jsonld-frame-flat': { form: 'frame', pretty: false },
} as const satisfies Record<string, FormatDescription>;

export type JsonLdFormat = keyof typeof FORMATS;

export interface FormatDescription {
  form: OutputForm;
  /** Indented output rather than a single line */
  pretty: boolean;
}

export const DEFAULT_FORMAT: JsonLdFormat = 'jsonld-compact-pretty';

export const JSONLD_FORMATS: readonly JsonLdFormat[] = [
  'jsonld-compact-pretty',
  'jsonld-compact-flat',
  'jsonld-expand-pretty',
  'jsonld-expand-flat',
  'jsonld-flatten-pretty',
  'jsonld-flatten-flat',
  'jsonld-frame-pretty',
  'jsonld-frame-flat',
];

export function isJsonLdFormat(value: unknown): value is JsonLdFormat {
  return typeof value === 'string' && Object.hasOwn(FORMATS, value);
}

export function describeFormat(format: JsonLdFormat): FormatDescription {
  return FORMATS[format];
}
