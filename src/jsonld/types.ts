/**
 * Types for JSON-LD serialization of RDF datasets.
 *
 * A default @context is DERIVED from the graph unless the caller
 * supplies one; everything else here is per-call configuration.
 */

import type { DatasetCore } from '@rdfjs/types';
import type { PrefixMap } from '../rdf/PrefixMap.js';
import type { JsonObject, JsonValue } from './json.js';

/**
 * Extended context term definition.
 */
export type ContextTerm = {
  /** IRI for the term */
  '@id': string;
  /** Type coercion: `@id` for IRI-valued properties, else a datatype IRI */
  '@type': string;
};

/**
 * JSON-LD context definition.
 *
 * Property terms and prefix entries share one key space; key order
 * is the order entries were added.
 */
export interface JsonLdContext {
  [key: string]: string | ContextTerm;
}

/**
 * The shape of the JSON-LD document produced.
 */
export type OutputForm = 'expand' | 'compact' | 'flatten' | 'frame';

/**
 * Options handed to the JSON-LD engine.
 */
export interface TransformerOptions {
  /** Base IRI used to resolve and relativize IRIs */
  base?: string;
  /** Turn xsd:integer, xsd:double and xsd:boolean literals into JSON numbers and booleans */
  useNativeTypes?: boolean;
  /** Keep rdf:type as a property instead of folding it into @type */
  useRdfType?: boolean;
  /** Collapse single-element arrays to the bare value */
  compactArrays?: boolean;
  /** Shorten IRIs relative to the base when compacting */
  compactToRelative?: boolean;
  /** Framing: embedding policy */
  embed?: '@always' | '@once' | '@never';
  /** Framing: only include properties named in the frame */
  explicit?: boolean;
  /** Framing: drop the top-level @graph when it holds a single node */
  omitGraph?: boolean;
}

/**
 * Per-call serialization settings.
 */
export interface SerializationConfig {
  /**
   * Context used for compaction and flattening (default: derived from the
   * graph). Any JSON-LD local context: an object, an IRI, or an array of these.
   */
  context?: JsonValue;
  /**
   * Value that replaces `@context` in the final output. This is not the
   * context used to compact; use it to point at a published context URL
   * without the engine fetching it.
   */
  contextSubstitution?: JsonValue;
  /** Frame object, required by the frame form */
  frame?: JsonObject;
  /** Engine options; used as given, without defaults (default: see resolveOptions) */
  transformerOptions?: TransformerOptions;
  /** Prefer `ex:p` over `p` for derived property keys (default: false) */
  preferPrefixedProperties?: boolean;
}

/**
 * An RDF dataset together with the prefixes it was declared with.
 */
export interface RdfDocument {
  dataset: DatasetCore;
  prefixes: PrefixMap;
}

/**
 * The JSON-LD engine.
 *
 * The internal form of a dataset is its expanded JSON-LD document.
 */
export interface Transformer {
  toInternalForm(dataset: DatasetCore, options: TransformerOptions): Promise<JsonValue>;
  compact(input: JsonValue, context: JsonValue, options: TransformerOptions): Promise<JsonValue>;
  expand(input: JsonValue, options: TransformerOptions): Promise<JsonValue>;
  flatten(input: JsonValue, context: JsonValue, options: TransformerOptions): Promise<JsonValue>;
  frame(input: JsonValue, frame: JsonObject, options: TransformerOptions): Promise<JsonValue>;
}
