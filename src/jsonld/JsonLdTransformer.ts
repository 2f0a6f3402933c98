/**
 * JsonLdTransformer — the JSON-LD algorithms, delegated to jsonld.js.
 *
 * The dataset is handed to the engine as N-Quads written by n3, so any
 * RDF/JS dataset works as input.
 */

import type { DatasetCore } from '@rdfjs/types';
import jsonld from 'jsonld';
import { Writer } from 'n3';
import { TransformError } from './errors.js';
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from './json.js';
import type { Transformer, TransformerOptions } from './types.js';

type EngineDocument = Parameters<typeof jsonld.compact>[0];
type EngineContext = NonNullable<Parameters<typeof jsonld.compact>[1]>;
type EngineFrame = Parameters<typeof jsonld.frame>[1];

/**
 * Options in the shape jsonld.js reads them. Each call reads only the
 * keys it knows.
 */
interface EngineOptions {
  base?: string;
  compactArrays?: boolean;
  compactToRelative?: boolean;
  embed?: '@always' | '@never';
  explicit?: boolean;
  omitGraph?: boolean;
}

export class JsonLdTransformer implements Transformer {
  async toInternalForm(dataset: DatasetCore, options: TransformerOptions): Promise<JsonValue> {
    const nquads = await writeNQuads(dataset);
    const rdfOptions = {
      format: 'application/n-quads' as const,
      useNativeTypes: options.useNativeTypes ?? false,
      useRdfType: options.useRdfType ?? false,
    };
    return this.run('fromRDF', () => jsonld.fromRDF(nquads, rdfOptions));
  }

  async compact(input: JsonValue, context: JsonValue, options: TransformerOptions): Promise<JsonValue> {
    const document = toEngineDocument(input);
    const ctx = toEngineContext(context);
    const engineOptions = toEngineOptions(options);
    return this.run('compact', () => jsonld.compact(document, ctx, engineOptions));
  }

  async expand(input: JsonValue, options: TransformerOptions): Promise<JsonValue> {
    const document = toEngineDocument(input);
    const engineOptions = toEngineOptions(options);
    return this.run('expand', () => jsonld.expand(document, engineOptions));
  }

  async flatten(input: JsonValue, context: JsonValue, options: TransformerOptions): Promise<JsonValue> {
    const document = toEngineDocument(input);
    const ctx = toEngineContext(context);
    const engineOptions = toEngineOptions(options);
    return this.run('flatten', () => jsonld.flatten(document, ctx, engineOptions));
  }

  async frame(input: JsonValue, frame: JsonObject, options: TransformerOptions): Promise<JsonValue> {
    const document = toEngineDocument(input);
    const engineFrame = toEngineFrame(frame);
    const engineOptions = toEngineOptions(options);
    return this.run('frame', () => jsonld.frame(document, engineFrame, engineOptions));
  }

  private async run(operation: string, call: () => Promise<unknown>): Promise<JsonValue> {
    let result: unknown;
    try {
      result = await call();
    } catch (err) {
      throw TransformError.wrap(operation, err);
    }
    if (!isJsonValue(result)) {
      throw new TransformError(`JSON-LD ${operation} returned a value that is not plain JSON`);
    }
    return result;
  }
}

/**
 * Serialize every quad of a dataset as N-Quads.
 */
export function writeNQuads(dataset: DatasetCore): Promise<string> {
  const writer = new Writer({ format: 'N-Quads' });
  for (const quad of dataset) {
    writer.addQuad(quad);
  }
  return new Promise((resolve, reject) => {
    writer.end((error, result) => {
      if (error) {
        reject(TransformError.wrap('N-Quads conversion', error));
      } else {
        resolve(result);
      }
    });
  });
}

function toEngineOptions(options: TransformerOptions): EngineOptions {
  const engineOptions: EngineOptions = {};
  if (options.base !== undefined) engineOptions.base = options.base;
  if (options.compactArrays !== undefined) engineOptions.compactArrays = options.compactArrays;
  if (options.compactToRelative !== undefined) engineOptions.compactToRelative = options.compactToRelative;
  // @once is what jsonld.js does when embed is left out
  if (options.embed !== undefined && options.embed !== '@once') engineOptions.embed = options.embed;
  if (options.explicit !== undefined) engineOptions.explicit = options.explicit;
  if (options.omitGraph !== undefined) engineOptions.omitGraph = options.omitGraph;
  return engineOptions;
}

function isEngineDocument(value: JsonValue): value is JsonValue & EngineDocument {
  return isJsonObject(value) || (Array.isArray(value) && value.every(isJsonObject));
}

function toEngineDocument(value: JsonValue): EngineDocument {
  if (!isEngineDocument(value)) {
    throw new TransformError('JSON-LD input must be an object or an array of objects');
  }
  return value;
}

/**
 * Term definitions are null, an IRI string or an object; only keywords
 * such as `@version` take other values.
 */
function hasTermDefinitions(value: JsonObject): boolean {
  return Object.entries(value).every(
    ([key, definition]) =>
      key.startsWith('@') || definition === null || typeof definition === 'string' || isJsonObject(definition)
  );
}

/**
 * A local context is null, a context IRI, an object, or an array of those.
 */
function isLocalContext(value: JsonValue): boolean {
  if (Array.isArray(value)) {
    return value.every((entry) => !Array.isArray(entry) && isLocalContext(entry));
  }
  return value === null || typeof value === 'string' || isJsonObject(value);
}

function isEngineContext(value: JsonObject): value is JsonObject & EngineContext {
  return hasTermDefinitions(value);
}

// IRIs and arrays go to the engine as `{ "@context": ... }`, which it unwraps
function toEngineContext(value: JsonValue): EngineContext {
  if (!isLocalContext(value)) {
    throw new TransformError('Invalid @context: expected an object, an IRI or an array of contexts', {
      transformCode: 'invalid local context',
    });
  }
  const objects = (Array.isArray(value) ? value : [value]).filter(isJsonObject);
  const local: JsonObject = isJsonObject(value) ? value : { '@context': value };
  if (!objects.every(hasTermDefinitions) || !isEngineContext(local)) {
    throw new TransformError('Invalid @context: term definitions must be null, a string or an object', {
      transformCode: 'invalid term definition',
    });
  }
  return local;
}

const EMBED_VALUES: ReadonlyArray<JsonValue> = ['@always', '@once', '@never', true, false];
const FRAME_FLAGS: ReadonlyArray<string> = ['@explicit', '@omitDefault', '@requireAll'];

// @id and @type match an IRI, a wildcard {} or a list of IRIs
function isFrameMatch(value: JsonValue): boolean {
  if (Array.isArray(value)) {
    return value.every((entry) => typeof entry === 'string' || isJsonObject(entry));
  }
  return typeof value === 'string' || isJsonObject(value);
}

function isEngineFrame(value: JsonObject): value is JsonObject & EngineFrame {
  return Object.entries(value).every(([key, entry]) => {
    if (key === '@context') return isLocalContext(entry);
    if (key === '@id' || key === '@type') return isFrameMatch(entry);
    if (key === '@embed') return EMBED_VALUES.includes(entry);
    if (FRAME_FLAGS.includes(key)) return typeof entry === 'boolean';
    return true;
  });
}

function toEngineFrame(value: JsonObject): EngineFrame {
  if (!isEngineFrame(value)) {
    throw new TransformError('Invalid frame: a framing keyword has a value of the wrong type', {
      transformCode: 'invalid frame',
    });
  }
  return value;
}
