/**
 * FormatDispatcher — run the engine step for an output form.
 */

import type { DatasetCore } from '@rdfjs/types';
import type { PrefixMap } from '../rdf/PrefixMap.js';
import { buildContext } from './ContextBuilder.js';
import { ConfigurationError } from './errors.js';
import { isJsonObject, type JsonValue } from './json.js';
import type { OutputForm, SerializationConfig, Transformer, TransformerOptions } from './types.js';

/**
 * Everything a dispatch needs besides the form and the converted dataset.
 */
export interface DispatchRequest {
  /** Dataset the representation was converted from; read only to derive a context */
  graph: DatasetCore;
  prefixes: PrefixMap;
  config: SerializationConfig;
  options: TransformerOptions;
  transformer: Transformer;
}

/**
 * Produce the document for `form` from the expanded representation.
 *
 * @throws ConfigurationError for a frame form without a frame, or an unknown form
 * @throws TransformError when the engine fails
 */
export async function dispatch(
  form: OutputForm,
  representation: JsonValue,
  request: DispatchRequest
): Promise<JsonValue> {
  const { config, options, transformer } = request;

  switch (form) {
    case 'expand':
      return representation;

    case 'frame': {
      if (!config.frame) {
        throw new ConfigurationError('No frame object found in configuration');
      }
      return transformer.frame(representation, config.frame, options);
    }

    case 'compact':
    case 'flatten': {
      const context = resolveContext(request);
      const result = form === 'compact'
        ? await transformer.compact(representation, context, options)
        : await transformer.flatten(representation, context, options);
      return config.contextSubstitution === undefined
        ? result
        : substituteContext(result, config.contextSubstitution);
    }

    default:
      return unexpectedForm(form);
  }
}

/**
 * The caller's context, or one derived from the graph.
 */
export function resolveContext(request: Pick<DispatchRequest, 'graph' | 'prefixes' | 'config'>): JsonValue {
  const { config } = request;
  if (config.context !== undefined) {
    return config.context;
  }
  return buildContext(request.graph, request.prefixes, config.preferPrefixedProperties ?? false);
}

/**
 * Replace the value of a top-level `@context`.
 *
 * Anything that is not an object carrying `@context` is returned as is.
 * Sibling keys keep their values and their order.
 */
export function substituteContext(result: JsonValue, replacement: JsonValue): JsonValue {
  if (!isJsonObject(result) || !Object.hasOwn(result, '@context')) {
    return result;
  }
  return { ...result, '@context': replacement };
}

function unexpectedForm(form: never): never {
  throw new ConfigurationError(`Unexpected output form: ${String(form)}`);
}
