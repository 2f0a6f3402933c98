/**
 * TurtleReader — load Turtle or TriG text into an n3 Store.
 *
 * Only a convenience for building writer input; the prefixes declared
 * in the text are kept so a default context can use them.
 */

import { Parser, Store } from 'n3';
import { TransformError } from '../jsonld/errors.js';
import { PrefixMap } from './PrefixMap.js';

export interface TurtleDocument {
  dataset: Store;
  prefixes: PrefixMap;
}

export interface ReadTurtleOptions {
  /** Base IRI for relative IRIs in the text */
  baseIRI?: string;
  /** n3 format name (default: 'text/turtle'; use 'application/trig' for named graphs) */
  format?: string;
}

/**
 * Parse Turtle (or TriG) text.
 *
 * @throws TransformError on a syntax error
 */
export function readTurtle(text: string, options: ReadTurtleOptions = {}): TurtleDocument {
  const parser = new Parser({
    baseIRI: options.baseIRI,
    format: options.format ?? 'text/turtle',
  });
  const prefixes = new PrefixMap();

  try {
    const quads = parser.parse(text, null, (prefix, namespace) => {
      prefixes.set(prefix, namespace.value);
    });
    return { dataset: new Store(quads), prefixes };
  } catch (err) {
    throw new TransformError(
      `Invalid Turtle: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
