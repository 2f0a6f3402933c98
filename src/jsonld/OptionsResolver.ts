/**
 * OptionsResolver — options passed to the JSON-LD engine.
 */

import type { TransformerOptions } from './types.js';

/**
 * Defaults applied when the caller supplies no options, chosen so the
 * output reads as ordinary JSON: native numbers and booleans, and no
 * single-element arrays.
 */
export const DEFAULT_TRANSFORMER_OPTIONS: Readonly<Omit<TransformerOptions, 'base'>> = {
  useNativeTypes: true,
  useRdfType: false,
  compactArrays: true,
};

/**
 * Resolve engine options for a call.
 *
 * Caller options are returned as given; the caller is then responsible
 * for every setting, the base IRI included.
 */
export function resolveOptions(baseURI: string, callerOptions?: TransformerOptions): TransformerOptions {
  if (callerOptions) {
    return callerOptions;
  }
  return {
    ...DEFAULT_TRANSFORMER_OPTIONS,
    base: baseURI,
  };
}
