/**
 * ContextBuilder — Build a default @context from an RDF graph.
 *
 * Each predicate gets a short key (its local name, or `prefix:local`)
 * so compacted output reads like plain JSON, and each declared prefix
 * is added so the remaining IRIs compact to CURIEs.
 */

import type { DatasetCore, Term } from '@rdfjs/types';
import { DataFactory } from 'n3';
import type { PrefixMap } from '../rdf/PrefixMap.js';
import { RDF_LANG_STRING, RDF_TYPE, XSD_STRING, localName } from '../rdf/vocabulary.js';
import type { ContextTerm, JsonLdContext, RdfDocument } from './types.js';

/**
 * Build a @context from the default graph of a dataset.
 *
 * Walks the triples in the dataset's iteration order; the first triple
 * seen for a key decides its definition. Prefixes follow the properties.
 *
 * @param graph - Dataset whose default graph is read
 * @param prefixes - Prefix declarations
 * @param preferPrefixedProperties - Use `ex:p` rather than `p` as the key when a prefix matches
 * @returns A new context object
 */
export function buildContext(
  graph: DatasetCore,
  prefixes: PrefixMap,
  preferPrefixedProperties = false
): JsonLdContext {
  const context: JsonLdContext = {};

  for (const quad of graph.match(null, null, null, DataFactory.defaultGraph())) {
    const predicate = quad.predicate.value;
    if (predicate === RDF_TYPE) {
      continue;
    }

    const key = termKey(predicate, prefixes, preferPrefixedProperties);
    if (Object.hasOwn(context, key)) {
      continue;
    }

    const definition = buildTermForObject(predicate, quad.object);
    if (definition !== undefined) {
      context[key] = definition;
    }
  }

  for (const [prefix, iri] of prefixes.entries()) {
    // JSON-LD has no empty term
    if (prefix === '') {
      continue;
    }
    if (Object.hasOwn(context, prefix)) {
      console.warn(`Prefix '${prefix}' not added to @context: a property already uses that key`);
      continue;
    }
    context[prefix] = iri;
  }

  return context;
}

/**
 * Build the context of a document read together with its prefixes.
 */
export function buildContextForGraph(
  document: RdfDocument,
  preferPrefixedProperties = false
): JsonLdContext {
  return buildContext(document.dataset, document.prefixes, preferPrefixedProperties);
}

function termKey(predicate: string, prefixes: PrefixMap, preferPrefixedProperties: boolean): string {
  if (preferPrefixedProperties) {
    const abbreviated = prefixes.abbreviate(predicate, { includeEmptyPrefix: false });
    if (abbreviated !== undefined) {
      return abbreviated;
    }
  }
  return localName(predicate);
}

/**
 * Definition for a predicate, from the kind of object it was seen with.
 */
function buildTermForObject(predicate: string, object: Term): string | ContextTerm | undefined {
  switch (object.termType) {
    case 'NamedNode':
    case 'BlankNode':
      return { '@id': predicate, '@type': '@id' };
    case 'Literal': {
      const datatype = object.datatype.value;
      // RDF 1.1: simple and language-tagged strings carry no coercion
      if (datatype === '' || datatype === XSD_STRING || datatype === RDF_LANG_STRING) {
        return predicate;
      }
      return { '@id': predicate, '@type': datatype };
    }
    default:
      return undefined;
  }
}
