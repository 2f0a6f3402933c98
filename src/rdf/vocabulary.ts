/**
 * IRIs the writer needs to recognise.
 */

export const RDF_NAMESPACE = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';
export const XSD_NAMESPACE = 'http://www.w3.org/2001/XMLSchema#';

export const RDF_TYPE = `${RDF_NAMESPACE}type`;
export const RDF_LANG_STRING = `${RDF_NAMESPACE}langString`;
export const XSD_STRING = `${XSD_NAMESPACE}string`;

/**
 * Local name of an IRI: the text after the last `#`, `/` or `:`.
 *
 * Falls back to the whole IRI when that text is empty, since a JSON-LD
 * term cannot be the empty string.
 */
export function localName(iri: string): string {
  const split = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'), iri.lastIndexOf(':'));
  const local = iri.slice(split + 1);
  return local.length > 0 ? local : iri;
}
