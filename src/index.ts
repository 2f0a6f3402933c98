/**
 * rdf-jsonld-writer — Serialize RDF datasets as compacted, expanded,
 * flattened or framed JSON-LD.
 *
 * This is the main entry point for the library.
 */

// JSON-LD context derivation, dispatch and writing
export * from './jsonld/index.js';

// RDF input: prefixes, vocabulary, Turtle reading
export * from './rdf/index.js';

// Configuration
export * from './config/types.js';
export * from './config/loader.js';
