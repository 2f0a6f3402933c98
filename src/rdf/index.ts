/**
 * RDF input module exports.
 */

export * from './vocabulary.js';
export * from './PrefixMap.js';
export * from './TurtleReader.js';
