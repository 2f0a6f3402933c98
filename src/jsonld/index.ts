/**
 * JSON-LD module exports.
 */

export * from './types.js';
export * from './json.js';
export * from './errors.js';
export * from './formats.js';
export * from './ContextBuilder.js';
export * from './OptionsResolver.js';
export * from './FormatDispatcher.js';
export * from './JsonLdTransformer.js';
export * from './JsonLdWriter.js';
