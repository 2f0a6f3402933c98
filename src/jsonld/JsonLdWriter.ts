/**
 * JsonLdWriter — Serialize an RDF dataset as JSON-LD text.
 *
 * The output form and indentation are fixed when the writer is created;
 * everything else is supplied per call, so one writer can be shared.
 */

import type { Writable } from 'node:stream';
import type { DatasetCore } from '@rdfjs/types';
import type { PrefixMap } from '../rdf/PrefixMap.js';
import { ConfigurationError, IOError } from './errors.js';
import { dispatch } from './FormatDispatcher.js';
import { DEFAULT_FORMAT, describeFormat, isJsonLdFormat, type JsonLdFormat } from './formats.js';
import type { JsonValue } from './json.js';
import { JsonLdTransformer } from './JsonLdTransformer.js';
import { resolveOptions } from './OptionsResolver.js';
import type { OutputForm, SerializationConfig, Transformer } from './types.js';

export class JsonLdWriter {
  readonly format: JsonLdFormat;
  readonly form: OutputForm;
  readonly pretty: boolean;
  private readonly transformer: Transformer;

  /**
   * @param format - One of the `jsonld-*` format names
   * @param transformer - JSON-LD engine (default: jsonld.js)
   * @throws ConfigurationError for an unknown format name
   */
  constructor(format: string = DEFAULT_FORMAT, transformer: Transformer = new JsonLdTransformer()) {
    if (!isJsonLdFormat(format)) {
      throw new ConfigurationError(`Unexpected output format: ${format}`);
    }
    const { form, pretty } = describeFormat(format);
    this.format = format;
    this.form = form;
    this.pretty = pretty;
    this.transformer = transformer;
  }

  /**
   * Convert a dataset to its JSON-LD document, before serialization.
   */
  async toJsonLd(
    dataset: DatasetCore,
    prefixes: PrefixMap,
    baseURI: string,
    config: SerializationConfig = {}
  ): Promise<JsonValue> {
    // Fail on a missing frame before the engine does any work
    if (this.form === 'frame' && !config.frame) {
      throw new ConfigurationError('No frame object found in configuration');
    }

    const options = resolveOptions(baseURI, config.transformerOptions);
    const representation = await this.transformer.toInternalForm(dataset, options);

    return dispatch(this.form, representation, {
      graph: dataset,
      prefixes,
      config,
      options,
      transformer: this.transformer,
    });
  }

  /**
   * Serialize a dataset as JSON-LD text ending in a single newline.
   */
  async write(
    dataset: DatasetCore,
    prefixes: PrefixMap,
    baseURI: string,
    config: SerializationConfig = {}
  ): Promise<string> {
    const document = await this.toJsonLd(dataset, prefixes, baseURI, config);
    return this.serialize(document);
  }

  /**
   * Write the JSON-LD text to a stream as UTF-8.
   *
   * Nothing is written if conversion fails.
   *
   * @throws IOError when the stream rejects the text
   */
  async writeTo(
    output: Writable,
    dataset: DatasetCore,
    prefixes: PrefixMap,
    baseURI: string,
    config: SerializationConfig = {}
  ): Promise<void> {
    const text = await this.write(dataset, prefixes, baseURI, config);
    await new Promise<void>((resolve, reject) => {
      const fail = (err: Error): void => {
        reject(new IOError(`Failed to write JSON-LD output: ${err.message}`, { cause: err }));
      };
      // A failed write also emits 'error' after the callback; keep listening for it
      output.once('error', fail);
      output.write(text, 'utf8', (err) => {
        if (err) {
          fail(err);
          return;
        }
        output.off('error', fail);
        resolve();
      });
    });
  }

  serialize(document: JsonValue): string {
    const text = this.pretty ? JSON.stringify(document, null, 2) : JSON.stringify(document);
    return `${text}\n`;
  }
}

/**
 * Create a JSON-LD writer.
 */
export function createJsonLdWriter(format?: JsonLdFormat, transformer?: Transformer): JsonLdWriter {
  return new JsonLdWriter(format, transformer);
}
