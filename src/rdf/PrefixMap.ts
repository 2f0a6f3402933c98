/**
 * PrefixMap — prefix declarations of an RDF document.
 *
 * Keeps declaration order; re-declaring a prefix replaces its IRI in place.
 */

/**
 * Turtle PN_LOCAL, restricted to ASCII and without escapes.
 */
const LOCAL_NAME_PATTERN = /^(?:[A-Za-z0-9_:]|%[0-9A-Fa-f]{2})(?:(?:[A-Za-z0-9_\-.:]|%[0-9A-Fa-f]{2})*(?:[A-Za-z0-9_\-:]|%[0-9A-Fa-f]{2}))?$/;

export class PrefixMap {
  private readonly mapping: Map<string, string> = new Map();

  constructor(entries: Iterable<readonly [string, string]> = []) {
    for (const [prefix, iri] of entries) {
      this.set(prefix, iri);
    }
  }

  /**
   * Create a map from a plain `{ prefix: iri }` record.
   */
  static from(record: Record<string, string>): PrefixMap {
    return new PrefixMap(Object.entries(record));
  }

  set(prefix: string, iri: string): this {
    this.mapping.set(prefix, iri);
    return this;
  }

  get(prefix: string): string | undefined {
    return this.mapping.get(prefix);
  }

  delete(prefix: string): boolean {
    return this.mapping.delete(prefix);
  }

  get size(): number {
    return this.mapping.size;
  }

  entries(): IterableIterator<[string, string]> {
    return this.mapping.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, string]> {
    return this.entries();
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.mapping);
  }

  /**
   * Abbreviate an IRI to `prefix:local`.
   *
   * The longest matching namespace wins. Returns undefined when no
   * namespace matches or the remainder is not a valid local name.
   *
   * @param options.includeEmptyPrefix - consider the `""` prefix (default: true)
   */
  abbreviate(iri: string, options: { includeEmptyPrefix?: boolean } = {}): string | undefined {
    const includeEmptyPrefix = options.includeEmptyPrefix ?? true;
    let best: [string, string] | undefined;

    for (const [prefix, namespace] of this.mapping) {
      if (prefix === '' && !includeEmptyPrefix) continue;
      if (namespace.length === 0 || !iri.startsWith(namespace)) continue;
      if (best && best[1].length >= namespace.length) continue;

      const local = iri.slice(namespace.length);
      if (local === '' || LOCAL_NAME_PATTERN.test(local)) {
        best = [prefix, namespace];
      }
    }

    return best ? `${best[0]}:${iri.slice(best[1].length)}` : undefined;
  }

  /**
   * Expand `prefix:local` to a full IRI, or undefined for an unknown prefix.
   */
  expand(curie: string): string | undefined {
    const colon = curie.indexOf(':');
    if (colon < 0) return undefined;
    const namespace = this.mapping.get(curie.slice(0, colon));
    return namespace === undefined ? undefined : namespace + curie.slice(colon + 1);
  }
}
