/**
 * Process-lifetime key/value namespaces for workers granted `kv`.
 *
 * A guest sees its whole namespace as input and hands back the whole namespace as output, so writes are
 * replacements. Two requests racing on one namespace: the one that completes last wins.
 */
export class KvStore {
  private readonly namespaces = new Map<string, Readonly<Record<string, string>>>();

  /**
   * Copy of a namespace; empty when it was never written.
   */
  read(namespace: string): Record<string, string> {
    return { ...this.namespaces.get(namespace) };
  }

  replace(namespace: string, entries: Readonly<Record<string, string>>): void {
    this.namespaces.set(namespace, Object.freeze({ ...entries }));
  }

  /**
   * Namespace sizes for diagnostics.
   */
  describe(): Array<{ namespace: string; keys: number }> {
    return Array.from(this.namespaces.entries())
      .map(([namespace, entries]) => ({ namespace, keys: Object.keys(entries).length }))
      .sort((left, right) => left.namespace.localeCompare(right.namespace));
  }
}
