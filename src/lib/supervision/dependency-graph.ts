/**
 * Ordered children of a lifecycle node.
 *
 * Static dependencies come from `resolveDependencies()` at each start and
 * keep their declared order. Runtime dependencies are appended while the
 * node runs and survive restarts. Stop order is always the exact reverse
 * of start order, so runtime children stop first, last-added first.
 */
export class DependencyGraph<T> {
  private static_: T[] = [];
  private runtime: T[] = [];

  public get staticDependencies(): readonly T[] {
    return [...this.static_];
  }

  public get runtimeDependencies(): readonly T[] {
    return [...this.runtime];
  }

  public get size(): number {
    return this.static_.length + this.runtime.length;
  }

  /**
   * Replace the static part. Duplicates keep their first position.
   */
  public setStatic(nodes: Iterable<T>): void {
    const seen = new Set<T>();
    const ordered: T[] = [];

    for (const node of nodes) {
      if (!seen.has(node)) {
        seen.add(node);
        ordered.push(node);
      }
    }

    this.static_ = ordered;
    // A runtime child promoted to a static one keeps only its static slot
    this.runtime = this.runtime.filter((node) => !seen.has(node));
  }

  /**
   * Append a runtime dependency.
   *
   * @returns false when the node is already part of the graph
   */
  public addRuntime(node: T): boolean {
    if (this.has(node)) {
      return false;
    }

    this.runtime.push(node);
    return true;
  }

  public has(node: T): boolean {
    return this.static_.includes(node) || this.runtime.includes(node);
  }

  public startOrder(): T[] {
    return [...this.static_, ...this.runtime];
  }

  public stopOrder(): T[] {
    return this.startOrder().reverse();
  }
}
