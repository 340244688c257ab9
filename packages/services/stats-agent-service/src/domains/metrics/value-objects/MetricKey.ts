/**
 * MetricKey Value Object
 * Identifies one counter series: a metric name, optionally scoped to a node.
 * Cluster-scoped keys carry an empty entity.
 */

export class MetricKey {
  private constructor(
    private readonly _name: string,
    private readonly _entity: string
  ) {}

  static forCluster(name: string): MetricKey {
    return new MetricKey(name, '');
  }

  static forNode(name: string, nodeIdentifier: string): MetricKey {
    return new MetricKey(name, nodeIdentifier);
  }

  get name(): string {
    return this._name;
  }

  get entity(): string {
    return this._entity;
  }

  get isClusterScoped(): boolean {
    return this._entity === '';
  }

  /**
   * Stable map key. Metric names contain slashes, so a control character
   * separates the components to keep `a/b` + `c` distinct from `a` + `b/c`.
   */
  toString(): string {
    return `${this._name}\u0000${this._entity}`;
  }

  equals(other: MetricKey): boolean {
    return this._name === other._name && this._entity === other._entity;
  }
}
