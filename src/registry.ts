/**
 * Strategy registry
 *
 * Registries are filled once at module load and sealed; lookups are the
 * only operation afterwards.
 *
 * @example
 * ```typescript
 * const loaders = new StrategyRegistry<LoaderName, Loader>("Loader")
 *   .register("yaml", yamlLoader)
 *   .seal();
 *
 * const loader = loaders.get("yaml");
 * ```
 */
export class StrategyRegistry<K extends string | number, S> {
  private readonly strategies = new Map<K, S>();
  private sealed = false;

  constructor(private readonly kind: string) {}

  /**
   * Register a strategy under a key
   *
   * @throws Error if the key is taken or the registry is sealed
   */
  register(key: K, strategy: S): this {
    if (this.sealed) {
      throw new Error(`${this.kind} registry is sealed; cannot register '${key}'`);
    }
    if (this.strategies.has(key)) {
      throw new Error(`${this.kind} '${key}' already registered`);
    }
    this.strategies.set(key, strategy);
    return this;
  }

  /**
   * Prevent further registration
   */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get(key: K): S | undefined {
    return this.strategies.get(key);
  }

  has(key: K): boolean {
    return this.strategies.has(key);
  }

  keys(): K[] {
    return [...this.strategies.keys()];
  }

  values(): S[] {
    return [...this.strategies.values()];
  }
}
