import type { ModuleDefinition } from "./types.js";

/**
 * Create an asynchronous definition that dynamically imports an external
 * module and extracts the exported value from its namespace.
 *
 * The registry evaluates the returned definition at most once, so the
 * import and extraction run at most once per registration. Failures
 * propagate unchanged and are wrapped by the registry.
 *
 * @example
 * ```typescript
 * registry.register("zoo", importModule("./zoo.js", (ns) => parseZoo(ns)));
 * ```
 *
 * @param specifier - Module specifier passed to `import()`
 * @param extract - Picks the value out of the module namespace (default: the namespace itself)
 */
export function importModule(specifier: string): ModuleDefinition<unknown>;
export function importModule<T>(
  specifier: string,
  extract: (namespace: unknown) => T,
): ModuleDefinition<T>;
export function importModule<T>(
  specifier: string,
  extract?: (namespace: unknown) => T,
): ModuleDefinition<unknown> {
  return async () => {
    const namespace: unknown = await import(specifier);
    return extract ? extract(namespace) : namespace;
  };
}

/**
 * Create an asynchronous definition that takes a module's `default` export.
 * Throws when the imported module has none.
 */
export function importDefault(specifier: string): ModuleDefinition<unknown> {
  return importModule(specifier, (namespace) => {
    if (
      typeof namespace !== "object" ||
      namespace === null ||
      !("default" in namespace) ||
      namespace.default === undefined
    ) {
      throw new Error(`${specifier} has no default export`);
    }
    return namespace.default;
  });
}
