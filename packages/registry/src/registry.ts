import { AsyncLocalStorage } from "node:async_hooks";
import {
  CircularResolutionError,
  DefinitionEvaluationError,
  DuplicateRegistrationError,
  ModuleNotReadyError,
  UnregisteredModuleError,
} from "@lazymod/errors";
import {
  getEvaluationLatency,
  getModuleEvaluations,
  type SpanAttributes,
  withSpan,
  withSpanSync,
} from "@lazymod/telemetry";
import { resolveRegistryConfig } from "./config.js";
import { EVALUATE_SPAN_NAME, LOG_TAG } from "./constants.js";
import { isIterable, isPromiseLike } from "./type-guards.js";
import type {
  EvaluationOutcome,
  ModuleDefinition,
  ModuleDefinitions,
  ModuleName,
  ModuleRecord,
  ModuleRegistryConfig,
  ModuleStatus,
  ResolutionFailure,
  ResolutionMode,
  ResolvedRegistryConfig,
} from "./types.js";

// ---------------------------------------------------------------------------
// Re-entrancy tracking via AsyncLocalStorage
// ---------------------------------------------------------------------------

interface ResolutionContext {
  /** Modules under evaluation in the current flow, outermost first */
  readonly chain: readonly ModuleName[];
}

// ---------------------------------------------------------------------------
// ModuleRegistry
// ---------------------------------------------------------------------------

/**
 * Registry of named module definitions with at-most-once evaluation.
 *
 * Definitions are registered up front and evaluated on first import.
 * `importSync` evaluates within the caller's turn; `importAsync` lets the
 * definition do asynchronous work and shares one in-flight evaluation
 * between every concurrent caller. Outcomes, including failures, are cached
 * for the lifetime of the registry.
 *
 * @example
 * ```typescript
 * const registry = new ModuleRegistry();
 * registry.register("cat", () => Cat);
 * registry.register("zoo", importModule("./zoo.js"));
 *
 * const CatClass = registry.importSync<typeof Cat>("cat");
 * button.addEventListener("click", async () => {
 *   const zoo = await registry.importAsync<Zoo>("zoo");
 * });
 * ```
 */
export class ModuleRegistry {
  private readonly records = new Map<ModuleName, ModuleRecord>();
  private readonly resolution = new AsyncLocalStorage<ResolutionContext>();
  /** Wait-for edges: module under evaluation -> modules it is awaiting */
  private readonly waits = new Map<ModuleName, Set<ModuleName>>();
  private readonly config: ResolvedRegistryConfig;

  constructor(config?: ModuleRegistryConfig) {
    this.config = resolveRegistryConfig(config);
    if (config?.modules !== undefined) {
      this.registerAll(config.modules);
    }
  }

  /** Registry label from config */
  get name(): string {
    return this.config.name;
  }

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  /**
   * Register a definition under a module name.
   *
   * Registering the same definition again is a no-op. A different
   * definition is only accepted when the existing module has failed, which
   * is how a caller retries a failed module.
   *
   * @throws {DuplicateRegistrationError} If a different definition is already registered
   */
  register(name: ModuleName, definition: ModuleDefinition): void {
    const existing = this.records.get(name);
    if (existing !== undefined) {
      if (existing.definition === definition) return;
      if (existing.state.status !== "failed") {
        throw new DuplicateRegistrationError(name);
      }
      this.log("debug", `Replacing failed module '${name}'`);
    }

    this.records.set(name, { definition, state: { status: "registered" } });
    this.log("debug", `Registered module '${name}'`);
  }

  /**
   * Register several definitions in order. Stops at the first conflict.
   */
  registerAll(definitions: ModuleDefinitions): void {
    const entries = isIterable<readonly [ModuleName, ModuleDefinition]>(definitions)
      ? definitions
      : Object.entries(definitions);
    for (const [name, definition] of entries) {
      this.register(name, definition);
    }
  }

  /**
   * Remove a module so it can be registered afresh.
   *
   * @returns false if nothing was registered under the name
   * @throws {ModuleNotReadyError} While the module is being evaluated
   */
  unregister(name: ModuleName): boolean {
    const record = this.records.get(name);
    if (record === undefined) return false;

    const { status } = record.state;
    if (status === "pending" || status === "evaluating") {
      throw new ModuleNotReadyError(name, "cannot unregister while evaluation is in flight");
    }

    this.records.delete(name);
    this.log("debug", `Unregistered module '${name}'`);
    return true;
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  /**
   * Resolve a module within the current turn.
   *
   * @throws {UnregisteredModuleError} If the name is unknown and cannot be located
   * @throws {CircularResolutionError} If the module's definition requested itself
   * @throws {ModuleNotReadyError} If the module is evaluating asynchronously
   * @throws {DefinitionEvaluationError} If the definition threw, now or earlier
   */
  importSync<T = unknown>(name: ModuleName): T {
    const record = this.lookup(name);
    const state = record.state;

    switch (state.status) {
      case "resolved":
        // Module values are opaque to the registry; the caller names their type.
        return state.value as T;
      case "failed":
        throw state.error;
      case "evaluating":
        throw new CircularResolutionError(name, this.currentChain());
      case "pending":
        if (this.isEvaluating(name)) {
          throw new CircularResolutionError(name, this.currentChain());
        }
        throw new ModuleNotReadyError(name, "evaluation is in flight; use importAsync");
      case "registered":
        return this.evaluateSync(name, record) as T;
    }
  }

  /**
   * Resolve a module, letting its definition suspend.
   *
   * Concurrent calls for a module that is still evaluating attach to the
   * same evaluation and settle with the same value or error.
   *
   * @throws {UnregisteredModuleError} If the name is unknown and cannot be located
   * @throws {CircularResolutionError} If awaiting the module would close a loop of evaluations waiting on each other
   * @throws {DefinitionEvaluationError} If the definition threw or rejected, now or earlier
   */
  async importAsync<T = unknown>(name: ModuleName): Promise<T> {
    const record = this.lookup(name);
    const state = record.state;

    if (state.status === "resolved") {
      return state.value as T;
    }
    if (state.status === "failed") {
      throw state.error;
    }
    if (state.status === "evaluating") {
      // Evaluating modules are always on the current synchronous call stack.
      throw new CircularResolutionError(name, this.currentChain());
    }

    const outcome =
      state.status === "pending" ? state.outcome : this.evaluateAsync(name, record);
    const settled = await this.awaitOutcome(name, outcome);
    if (!settled.ok) {
      throw settled.error;
    }
    return settled.value as T;
  }

  /**
   * Resolve several modules asynchronously, preserving argument order.
   * Rejects with the first failure.
   */
  async importAll<T = unknown>(names: readonly ModuleName[]): Promise<T[]> {
    return Promise.all(names.map((name) => this.importAsync<T>(name)));
  }

  // -------------------------------------------------------------------------
  // Inspection
  // -------------------------------------------------------------------------

  /**
   * Check if a module name is registered
   */
  has(name: ModuleName): boolean {
    return this.records.has(name);
  }

  /**
   * Current resolution status of a module
   */
  getState(name: ModuleName): ModuleStatus {
    return this.records.get(name)?.state.status ?? "unregistered";
  }

  /**
   * Get all registered module names in registration order
   */
  getRegisteredNames(): ModuleName[] {
    return Array.from(this.records.keys());
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private lookup(name: ModuleName): ModuleRecord {
    const existing = this.records.get(name);
    if (existing !== undefined) return existing;

    const located = this.config.locate?.(name);
    if (located === undefined) {
      throw new UnregisteredModuleError(name);
    }

    const record: ModuleRecord = { definition: located, state: { status: "registered" } };
    this.records.set(name, record);
    this.log("debug", `Located module '${name}'`);
    return record;
  }

  private evaluateSync(name: ModuleName, record: ModuleRecord): unknown {
    record.state = { status: "evaluating" };
    const chain = [...this.currentChain(), name];
    const startedAt = performance.now();
    this.log("debug", `Evaluating module '${name}' (sync)`);

    let produced: unknown;
    try {
      produced = this.resolution.run({ chain }, () =>
        withSpanSync(EVALUATE_SPAN_NAME, this.spanAttributes(name, "sync"), record.definition),
      );
    } catch (error) {
      throw this.settleFailure(name, record, error, "sync", startedAt);
    }

    if (isPromiseLike(produced)) {
      // The definition already ran; keep its promise so async callers share it.
      record.state = {
        status: "pending",
        outcome: this.track(name, record, produced, "sync", startedAt),
      };
      throw new ModuleNotReadyError(name, "definition is asynchronous; use importAsync");
    }

    this.settleSuccess(name, record, produced, "sync", startedAt);
    return produced;
  }

  private evaluateAsync(name: ModuleName, record: ModuleRecord): Promise<EvaluationOutcome> {
    const chain = [...this.currentChain(), name];
    const startedAt = performance.now();
    this.log("debug", `Evaluating module '${name}' (async)`);

    // Deferred to a microtask so the record is pending before the definition runs.
    const produced = Promise.resolve().then(() =>
      this.resolution.run({ chain }, () =>
        withSpan(EVALUATE_SPAN_NAME, this.spanAttributes(name, "async"), async () =>
          record.definition(),
        ),
      ),
    );

    const outcome = this.track(name, record, produced, "async", startedAt);
    record.state = { status: "pending", outcome };
    return outcome;
  }

  /**
   * Settle the record when the produced promise does. The returned promise
   * never rejects; failures travel inside the outcome.
   */
  private track(
    name: ModuleName,
    record: ModuleRecord,
    produced: PromiseLike<unknown>,
    mode: ResolutionMode,
    startedAt: number,
  ): Promise<EvaluationOutcome> {
    return Promise.resolve(produced).then(
      (value): EvaluationOutcome => {
        this.settleSuccess(name, record, value, mode, startedAt);
        return { ok: true, value };
      },
      (error: unknown): EvaluationOutcome => ({
        ok: false,
        error: this.settleFailure(name, record, error, mode, startedAt),
      }),
    );
  }

  /**
   * Wait for `target` on behalf of the module whose definition is running,
   * recording the wait-for edge while it lasts. Once pending work has had a
   * turn to settle, a wait that closes a loop of edges fails with
   * CircularResolutionError instead of hanging.
   */
  private async awaitOutcome(
    target: ModuleName,
    outcome: Promise<EvaluationOutcome>,
  ): Promise<EvaluationOutcome> {
    const waiter = this.currentChain().at(-1);
    if (waiter === undefined) return outcome;

    const edges = this.waits.get(waiter) ?? new Set<ModuleName>();
    edges.add(target);
    this.waits.set(waiter, edges);
    try {
      return await Promise.race([outcome, this.detectDeadlock(target, waiter)]);
    } finally {
      this.waits.get(waiter)?.delete(target);
    }
  }

  /** Settles only when waiting on `target` would deadlock `waiter`. */
  private detectDeadlock(target: ModuleName, waiter: ModuleName): Promise<EvaluationOutcome> {
    return new Promise((resolve) => {
      setImmediate(() => {
        if (this.waits.get(waiter)?.has(target) !== true) return;
        const cycle = this.findWaitPath(target, waiter);
        if (cycle !== undefined) {
          resolve({ ok: false, error: new CircularResolutionError(target, cycle) });
        }
      });
    });
  }

  /** Path of wait-for edges from `from` to `to`, both included. */
  private findWaitPath(
    from: ModuleName,
    to: ModuleName,
    visited = new Set<ModuleName>(),
  ): ModuleName[] | undefined {
    if (from === to) return [from];
    visited.add(from);
    for (const next of this.waits.get(from) ?? []) {
      if (visited.has(next)) continue;
      const rest = this.findWaitPath(next, to, visited);
      if (rest !== undefined) return [from, ...rest];
    }
    return undefined;
  }

  private settleSuccess(
    name: ModuleName,
    record: ModuleRecord,
    value: unknown,
    mode: ResolutionMode,
    startedAt: number,
  ): void {
    record.state = { status: "resolved", value };
    this.waits.delete(name);
    this.measure(mode, "resolved", startedAt);
    this.log("debug", `Module '${name}' resolved (${mode})`);
  }

  private settleFailure(
    name: ModuleName,
    record: ModuleRecord,
    error: unknown,
    mode: ResolutionMode,
    startedAt: number,
  ): ResolutionFailure {
    const failure =
      error instanceof CircularResolutionError ? error : new DefinitionEvaluationError(name, error);
    this.waits.delete(name);

    if (this.config.failurePolicy === "evict") {
      record.state = { status: "registered" };
      this.log("warn", `Module '${name}' failed (${mode}); evicted for re-evaluation`, error);
    } else {
      record.state = { status: "failed", error: failure };
      this.log("warn", `Module '${name}' failed (${mode})`, error);
    }

    this.measure(mode, "failed", startedAt);
    return failure;
  }

  /**
   * Report through the configured logger. A throwing logger must not leave
   * settled outcomes rejected, so its error goes to the console instead.
   */
  private log(level: "debug" | "warn", message: string, error?: unknown): void {
    try {
      if (level === "debug") {
        this.config.logger.debug(message);
      } else {
        this.config.logger.warn(message, error);
      }
    } catch (loggerError) {
      console.warn(`[${LOG_TAG}:${this.config.name}] Logger failed: ${message}`, loggerError);
    }
  }

  private measure(mode: ResolutionMode, outcome: "resolved" | "failed", startedAt: number): void {
    const attributes = { mode, outcome, "registry.name": this.config.name };
    getModuleEvaluations().add(1, attributes);
    getEvaluationLatency().record(performance.now() - startedAt, attributes);
  }

  private spanAttributes(name: ModuleName, mode: ResolutionMode): SpanAttributes {
    return { "module.name": name, "module.mode": mode, "registry.name": this.config.name };
  }

  private currentChain(): readonly ModuleName[] {
    return this.resolution.getStore()?.chain ?? [];
  }

  private isEvaluating(name: ModuleName): boolean {
    return this.currentChain().includes(name);
  }
}

/**
 * Create a registry, validating config and registering `config.modules`.
 */
export function createModuleRegistry(config?: ModuleRegistryConfig): ModuleRegistry {
  return new ModuleRegistry(config);
}
