import {
  CircularResolutionError,
  DefinitionEvaluationError,
  DuplicateRegistrationError,
  ModuleNotReadyError,
  UnregisteredModuleError,
} from "@lazymod/errors";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { ModuleRegistry } from "../../registry.js";
import type { ModuleDefinition, RegistryLogger } from "../../types.js";
import { Cat, deferred, Dog, QUIET, sleep, Wolf } from "../helpers/zoo.js";

describe("ModuleRegistry", () => {
  let registry: ModuleRegistry;

  beforeEach(() => {
    registry = new ModuleRegistry(QUIET);
  });

  // -------------------------------------------------------------------------
  // Registration
  // -------------------------------------------------------------------------

  describe("register", () => {
    it("creates a registered entry without evaluating it", () => {
      const definition = vi.fn(() => "value");
      registry.register("cat", definition);

      expect(registry.has("cat")).toBe(true);
      expect(registry.getState("cat")).toBe("registered");
      expect(definition).not.toHaveBeenCalled();
    });

    it("reports unknown names as unregistered", () => {
      expect(registry.has("cat")).toBe(false);
      expect(registry.getState("cat")).toBe("unregistered");
    });

    it("ignores re-registration of the same definition", () => {
      const definition = () => "value";
      registry.register("cat", definition);
      registry.register("cat", definition);

      expect(registry.getRegisteredNames()).toEqual(["cat"]);
    });

    it("rejects a different definition under the same name", () => {
      registry.register("cat", () => "first");

      expect(() => registry.register("cat", () => "second")).toThrow(DuplicateRegistrationError);
      expect(registry.importSync("cat")).toBe("first");
    });

    it("rejects a different definition once the module has resolved", () => {
      registry.register("cat", () => "first");
      registry.importSync("cat");

      expect(() => registry.register("cat", () => "second")).toThrow(DuplicateRegistrationError);
    });

    it("lists names in registration order", () => {
      registry.register("zoo", () => ({}));
      registry.register("cat", () => ({}));

      expect(registry.getRegisteredNames()).toEqual(["zoo", "cat"]);
    });
  });

  describe("registerAll", () => {
    it("accepts a record of definitions", () => {
      registry.registerAll({ cat: () => Cat, dog: () => Dog });

      expect(registry.getRegisteredNames()).toEqual(["cat", "dog"]);
      expect(registry.importSync("dog")).toBe(Dog);
    });

    it("accepts an iterable of pairs", () => {
      registry.registerAll(
        new Map<string, ModuleDefinition>([
          ["wolf", () => Wolf],
          ["cat", () => Cat],
        ]),
      );

      expect(registry.getRegisteredNames()).toEqual(["wolf", "cat"]);
    });

    it("stops at the first conflicting entry", () => {
      registry.register("cat", () => Cat);
      const pairs: Array<[string, ModuleDefinition]> = [
        ["dog", () => Dog],
        ["cat", () => Wolf],
        ["wolf", () => Wolf],
      ];

      expect(() => registry.registerAll(pairs)).toThrow(DuplicateRegistrationError);
      expect(registry.getRegisteredNames()).toEqual(["cat", "dog"]);
    });
  });

  describe("unregister", () => {
    it("removes settled modules", () => {
      registry.register("cat", () => Cat);
      registry.importSync("cat");

      expect(registry.unregister("cat")).toBe(true);
      expect(registry.getState("cat")).toBe("unregistered");
      expect(registry.unregister("cat")).toBe(false);
    });

    it("refuses while an async evaluation is pending", async () => {
      const gate = deferred<string>();
      registry.register("zoo", () => gate.promise);
      const handle = registry.importAsync("zoo");

      expect(() => registry.unregister("zoo")).toThrow(ModuleNotReadyError);

      gate.resolve("ready");
      await expect(handle).resolves.toBe("ready");
      expect(registry.unregister("zoo")).toBe(true);
    });

    it("lets the same definition be evaluated again after re-registering", () => {
      const definition = vi.fn(() => new Cat("Bugsy"));
      registry.register("cat", definition);
      const first = registry.importSync("cat");

      registry.unregister("cat");
      registry.register("cat", definition);
      const second = registry.importSync("cat");

      expect(definition).toHaveBeenCalledTimes(2);
      expect(second).not.toBe(first);
    });
  });

  // -------------------------------------------------------------------------
  // importSync
  // -------------------------------------------------------------------------

  describe("importSync", () => {
    it("evaluates once and returns the cached value afterwards", () => {
      let evaluations = 0;
      registry.register("cat", () => {
        evaluations++;
        return new Cat("Bugsy").toString();
      });

      expect(registry.importSync("cat")).toBe("Cat:Bugsy");
      expect(registry.importSync("cat")).toBe("Cat:Bugsy");
      expect(evaluations).toBe(1);
      expect(registry.getState("cat")).toBe("resolved");
    });

    it("returns the identical object on every call", () => {
      registry.register("cat", () => new Cat("Bugsy"));

      const first = registry.importSync<Cat>("cat");
      expect(registry.importSync<Cat>("cat")).toBe(first);
      expect(first.name).toBe("Bugsy");
    });

    it("throws UnregisteredModuleError without evaluating anything", () => {
      const other = vi.fn(() => Cat);
      registry.register("cat", other);

      expect(() => registry.importSync("dog")).toThrow(UnregisteredModuleError);
      expect(other).not.toHaveBeenCalled();
      expect(registry.has("dog")).toBe(false);
    });

    it("wraps definition errors and caches the failure", () => {
      const cause = new Error("bad constructor");
      const definition = vi.fn(() => {
        throw cause;
      });
      registry.register("cat", definition);

      let first: unknown;
      try {
        registry.importSync("cat");
      } catch (error) {
        first = error;
      }

      expect(first).toBeInstanceOf(DefinitionEvaluationError);
      expect(first).toMatchObject({ cause, moduleName: "cat" });
      expect(() => registry.importSync("cat")).toThrow(first as Error);
      expect(definition).toHaveBeenCalledTimes(1);
      expect(registry.getState("cat")).toBe("failed");
    });

    it("detects a definition that imports itself", () => {
      registry.register("self", () => registry.importSync("self"));

      let caught: unknown;
      try {
        registry.importSync("self");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CircularResolutionError);
      expect((caught as CircularResolutionError).chain).toEqual(["self", "self"]);
      expect(registry.getState("self")).toBe("failed");
    });

    it("detects an indirect cycle and fails every module on it", () => {
      registry.register("a", () => registry.importSync("b"));
      registry.register("b", () => registry.importSync("a"));

      let caught: unknown;
      try {
        registry.importSync("a");
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(CircularResolutionError);
      expect((caught as CircularResolutionError).chain).toEqual(["a", "b", "a"]);
      expect(registry.getState("a")).toBe("failed");
      expect(registry.getState("b")).toBe("failed");
      expect(() => registry.importSync("b")).toThrow(caught as Error);
    });

    it("lets a definition import other modules", () => {
      registry.register("dog", () => Dog);
      registry.register("wolf", () => Wolf);
      registry.register("zoo", () => ({
        Dog: registry.importSync<typeof Dog>("dog"),
        Wolf: registry.importSync<typeof Wolf>("wolf"),
      }));

      expect(registry.importSync("zoo")).toEqual({ Dog, Wolf });
      expect(registry.getState("dog")).toBe("resolved");
    });

    it("hands an async definition over to the async path without re-running it", async () => {
      const definition = vi.fn(async () => "lazy value");
      registry.register("lazy", definition);

      expect(() => registry.importSync("lazy")).toThrow(ModuleNotReadyError);
      expect(registry.getState("lazy")).toBe("pending");

      await expect(registry.importAsync("lazy")).resolves.toBe("lazy value");
      expect(registry.importSync("lazy")).toBe("lazy value");
      expect(definition).toHaveBeenCalledTimes(1);
    });

    it("throws ModuleNotReadyError while an async import is in flight", async () => {
      const gate = deferred<string>();
      registry.register("zoo", () => gate.promise);
      const handle = registry.importAsync("zoo");

      expect(() => registry.importSync("zoo")).toThrow(ModuleNotReadyError);

      gate.resolve("zoo value");
      await handle;
      expect(registry.importSync("zoo")).toBe("zoo value");
    });
  });

  // -------------------------------------------------------------------------
  // importAsync
  // -------------------------------------------------------------------------

  describe("importAsync", () => {
    it("shares one evaluation between concurrent callers", async () => {
      let evaluations = 0;
      registry.register("zoo", async () => {
        evaluations++;
        await sleep(10);
        return { Dog, Wolf };
      });

      const handles = [
        registry.importAsync("zoo"),
        registry.importAsync("zoo"),
        registry.importAsync("zoo"),
      ];
      expect(registry.getState("zoo")).toBe("pending");

      const [first, second, third] = await Promise.all(handles);
      expect(first).toEqual({ Dog, Wolf });
      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(evaluations).toBe(1);
    });

    it("resolves immediately from the cache once settled", async () => {
      const definition = vi.fn(async () => new Cat("Bugsy"));
      registry.register("cat", definition);

      const first = await registry.importAsync("cat");
      const second = await registry.importAsync("cat");

      expect(second).toBe(first);
      expect(definition).toHaveBeenCalledTimes(1);
    });

    it("serves values already resolved by importSync", async () => {
      const definition = vi.fn(() => "Cat:Bugsy");
      registry.register("cat", definition);
      registry.importSync("cat");

      await expect(registry.importAsync("cat")).resolves.toBe("Cat:Bugsy");
      expect(definition).toHaveBeenCalledTimes(1);
    });

    it("does not run the definition before the caller's turn ends", async () => {
      const definition = vi.fn(() => "value");
      registry.register("cat", definition);

      const handle = registry.importAsync("cat");
      expect(definition).not.toHaveBeenCalled();
      expect(registry.getState("cat")).toBe("pending");

      await handle;
      expect(definition).toHaveBeenCalledTimes(1);
    });

    it("rejects with UnregisteredModuleError for unknown names", async () => {
      await expect(registry.importAsync("missing")).rejects.toThrow(UnregisteredModuleError);
    });

    it("caches a failure and re-surfaces the identical error", async () => {
      let attempts = 0;
      registry.register("broken", async () => {
        attempts++;
        throw new Error("network error");
      });

      const first = await registry.importAsync("broken").catch((error: unknown) => error);
      const second = await registry.importAsync("broken").catch((error: unknown) => error);

      expect(first).toBeInstanceOf(DefinitionEvaluationError);
      expect((first as DefinitionEvaluationError).cause).toEqual(new Error("network error"));
      expect((first as Error).message).toBe("Module 'broken' failed to evaluate: network error");
      expect(second).toBe(first);
      expect(attempts).toBe(1);
      expect(registry.getState("broken")).toBe("failed");
    });

    it("fails every concurrent caller with the same error", async () => {
      const gate = deferred<never>();
      registry.register("broken", () => gate.promise);

      const handles = [registry.importAsync("broken"), registry.importAsync("broken")].map(
        (handle) => handle.catch((error: unknown) => error),
      );
      gate.reject("offline");
      const [first, second] = await Promise.all(handles);

      expect(first).toBeInstanceOf(DefinitionEvaluationError);
      expect((first as Error).message).toBe("Module 'broken' failed to evaluate: offline");
      expect(second).toBe(first);
    });

    it("surfaces a cached sync failure without re-evaluating", async () => {
      const definition = vi.fn(() => {
        throw new Error("bad constructor");
      });
      registry.register("cat", definition);
      expect(() => registry.importSync("cat")).toThrow(DefinitionEvaluationError);

      await expect(registry.importAsync("cat")).rejects.toThrow(DefinitionEvaluationError);
      expect(definition).toHaveBeenCalledTimes(1);
    });

    it("rejects a definition that awaits its own module", async () => {
      registry.register("loop", async () => {
        await registry.importAsync("loop");
        return "never";
      });

      const error = await registry.importAsync("loop").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircularResolutionError);
      expect((error as CircularResolutionError).chain).toEqual(["loop", "loop"]);
      expect(registry.getState("loop")).toBe("failed");
    });

    it("attaches to a module that started it without waiting for it", async () => {
      registry.register("a", async () => {
        void registry.importAsync("b");
        return "A";
      });
      registry.register("b", async () => `B after ${await registry.importAsync<string>("a")}`);

      await expect(registry.importAsync("a")).resolves.toBe("A");
      await expect(registry.importAsync("b")).resolves.toBe("B after A");
      expect(registry.getState("b")).toBe("resolved");
    });

    it("fails both modules of a mutual wait with one error", async () => {
      registry.register("a", async () => `A with ${await registry.importAsync<string>("b")}`);
      registry.register("b", async () => `B with ${await registry.importAsync<string>("a")}`);

      const error = await registry.importAsync("a").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircularResolutionError);
      expect(error).toMatchObject({ chain: ["b", "a", "b"] });
      await expect(registry.importAsync("b")).rejects.toBe(error);
      expect(registry.getState("a")).toBe("failed");
      expect(registry.getState("b")).toBe("failed");
    });

    it("lets a module wait on one that is still waiting on something else", async () => {
      const gate = deferred<string>();
      registry.register("slow", () => gate.promise);
      registry.register("a", async () => `a:${await registry.importAsync<string>("slow")}`);
      registry.register("b", async () => `b:${await registry.importAsync<string>("a")}`);

      const b = registry.importAsync("b");
      await sleep(5);
      gate.resolve("done");

      await expect(b).resolves.toBe("b:a:done");
    });

    it("settles independent modules in whatever order they finish", async () => {
      const slow = deferred<string>();
      const fast = deferred<string>();
      registry.register("slow", () => slow.promise);
      registry.register("fast", () => fast.promise);
      const order: string[] = [];

      const both = Promise.all([
        registry.importAsync<string>("slow").then((value) => order.push(value)),
        registry.importAsync<string>("fast").then((value) => order.push(value)),
      ]);
      fast.resolve("fast");
      await registry.importAsync("fast");
      slow.resolve("slow");
      await both;

      expect(order).toEqual(["fast", "slow"]);
    });

    it("accepts thenables that are not native promises", async () => {
      registry.register("thenable", () => ({
        then(onFulfilled: (value: string) => void) {
          onFulfilled("from thenable");
        },
      }));

      await expect(registry.importAsync("thenable")).resolves.toBe("from thenable");
    });
  });

  // -------------------------------------------------------------------------
  // Retrying failed modules
  // -------------------------------------------------------------------------

  describe("retry by re-registration", () => {
    it("replaces a failed module with a new definition", async () => {
      registry.register("broken", async () => {
        throw new Error("network error");
      });
      await expect(registry.importAsync("broken")).rejects.toThrow(DefinitionEvaluationError);

      registry.register("broken", async () => "recovered");

      expect(registry.getState("broken")).toBe("registered");
      await expect(registry.importAsync("broken")).resolves.toBe("recovered");
    });

    it("keeps the failure when the same definition is registered again", async () => {
      const definition = vi.fn(async () => {
        throw new Error("network error");
      });
      registry.register("broken", definition);
      await registry.importAsync("broken").catch(() => undefined);

      registry.register("broken", definition);

      expect(registry.getState("broken")).toBe("failed");
      await expect(registry.importAsync("broken")).rejects.toThrow(DefinitionEvaluationError);
      expect(definition).toHaveBeenCalledTimes(1);
    });
  });

  describe("failurePolicy: evict", () => {
    it("returns a failed module to registered so the next import retries", async () => {
      const evicting = new ModuleRegistry({ ...QUIET, failurePolicy: "evict" });
      let attempts = 0;
      evicting.register("flaky", async () => {
        attempts++;
        if (attempts === 1) throw new Error("network error");
        return "loaded";
      });

      await expect(evicting.importAsync("flaky")).rejects.toThrow(DefinitionEvaluationError);
      expect(evicting.getState("flaky")).toBe("registered");

      await expect(evicting.importAsync("flaky")).resolves.toBe("loaded");
      expect(attempts).toBe(2);
    });
  });

  // -------------------------------------------------------------------------
  // Locating definitions
  // -------------------------------------------------------------------------

  describe("locate", () => {
    it("registers a located definition on first import", () => {
      const locate = vi.fn((name: string) => (name === "dog" ? () => Dog : undefined));
      const locating = new ModuleRegistry({ ...QUIET, locate });

      expect(locating.importSync("dog")).toBe(Dog);
      expect(locating.importSync("dog")).toBe(Dog);
      expect(locating.has("dog")).toBe(true);
      expect(locate).toHaveBeenCalledTimes(1);
    });

    it("throws UnregisteredModuleError when nothing is located", async () => {
      const locating = new ModuleRegistry({ ...QUIET, locate: () => undefined });

      expect(() => locating.importSync("cat")).toThrow(UnregisteredModuleError);
      await expect(locating.importAsync("cat")).rejects.toThrow(UnregisteredModuleError);
      expect(locating.has("cat")).toBe(false);
    });

    it("lets locator errors propagate without registering anything", () => {
      const locating = new ModuleRegistry({
        ...QUIET,
        locate: () => {
          throw new Error("manifest unreadable");
        },
      });

      expect(() => locating.importSync("cat")).toThrow("manifest unreadable");
      expect(locating.has("cat")).toBe(false);
    });

    it("is not consulted for registered names", () => {
      const locate = vi.fn(() => () => Wolf);
      const locating = new ModuleRegistry({ ...QUIET, locate });
      locating.register("dog", () => Dog);

      expect(locating.importSync("dog")).toBe(Dog);
      expect(locate).not.toHaveBeenCalled();
    });
  });

  // -------------------------------------------------------------------------
  // importAll
  // -------------------------------------------------------------------------

  describe("importAll", () => {
    it("returns values in argument order", async () => {
      const dog = deferred<typeof Dog>();
      registry.register("dog", () => dog.promise);
      registry.register("wolf", async () => Wolf);

      const all = registry.importAll(["dog", "wolf"]);
      dog.resolve(Dog);

      await expect(all).resolves.toEqual([Dog, Wolf]);
    });

    it("rejects with the first failure", async () => {
      registry.register("dog", async () => Dog);
      registry.register("broken", async () => {
        throw new Error("network error");
      });

      await expect(registry.importAll(["dog", "broken"])).rejects.toThrow(
        "Module 'broken' failed to evaluate: network error",
      );
      await expect(registry.importAsync("dog")).resolves.toBe(Dog);
    });
  });

  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------

  describe("logging", () => {
    function recordingLogger(): RegistryLogger & { lines: string[] } {
      const lines: string[] = [];
      return {
        lines,
        debug: (message) => lines.push(`debug ${message}`),
        warn: (message) => lines.push(`warn ${message}`),
      };
    }

    it("reports lifecycle at debug and failures at warn", async () => {
      const logger = recordingLogger();
      const logged = new ModuleRegistry({ logger });
      logged.register("cat", () => "Cat:Bugsy");
      logged.register("broken", async () => {
        throw new Error("network error");
      });

      logged.importSync("cat");
      await logged.importAsync("broken").catch(() => undefined);

      expect(logger.lines).toEqual([
        "debug Registered module 'cat'",
        "debug Registered module 'broken'",
        "debug Evaluating module 'cat' (sync)",
        "debug Module 'cat' resolved (sync)",
        "debug Evaluating module 'broken' (async)",
        "warn Module 'broken' failed (async)",
      ]);
    });

    it("passes the original error to warn", async () => {
      const warn = vi.fn();
      const logged = new ModuleRegistry({ logger: { debug: () => {}, warn } });
      const cause = new Error("network error");
      logged.register("broken", async () => {
        throw cause;
      });

      await logged.importAsync("broken").catch(() => undefined);

      expect(warn).toHaveBeenCalledWith("Module 'broken' failed (async)", cause);
    });
  });

  describe("logger failures", () => {
    it("still settles an evaluation when the logger throws", async () => {
      const consoleWarn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const logged = new ModuleRegistry({
        logger: {
          debug: () => {
            throw new Error("log sink down");
          },
          warn: () => {},
        },
      });
      logged.register("zoo", async () => ({ Dog, Wolf }));

      expect(() => logged.importSync("zoo")).toThrow(ModuleNotReadyError);
      await expect(logged.importAsync("zoo")).resolves.toEqual({ Dog, Wolf });
      expect(consoleWarn).toHaveBeenCalledWith(
        "[ModuleRegistry:default] Logger failed: Module 'zoo' resolved (sync)",
        expect.any(Error),
      );
      consoleWarn.mockRestore();
    });
  });

  it("exposes the configured name", () => {
    expect(new ModuleRegistry({ ...QUIET, name: "page" }).name).toBe("page");
    expect(registry.name).toBe("default");
  });
});
