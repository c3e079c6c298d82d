import { RegistryConfigurationError } from "@lazymod/errors";
import { z } from "zod";
import { DEFAULT_FAILURE_POLICY, DEFAULT_LOG_LEVEL, DEFAULT_REGISTRY_NAME } from "./constants.js";
import { createConsoleLogger } from "./logger.js";
import type { ModuleRegistryConfig, ResolvedRegistryConfig } from "./types.js";

const isFunction = (value: unknown): boolean => typeof value === "function";

const LoggerSchema = z.object({
  debug: z.custom<(message: string) => void>(isFunction, { message: "Expected a function" }),
  warn: z.custom<(message: string, error?: unknown) => void>(isFunction, {
    message: "Expected a function",
  }),
});

const ModulesSchema = z.custom<NonNullable<ModuleRegistryConfig["modules"]>>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    (Symbol.iterator in value ||
      Object.values(value).every((definition) => typeof definition === "function")),
  { message: "Expected a record of module definitions or an iterable of [name, definition] pairs" },
);

const ModuleRegistryConfigSchema = z
  .object({
    name: z.string().min(1).optional(),
    failurePolicy: z.enum(["cache", "evict"]).optional(),
    logLevel: z.enum(["silent", "warn", "debug"]).optional(),
    logger: LoggerSchema.optional(),
    locate: z.custom<NonNullable<ModuleRegistryConfig["locate"]>>(isFunction, {
      message: "Expected a function",
    }).optional(),
    modules: ModulesSchema.optional(),
  })
  .strict();

/**
 * Validate registry options and fill in defaults.
 * Throws RegistryConfigurationError listing every issue on failure.
 */
export function resolveRegistryConfig(config: ModuleRegistryConfig = {}): ResolvedRegistryConfig {
  const result = ModuleRegistryConfigSchema.safeParse(config);
  if (!result.success) {
    throw new RegistryConfigurationError(
      result.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`),
    );
  }

  const name = config.name ?? DEFAULT_REGISTRY_NAME;
  return {
    name,
    failurePolicy: config.failurePolicy ?? DEFAULT_FAILURE_POLICY,
    logger: config.logger ?? createConsoleLogger(name, config.logLevel ?? DEFAULT_LOG_LEVEL),
    locate: config.locate,
  };
}
