import { LOG_TAG } from "./constants.js";
import type { LogLevel, RegistryLogger } from "./types.js";

const NOOP = (): void => {};

/**
 * Console-backed logger. Lines are prefixed with `[ModuleRegistry:<name>]`.
 */
export function createConsoleLogger(registryName: string, level: LogLevel): RegistryLogger {
  const prefix = `[${LOG_TAG}:${registryName}]`;
  return {
    debug: level === "debug" ? (message) => console.debug(`${prefix} ${message}`) : NOOP,
    warn:
      level === "silent"
        ? NOOP
        : (message, error) => {
            if (error === undefined) {
              console.warn(`${prefix} ${message}`);
            } else {
              console.warn(`${prefix} ${message}`, error);
            }
          },
  };
}
