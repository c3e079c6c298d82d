import type { ModuleRegistryConfig } from "../../types.js";

export class Cat {
  constructor(readonly name: string) {}

  toString(): string {
    return `Cat:${this.name}`;
  }
}

export class Dog {
  constructor(readonly name: string) {}

  speak(): string {
    return `${this.name} says woof`;
  }
}

export class Wolf {
  constructor(readonly name: string) {}

  speak(): string {
    return `${this.name} howls`;
  }
}

export interface ZooModule {
  readonly Dog: typeof Dog;
  readonly Wolf: typeof Wolf;
}

export const QUIET: ModuleRegistryConfig = { logLevel: "silent" };

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
