/**
 * @fileoverview Minimal typed dependency-injection container.
 * Tokens carry their resolved type, so `resolve` needs no casts at call sites.
 * @module src/container/core/container
 */
import { JsonRpcErrorCode, McpError } from '../../types-global/errors.js';

type Factory<T> = (c: Container) => T;

interface Binding<T> {
  factory: Factory<T>;
  singleton: boolean;
  instance?: { value: T };
}

/**
 * Typed key for a container entry. The binding lives on the token itself,
 * which keeps resolution type-safe without a heterogeneous map.
 */
export class Token<T> {
  /** @internal */
  binding: Binding<T> | undefined;
  /** @internal */
  multi: T[] = [];

  constructor(public readonly description: string) {}

  toString(): string {
    return `Token(${this.description})`;
  }
}

export const token = <T>(description: string): Token<T> =>
  new Token<T>(description);

interface Resettable {
  binding: unknown;
  multi: unknown[];
}

export class Container {
  private readonly touched = new Set<Resettable>();

  registerValue<T>(key: Token<T>, value: T): void {
    this.touched.add(key);
    key.binding = { factory: () => value, singleton: true, instance: { value } };
  }

  /** Lazily constructed on first resolve, then cached. */
  registerSingleton<T>(key: Token<T>, factory: Factory<T>): void {
    this.touched.add(key);
    key.binding = { factory, singleton: true };
  }

  /** Constructed on every resolve. */
  registerFactory<T>(key: Token<T>, factory: Factory<T>): void {
    this.touched.add(key);
    key.binding = { factory, singleton: false };
  }

  registerMulti<T>(key: Token<T>, value: T): void {
    this.touched.add(key);
    key.multi.push(value);
  }

  /**
   * @throws {McpError} InitializationFailed when nothing is registered for `key`.
   */
  resolve<T>(key: Token<T>): T {
    const binding = key.binding;
    if (!binding) {
      throw new McpError(
        JsonRpcErrorCode.InitializationFailed,
        `No provider registered for ${key.toString()}`,
      );
    }
    if (binding.instance) {
      return binding.instance.value;
    }
    const value = binding.factory(this);
    if (binding.singleton) {
      binding.instance = { value };
    }
    return value;
  }

  resolveAll<T>(key: Token<T>): T[] {
    return [...key.multi];
  }

  isRegistered<T>(key: Token<T>): boolean {
    return key.binding !== undefined || key.multi.length > 0;
  }

  /** Clears every registration made through this container. Used by tests. */
  reset(): void {
    for (const key of this.touched) {
      key.binding = undefined;
      key.multi = [];
    }
    this.touched.clear();
  }
}

export const container = new Container();
