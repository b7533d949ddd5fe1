/**
 * @fileoverview Minimal typed dependency-injection container.
 * A `Token<T>` carries the type of the value it resolves to, so resolution
 * needs no casts. Singletons are built lazily on first resolve.
 * @module src/container/core/container
 */

import { AppError, ErrorCode } from '../../types-global/errors.js';

export interface Token<T> {
  readonly description: string;
  /** Phantom field; never set at runtime. */
  readonly __type?: T;
}

export const token = <T>(description: string): Token<T> => ({ description });

type Factory<T> = (c: Container) => T;

type Registration<T> =
  | { kind: 'value'; value: T }
  | { kind: 'singleton'; factory: Factory<T>; cache?: { instance: T } };

export class Container {
  private readonly registrations = new Map<Token<unknown>, Registration<unknown>>();

  registerValue<T>(key: Token<T>, value: T): void {
    this.registrations.set(key, { kind: 'value', value });
  }

  registerSingleton<T>(key: Token<T>, factory: Factory<T>): void {
    this.registrations.set(key, { kind: 'singleton', factory });
  }

  has(key: Token<unknown>): boolean {
    return this.registrations.has(key);
  }

  resolve<T>(key: Token<T>): T {
    const registration = this.registrations.get(key) as
      | Registration<T>
      | undefined;
    if (!registration) {
      throw new AppError(
        ErrorCode.InternalError,
        `No provider registered for token '${key.description}'.`,
      );
    }
    if (registration.kind === 'value') {
      return registration.value;
    }
    registration.cache ??= { instance: registration.factory(this) };
    return registration.cache.instance;
  }

  /** Drops every registration. Used by tests to start from a clean slate. */
  reset(): void {
    this.registrations.clear();
  }
}

export const container = new Container();
