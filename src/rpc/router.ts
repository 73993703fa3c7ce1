import type { ErasedHandler } from "./handler.js";
import type { Middleware } from "./middleware.js";

/** A registered method: its erased handler and the middlewares wrapping it. */
export interface Route<C> {
  readonly handler: ErasedHandler<C>;
  readonly middlewares: readonly Middleware<C>[];
}

export function createRoute<C>(handler: ErasedHandler<C>, middlewares: readonly Middleware<C>[] = []): Route<C> {
  return Object.freeze({ handler, middlewares: Object.freeze([...middlewares]) });
}

/**
 * Method registry. `insert` replaces any route registered under the same name
 * and returns it so callers can notice the shadowing.
 */
export interface Router<C> {
  get(name: string): Route<C> | undefined;
  insert(name: string, route: Route<C>): Route<C> | undefined;
  names(): string[];
}

export class MapRouter<C> implements Router<C> {
  private readonly routes = new Map<string, Route<C>>();

  get(name: string): Route<C> | undefined {
    return this.routes.get(name);
  }

  insert(name: string, route: Route<C>): Route<C> | undefined {
    const previous = this.routes.get(name);
    this.routes.set(name, route);
    return previous;
  }

  names(): string[] {
    return [...this.routes.keys()];
  }
}
