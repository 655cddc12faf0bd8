/**
 * Hono ContextVariableMap augmentation — compile-time safety for c.set()/c.get().
 *
 * Declares every context variable the middleware stack sets, so handlers can
 * read them without casts.
 */

declare module 'hono' {
  interface ContextVariableMap {
    /** Internal user id resolved by the auth gate. Absent on exempt paths. */
    userId: string;
    /** Unique request identifier (set by request-id middleware). */
    requestId: string;
  }
}

export {};
