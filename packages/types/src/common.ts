// Constructor type for DI — uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// The container only ever calls the zero-argument form.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Abstract classes are not assignable to `Type`, concrete classes are
// assignable to this.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractType<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Runtime stand-in for an interface contract. Interfaces are erased by the
 * compiler, so each contract gets a token object compared by identity.
 */
export interface InterfaceToken<T = unknown> {
  readonly kind: "interface";
  readonly description: string;
  /** Phantom type carrier, never set at runtime. */
  readonly __type?: T;
}

// Token for dependency injection — a class (concrete or abstract) or an interface token
export type InjectionToken<T = unknown> = AbstractType<T> | InterfaceToken<T>;

// Zero-argument factory registered for a token
export type Provider<T = unknown> = () => T;
