import type { AbstractType, InjectionToken, Provider } from "./common";

export type ContainerOptions = {
  /** Classes forced into singleton scope regardless of `@Singleton()`. */
  singletons?: AbstractType[];
  /** Label for debug output. */
  name?: string;
};

/** Public call surface of a container. */
export interface ServiceContainer {
  /**
   * Both arguments are checked at bind time: the first must be an interface
   * token, the second a concrete class.
   */
  bindInterface<T>(interfaceType: InjectionToken<T>, implementationType: InjectionToken<T>): void;
  bindInstance<T>(type: InjectionToken<T>, instance: T): void;
  bindProvider<T>(type: InjectionToken<T>, provider: Provider<T>): void;
  markSingleton(type: AbstractType): void;
  getInstance<T>(type: InjectionToken<T>): T;
  inject(instance: object): void;
  has(token: InjectionToken): boolean;
  isSingleton(type: AbstractType): boolean;
  getDependencies(type: AbstractType): InjectionToken[];
}
