import "reflect-metadata";
import createDebug from "debug";
import type { Debugger } from "debug";
import type {
  AbstractType,
  ContainerOptions,
  InjectionToken,
  InterfaceToken,
  Provider,
  ServiceContainer,
  Type,
} from "@micro-di/types";
import {
  ConstructionFailureException,
  CyclicDependencyException,
  MissingProviderException,
  PostConstructFailureException,
  ProviderFailureException,
  UnresolvedInterfaceException,
} from "../errors/micro-di-exception";
import { BindingRegistry } from "./binding-registry";
import { getInjectionManifest } from "./injection-manifest";
import type { InjectionManifest } from "./injection-manifest";
import { SingletonCache } from "./singleton-cache";
import { hasSingletonMarker, isConcreteClass, isInterfaceToken, tokenToString } from "./tokens";

const rootDebug = createDebug("micro-di:core:di");

export class Container implements ServiceContainer {
  private registry = new BindingRegistry();
  private singletons = new SingletonCache();
  private resolving: AbstractType[] = [];
  private debug: Debugger;

  constructor(options: ContainerOptions = {}) {
    this.debug = options.name ? rootDebug.extend(options.name) : rootDebug;
    for (const type of options.singletons ?? []) {
      this.registry.markSingleton(type);
    }
  }

  bindInterface<T>(interfaceType: InjectionToken<T>, implementationType: InjectionToken<T>): void {
    this.registry.bindInterface(interfaceType, implementationType);
  }

  bindInstance<T>(type: InjectionToken<T>, instance: T): void {
    this.registry.bindInstance(type, instance);
  }

  bindProvider<T>(type: InjectionToken<T>, provider: Provider<T>): void {
    this.registry.bindProvider(type, provider);
  }

  markSingleton(type: AbstractType): void {
    this.registry.markSingleton(type);
  }

  isSingleton(type: AbstractType): boolean {
    return hasSingletonMarker(type) || this.registry.isForcedSingleton(type);
  }

  has(token: InjectionToken): boolean {
    if (isInterfaceToken(token)) {
      return this.registry.hasImplementation(token) || this.registry.hasProvider(token);
    }
    return this.registry.hasProvider(token) || this.singletons.has(token);
  }

  /** Tokens the class declares for field injection, subclass fields first. */
  getDependencies(type: AbstractType): InjectionToken[] {
    return getInjectionManifest(type.prototype).fields.map((field) => field.token);
  }

  getInstance<T>(requestedType: InjectionToken<T>): T {
    if (isInterfaceToken(requestedType)) {
      return this.resolveInterface(requestedType);
    }

    if (!isConcreteClass(requestedType)) {
      const provider = this.registry.getProvider(requestedType);
      if (!provider) {
        throw new MissingProviderException(requestedType.name);
      }
      this.debug("resolve %s → provider (abstract)", requestedType.name);
      return this.invokeProvider(requestedType, provider);
    }

    return this.resolveConcrete(requestedType);
  }

  /**
   * Populates the `@Inject()` fields of an object built outside the
   * container. Post-construct hooks are not invoked.
   */
  inject(instance: object): void {
    const prototype: object | null = Object.getPrototypeOf(instance);
    // Null-prototype objects carry no decorator metadata.
    if (prototype === null) return;
    this.injectFields(instance, getInjectionManifest(prototype));
  }

  private injectFields<T>(instance: T, manifest: InjectionManifest): void {
    for (const { property, token } of manifest.fields) {
      const value = this.getInstance(token);
      // defineProperty skips setters and ignores `readonly`.
      Object.defineProperty(instance, property, {
        value,
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
  }

  private resolveInterface<T>(interfaceType: InterfaceToken<T>): T {
    const implementation = this.registry.getImplementation(interfaceType);
    if (implementation) {
      this.debug("resolve %s → %s", interfaceType.description, implementation.name);
      return this.resolveConcrete(implementation);
    }

    const provider = this.registry.getProvider(interfaceType);
    if (provider) {
      this.debug("resolve %s → provider (interface)", interfaceType.description);
      return this.invokeProvider(interfaceType, provider);
    }

    throw new UnresolvedInterfaceException(interfaceType.description);
  }

  private resolveConcrete<T>(type: Type<T>): T {
    if (this.singletons.has(type)) {
      this.debug("resolve %s → cached", type.name);
      return this.singletons.get(type) as T;
    }

    const provider = this.registry.getProvider(type);
    if (provider) {
      this.debug("resolve %s → provider", type.name);
      const instance = this.invokeProvider(type, provider);
      if (this.isSingleton(type)) {
        this.singletons.set(type, instance);
      }
      return instance;
    }

    this.assertNoTransientCycle(type);

    this.debug("resolve %s → constructing", type.name);
    this.resolving.push(type);
    try {
      return this.createNewInstance(type);
    } finally {
      this.resolving.pop();
    }
  }

  /**
   * A cycle through a singleton ends once that singleton is cached, so only a
   * cycle made entirely of transient classes is an error.
   */
  private assertNoTransientCycle(type: AbstractType): void {
    const start = this.resolving.indexOf(type);
    if (start === -1) return;

    const cycle = this.resolving.slice(start);
    if (cycle.some((member) => this.isSingleton(member))) return;

    throw new CyclicDependencyException([...this.resolving, type].map(tokenToString));
  }

  private invokeProvider<T>(token: InjectionToken<T>, provider: Provider<T>): T {
    try {
      return provider();
    } catch (error) {
      throw new ProviderFailureException(tokenToString(token), error);
    }
  }

  /**
   * Zero-argument construction, then singleton registration, field injection
   * and post-construct hooks, in that order. Registering the singleton before
   * injection lets a singleton reached again through its own fields resolve
   * to the half-built instance.
   */
  private createNewInstance<T>(type: Type<T>): T {
    let instance: T;
    try {
      instance = new type();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConstructionFailureException(type.name, reason, error);
    }

    if (this.isSingleton(type)) {
      this.singletons.set(type, instance);
    }

    const manifest = getInjectionManifest(type.prototype);
    this.debug(
      "construct %s fields=[%s]",
      type.name,
      manifest.fields.map((field) => String(field.property)).join(", "),
    );
    this.injectFields(instance, manifest);

    for (const method of manifest.postConstruct) {
      const hook: unknown = Reflect.get(Object(instance), method);
      if (typeof hook !== "function") continue;
      this.debug("postConstruct %s.%s()", type.name, String(method));
      try {
        Reflect.apply(hook, instance, []);
      } catch (error) {
        throw new PostConstructFailureException(type.name, String(method), error);
      }
    }

    return instance;
  }
}
