import createDebug from "debug";
import type {
  AbstractType,
  InjectionToken,
  InterfaceToken,
  Provider,
  Type,
} from "@micro-di/types";
import { InvalidBindingArgumentException } from "../errors/micro-di-exception";
import { isClass, isConcreteClass, isInterfaceToken, tokenToString } from "./tokens";

const debug = createDebug("micro-di:core:registry");

function describe(value: unknown): string {
  if (isInterfaceToken(value) || isClass(value)) return tokenToString(value);
  return typeof value;
}

/** Configuration-time bindings. Keys are compared by identity; nothing is ever removed. */
export class BindingRegistry {
  private interfaceMappings = new Map<InterfaceToken, Type>();
  private providers = new Map<InjectionToken, Provider>();
  private singletonClasses = new Set<AbstractType>();

  bindInterface<T>(interfaceType: InjectionToken<T>, implementationType: InjectionToken<T>): void {
    if (!isInterfaceToken(interfaceType)) {
      throw new InvalidBindingArgumentException(
        `Expecting the first argument to be an interface token, got ${describe(interfaceType)}.`,
      );
    }
    if (!isClass(implementationType) || !isConcreteClass(implementationType)) {
      throw new InvalidBindingArgumentException(
        `Expecting ${describe(implementationType)} to be a concrete class implementing ` +
          `${interfaceType.description}.`,
      );
    }

    debug("bindInterface %s → %s", interfaceType.description, implementationType.name);
    this.interfaceMappings.set(interfaceType, implementationType);
  }

  bindInstance<T>(type: InjectionToken<T>, instance: T): void {
    debug("bindInstance %s", tokenToString(type));
    this.providers.set(type, () => instance);
  }

  bindProvider<T>(type: InjectionToken<T>, provider: Provider<T>): void {
    debug("bindProvider %s", tokenToString(type));
    this.providers.set(type, provider);
  }

  markSingleton(type: AbstractType): void {
    debug("markSingleton %s", type.name);
    this.singletonClasses.add(type);
  }

  getImplementation<T>(interfaceType: InterfaceToken<T>): Type<T> | undefined {
    return this.interfaceMappings.get(interfaceType) as Type<T> | undefined;
  }

  getProvider<T>(type: InjectionToken<T>): Provider<T> | undefined {
    return this.providers.get(type) as Provider<T> | undefined;
  }

  hasImplementation(interfaceType: InterfaceToken): boolean {
    return this.interfaceMappings.has(interfaceType);
  }

  hasProvider(type: InjectionToken): boolean {
    return this.providers.has(type);
  }

  isForcedSingleton(type: AbstractType): boolean {
    return this.singletonClasses.has(type);
  }
}
