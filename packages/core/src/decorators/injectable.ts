import "reflect-metadata";
import type { InjectionToken } from "@micro-di/types";
import { ABSTRACT_METADATA, INJECT_METADATA, SINGLETON_METADATA } from "../metadata/constants";

export type InjectMetadata = Map<string | symbol, InjectionToken | undefined>;

/** Caches the first instance the container builds for the class. */
export function Singleton(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(SINGLETON_METADATA, true, target);
  };
}

/**
 * Marks a class as non-instantiable. The `abstract` modifier does not survive
 * compilation, so the container relies on this marker to require a provider.
 */
export function Abstract(): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(ABSTRACT_METADATA, true, target);
  };
}

/**
 * Field injection. Without a token, the field's emitted `design:type` is used,
 * which needs `emitDecoratorMetadata` and a class-typed field.
 */
export function Inject(token?: InjectionToken): PropertyDecorator {
  return (target, propertyKey) => {
    const existing: InjectMetadata = Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(propertyKey, token);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}
