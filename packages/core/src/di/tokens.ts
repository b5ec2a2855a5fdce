import "reflect-metadata";
import type { AbstractType, InjectionToken, InterfaceToken, Type } from "@micro-di/types";
import { ABSTRACT_METADATA, SINGLETON_METADATA } from "../metadata/constants";

/**
 * Creates the runtime identity for an interface contract.
 *
 * @example
 * ```ts
 * interface Logger { log(msg: string): void }
 * const Logger = createInterfaceToken<Logger>("Logger");
 * container.bindInterface(Logger, ConsoleLogger);
 * ```
 */
export function createInterfaceToken<T>(description: string): InterfaceToken<T> {
  const token: InterfaceToken<T> = { kind: "interface", description };
  return Object.freeze(token);
}

export function isInterfaceToken(value: unknown): value is InterfaceToken {
  return (
    typeof value === "object" &&
    value !== null &&
    "kind" in value &&
    value.kind === "interface" &&
    "description" in value &&
    typeof value.description === "string"
  );
}

export function isClass(value: unknown): value is AbstractType {
  return typeof value === "function";
}

/** Own metadata only: a subclass of an abstract class is concrete unless marked itself. */
export function isConcreteClass<T>(target: AbstractType<T>): target is Type<T> {
  return Reflect.getOwnMetadata(ABSTRACT_METADATA, target) !== true;
}

export function hasSingletonMarker(target: AbstractType): boolean {
  return Reflect.getOwnMetadata(SINGLETON_METADATA, target) === true;
}

export function tokenToString(token: InjectionToken): string {
  if (isInterfaceToken(token)) return token.description;
  return token.name;
}
