import "reflect-metadata";
import type { InjectionToken } from "@micro-di/types";
import { INJECT_METADATA, POST_CONSTRUCT_METADATA } from "../metadata/constants";
import type { InjectMetadata } from "../decorators/injectable";
import { isClass } from "./tokens";
import { InvalidBindingArgumentException } from "../errors/micro-di-exception";

export type InjectionPoint = {
  property: string | symbol;
  token: InjectionToken;
};

export type InjectionManifest = {
  /** Subclass fields first; a property name appears once. */
  fields: InjectionPoint[];
  /** Ancestor hooks first, declaration order within a class. */
  postConstruct: (string | symbol)[];
};

const manifests = new WeakMap<object, InjectionManifest>();

/**
 * Reads the decorator metadata of a prototype and everything above it into
 * a manifest, memoised per prototype.
 *
 * Pure with respect to the container — reads metadata only.
 */
export function getInjectionManifest(prototype: object): InjectionManifest {
  const cached = manifests.get(prototype);
  if (cached) return cached;

  const chain = prototypeChain(prototype);
  const manifest: InjectionManifest = {
    fields: collectFields(chain),
    postConstruct: collectPostConstruct(chain),
  };
  manifests.set(prototype, manifest);
  return manifest;
}

function prototypeChain(prototype: object): object[] {
  const chain: object[] = [];
  let current: object | null = prototype;
  while (current !== null && current !== Object.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

function collectFields(chain: object[]): InjectionPoint[] {
  const seen = new Set<string | symbol>();
  const fields: InjectionPoint[] = [];
  for (const proto of chain) {
    const declared: InjectMetadata | undefined = Reflect.getOwnMetadata(INJECT_METADATA, proto);
    if (!declared) continue;

    for (const [property, explicit] of declared) {
      if (seen.has(property)) continue;
      seen.add(property);
      fields.push({ property, token: explicit ?? designTypeOf(proto, property) });
    }
  }
  return fields;
}

function collectPostConstruct(chain: object[]): (string | symbol)[] {
  const seen = new Set<string | symbol>();
  const hooks: (string | symbol)[] = [];
  for (const proto of [...chain].reverse()) {
    const declared: (string | symbol)[] = Reflect.getOwnMetadata(POST_CONSTRUCT_METADATA, proto) ?? [];
    for (const method of declared) {
      if (seen.has(method)) continue;
      seen.add(method);
      hooks.push(method);
    }
  }
  return hooks;
}

function designTypeOf(proto: object, property: string | symbol): InjectionToken {
  const designType: unknown = Reflect.getMetadata("design:type", proto, property);
  // Interfaces and unions are emitted as Object, which carries no identity.
  if (!isClass(designType) || designType === Object) {
    const owner = typeof proto.constructor === "function" ? proto.constructor.name : "<anonymous>";
    throw new InvalidBindingArgumentException(
      `Cannot determine the type to inject into ${owner}.${String(property)}. ` +
        "Pass a class or interface token to @Inject().",
    );
  }
  return designType;
}
