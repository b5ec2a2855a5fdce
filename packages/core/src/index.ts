import "reflect-metadata";

// Decorators
export { Singleton, Abstract, Inject } from "./decorators/injectable";
export { PostConstruct } from "./decorators/lifecycle";

// DI
export { Container } from "./di/container";
export { BindingRegistry } from "./di/binding-registry";
export { SingletonCache } from "./di/singleton-cache";
export { getInjectionManifest } from "./di/injection-manifest";
export { createInterfaceToken, isInterfaceToken, tokenToString } from "./di/tokens";

// Errors
export {
  MicroDiException,
  InvalidBindingArgumentException,
  MissingProviderException,
  UnresolvedInterfaceException,
  ProviderFailureException,
  ConstructionFailureException,
  PostConstructFailureException,
  CyclicDependencyException,
} from "./errors/micro-di-exception";

// Metadata constants
export {
  SINGLETON_METADATA,
  ABSTRACT_METADATA,
  INJECT_METADATA,
  POST_CONSTRUCT_METADATA,
} from "./metadata/constants";

// Re-export key types from @micro-di/types
export type {
  Type,
  AbstractType,
  InterfaceToken,
  InjectionToken,
  Provider,
  ContainerOptions,
  ServiceContainer,
} from "@micro-di/types";

// Re-export types defined in core
export type { InjectMetadata } from "./decorators/injectable";
export type { InjectionManifest, InjectionPoint } from "./di/injection-manifest";
export type { MicroDiErrorCode } from "./errors/micro-di-exception";
