export type {
  Type,
  AbstractType,
  InterfaceToken,
  InjectionToken,
  Provider,
} from "./common";

export type { ContainerOptions, ServiceContainer } from "./container";
