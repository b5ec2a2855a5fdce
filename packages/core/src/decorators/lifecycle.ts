import "reflect-metadata";
import { POST_CONSTRUCT_METADATA } from "../metadata/constants";

export function PostConstruct(): MethodDecorator {
  return (target, propertyKey) => {
    const existing: (string | symbol)[] =
      Reflect.getOwnMetadata(POST_CONSTRUCT_METADATA, target) ?? [];
    Reflect.defineMetadata(POST_CONSTRUCT_METADATA, [...existing, propertyKey], target);
  };
}
