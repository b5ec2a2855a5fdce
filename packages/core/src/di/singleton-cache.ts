import createDebug from "debug";
import type { AbstractType } from "@micro-di/types";

const debug = createDebug("micro-di:core:singletons");

/**
 * Concrete class → its one shared instance. The first write wins; the cache
 * never replaces an instance it already holds.
 */
export class SingletonCache {
  private instances = new Map<AbstractType, unknown>();

  has(type: AbstractType): boolean {
    return this.instances.has(type);
  }

  get<T>(type: AbstractType<T>): T | undefined {
    return this.instances.get(type) as T | undefined;
  }

  set<T>(type: AbstractType<T>, instance: T): void {
    if (this.instances.has(type)) {
      debug("set %s ignored, already cached", type.name);
      return;
    }
    debug("set %s", type.name);
    this.instances.set(type, instance);
  }

  get size(): number {
    return this.instances.size;
  }
}
