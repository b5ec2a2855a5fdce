export const SINGLETON_METADATA = Symbol("micro-di:singleton");
export const ABSTRACT_METADATA = Symbol("micro-di:abstract");
export const INJECT_METADATA = Symbol("micro-di:inject");
export const POST_CONSTRUCT_METADATA = Symbol("micro-di:post-construct");
