export type MicroDiErrorCode =
  | "INVALID_BINDING_ARGUMENT"
  | "MISSING_PROVIDER"
  | "UNRESOLVED_INTERFACE"
  | "PROVIDER_FAILURE"
  | "CONSTRUCTION_FAILURE"
  | "POST_CONSTRUCT_FAILURE"
  | "CYCLIC_DEPENDENCY";

export class MicroDiException extends Error {
  constructor(
    public readonly code: MicroDiErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "MicroDiException";
  }
}

export class InvalidBindingArgumentException extends MicroDiException {
  constructor(message: string) {
    super("INVALID_BINDING_ARGUMENT", message);
    this.name = "InvalidBindingArgumentException";
  }
}

export class MissingProviderException extends MicroDiException {
  constructor(public readonly token: string) {
    super("MISSING_PROVIDER", `Missing provider for abstract class: ${token}`);
    this.name = "MissingProviderException";
  }
}

export class UnresolvedInterfaceException extends MicroDiException {
  constructor(public readonly token: string) {
    super(
      "UNRESOLVED_INTERFACE",
      `No implementation or provider bound for interface: ${token}.\n` +
        "Bind one with bindInterface() or bindProvider() before requesting it.",
    );
    this.name = "UnresolvedInterfaceException";
  }
}

export class ProviderFailureException extends MicroDiException {
  constructor(
    public readonly token: string,
    cause: unknown,
  ) {
    super("PROVIDER_FAILURE", `Provider for ${token} threw: ${describeCause(cause)}`, cause);
    this.name = "ProviderFailureException";
  }
}

export class ConstructionFailureException extends MicroDiException {
  constructor(
    public readonly token: string,
    reason: string,
    cause?: unknown,
  ) {
    super("CONSTRUCTION_FAILURE", `Could not construct ${token}: ${reason}`, cause);
    this.name = "ConstructionFailureException";
  }
}

export class PostConstructFailureException extends MicroDiException {
  constructor(
    public readonly token: string,
    public readonly method: string,
    cause: unknown,
  ) {
    super(
      "POST_CONSTRUCT_FAILURE",
      `Post-construct hook ${token}.${method}() threw: ${describeCause(cause)}`,
      cause,
    );
    this.name = "PostConstructFailureException";
  }
}

export class CyclicDependencyException extends MicroDiException {
  constructor(public readonly path: string[]) {
    super("CYCLIC_DEPENDENCY", `Circular dependency detected: ${path.join(" → ")}`);
    this.name = "CyclicDependencyException";
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
