/**
 * Error classes for light class construction
 *
 * Two families:
 * - invariant violations: the stub pipeline and the source tree disagree
 *   (fatal for the request, never retried)
 * - usage errors: the caller broke a documented precondition
 */

export type LightClassErrorTag =
  | "InvariantViolation"
  | "LocalDeclaration"
  | "IncorrectOperation";

abstract class LightClassErrorBase extends Error {
  abstract readonly _tag: LightClassErrorTag;
  abstract readonly kind: "invariant" | "usage";

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      kind: this.kind,
      name: this.name,
      message: this.message,
    };
  }
}

export class InvariantViolationError extends LightClassErrorBase {
  readonly _tag = "InvariantViolation" as const;
  readonly kind = "invariant" as const;
  readonly qualifiedName: string | undefined;
  /** Source and stub text needed to diagnose the mismatch */
  readonly context: string | undefined;

  constructor(params: {
    readonly message: string;
    readonly qualifiedName?: string;
    readonly context?: string;
  }) {
    super(
      params.context === undefined
        ? params.message
        : `${params.message}\n${params.context}`
    );
    this.name = "InvariantViolationError";
    this.qualifiedName = params.qualifiedName;
    this.context = params.context;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), qualifiedName: this.qualifiedName };
  }
}

export class LocalDeclarationError extends LightClassErrorBase {
  readonly _tag = "LocalDeclaration" as const;
  readonly kind = "usage" as const;
  readonly declarationText: string;

  constructor(declarationText: string) {
    super(
      `Attempt to build a light class for a local class: ${declarationText}`
    );
    this.name = "LocalDeclarationError";
    this.declarationText = declarationText;
  }
}

export class IncorrectOperationError extends LightClassErrorBase {
  readonly _tag = "IncorrectOperation" as const;
  readonly kind = "usage" as const;

  constructor(operation: string) {
    super(`Cannot ${operation}: light classes are read-only`);
    this.name = "IncorrectOperationError";
  }
}
