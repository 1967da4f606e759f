/**
 * Error codes raised by the entity/component store.
 */
export type StoreErrorCode =
  | "UNKNOWN_ENTITY"
  | "DEPENDENCY_MISSING"
  | "DEPENDENCY_VIOLATION";

/**
 * Synchronous, caller-visible failure of a store mutation. The store is
 * left unchanged whenever one of these is thrown.
 *
 * @example
 * ```typescript
 * try {
 *   world.addComponent(entity, CombatState, { hp: 10, mp: 0 });
 * } catch (error) {
 *   if (StoreError.isStoreError(error) && error.code === "DEPENDENCY_MISSING") {
 *     world.addComponent(entity, Stats, defaultStats());
 *   }
 * }
 * ```
 */
export class StoreError extends Error {
  readonly name = "StoreError";

  constructor(
    public readonly code: StoreErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StoreError);
    }
  }

  static unknownEntity(entity: number, operation: string): StoreError {
    return new StoreError(
      "UNKNOWN_ENTITY",
      `Cannot ${operation}: entity ${entity} is not active`,
      { entity, operation },
    );
  }

  static dependencyMissing(
    entity: number,
    component: string,
    missing: string,
  ): StoreError {
    return new StoreError(
      "DEPENDENCY_MISSING",
      `Cannot add ${component} to entity ${entity}: requires ${missing}`,
      { entity, component, missing },
    );
  }

  static dependencyViolation(
    entity: number,
    component: string,
    dependents: readonly string[],
  ): StoreError {
    return new StoreError(
      "DEPENDENCY_VIOLATION",
      `Cannot remove ${component} from entity ${entity}: required by ${dependents.join(", ")}`,
      { entity, component, dependents: [...dependents] },
    );
  }

  static isStoreError(error: unknown): error is StoreError {
    return error instanceof StoreError;
  }

  toJSON(): {
    name: string;
    code: StoreErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Raised when the game loop is asked for a transition its current state
 * does not allow (start while running, stop while stopped).
 */
export class LoopStateError extends Error {
  readonly name = "LoopStateError";

  constructor(
    public readonly state: string,
    public readonly operation: "start" | "stop",
  ) {
    super(`Cannot ${operation} game loop in state "${state}"`);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoopStateError);
    }
  }
}
