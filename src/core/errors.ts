export type ErrorKind =
  | "SessionUnavailable"
  | "AuthenticationRequired"
  | "ExtractionTimeout"
  | "ExtractionFailed"
  | "NotFound"
  | "WorkflowFailed"
  | "StorageUnavailable"
  | "Validation"
  | "Cancelled"
  | "Config"
  | "Internal";

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, public code: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class SessionUnavailableError extends EngineError {
  readonly kind = "SessionUnavailable" as const;
}

export class AuthenticationRequiredError extends EngineError {
  readonly kind = "AuthenticationRequired" as const;
}

export class ExtractionTimeoutError extends EngineError {
  readonly kind = "ExtractionTimeout" as const;
}

export class ExtractionFailedError extends EngineError {
  readonly kind = "ExtractionFailed" as const;
}

export class NotFoundError extends EngineError {
  readonly kind = "NotFound" as const;
}

export class StorageUnavailableError extends EngineError {
  readonly kind = "StorageUnavailable" as const;
}

export class ValidationError extends EngineError {
  readonly kind = "Validation" as const;
}

export class OperationCancelledError extends EngineError {
  readonly kind = "Cancelled" as const;
}

export class ConfigError extends EngineError {
  readonly kind = "Config" as const;

  constructor(message: string) {
    super(message, "CONFIG_INVALID");
  }
}

/**
 * A write workflow stopped before its postcondition held. `completedSteps`
 * names every step that did run, so the caller can tell how far a partially
 * submitted action got (nothing is rolled back).
 */
export class WorkflowFailedError extends EngineError {
  readonly kind = "WorkflowFailed" as const;

  constructor(
    public readonly workflow: string,
    public readonly stepIndex: number,
    public readonly stepName: string,
    public readonly reason: string,
    public readonly completedSteps: readonly string[],
  ) {
    super(`Workflow "${workflow}" failed at step ${stepIndex} (${stepName}): ${reason}`, "WORKFLOW_STEP_FAILED");
  }
}

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
  code?: string;
  details?: Record<string, unknown>;
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof WorkflowFailedError) {
    return {
      kind: error.kind,
      message: error.message,
      code: error.code,
      details: {
        workflow: error.workflow,
        stepIndex: error.stepIndex,
        stepName: error.stepName,
        reason: error.reason,
        completedSteps: [...error.completedSteps],
      },
    };
  }

  if (error instanceof EngineError) {
    return { kind: error.kind, message: error.message, code: error.code };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: "Internal", message };
}
