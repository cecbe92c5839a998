export class PlanError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanError";
  }
}

export class NotAListError extends PlanError {
  constructor(readonly receivedType: string) {
    super(
      `The planner returned an invalid format. Expected a list, but got ${receivedType}.`,
    );
    this.name = "NotAListError";
  }
}

export class EmptyPlanError extends PlanError {
  constructor() {
    super("The planner returned a plan with no valid steps.");
    this.name = "EmptyPlanError";
  }
}

export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export class ExtractionIncompleteError extends ExtractionError {
  constructor(
    readonly capability: string,
    readonly missing: string[],
  ) {
    super(
      `Could not parse a valid ${missing.join(" and ")} from the request for ${capability}. The completion service returned incomplete data.`,
    );
    this.name = "ExtractionIncompleteError";
  }
}

export class InterpolationError extends Error {
  constructor(readonly missingKeys: string[]) {
    super(
      `Message references context values that are not available: ${missingKeys.join(", ")}`,
    );
    this.name = "InterpolationError";
  }
}

export class ProviderError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ProviderError";
  }
}

export class StepTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`Illegal step transition from ${from} to ${to}`);
    this.name = "StepTransitionError";
  }
}
