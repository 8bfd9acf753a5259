export class StepwiseError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StepwiseError';
  }
}

export class ConfigError extends StepwiseError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

export class PlanLoadError extends StepwiseError {
  constructor(message: string, public readonly path: string, cause?: Error) {
    super(message, 'PLAN_LOAD_ERROR', cause);
    this.name = 'PlanLoadError';
  }
}

export type MutationRejectionReason =
  | 'unknown-task'
  | 'invalid-definition'
  | 'task-in-progress'
  | 'step-in-progress';

export class InvalidMutationError extends StepwiseError {
  constructor(
    message: string,
    public readonly reason: MutationRejectionReason,
    public readonly taskId?: string,
  ) {
    super(message, 'INVALID_MUTATION');
    this.name = 'InvalidMutationError';
  }
}
