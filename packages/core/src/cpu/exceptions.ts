export type InvariantCode = 'DoubleSave' | 'EmptyRestore' | 'DuplicateAdmission' | 'QueueOrder' | 'InvalidState';

export type CollaboratorCode = 'RandomExhausted' | 'SinkFailed' | 'ReportWriteFailed';

// Raised when the scheduler breaks its own state machine. Never caught by the core.
export class InvariantViolation extends Error {
  constructor(public readonly code: InvariantCode, detail: string) {
    super(`${code}: ${detail}`);
    this.name = 'InvariantViolation';
  }
}

// A random source, event sink or report writer failed. Scheduler state is left intact.
export class CollaboratorError extends Error {
  constructor(public readonly code: CollaboratorCode, detail: string, options?: { cause?: unknown }) {
    super(`${code}: ${detail}`, options);
    this.name = 'CollaboratorError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
