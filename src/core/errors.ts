export class StepError extends Error {
  public readonly exitCode: number;
  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = "StepError";
    this.exitCode = exitCode;
  }
}

export class InputError extends StepError {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

export class ManifestError extends StepError {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

export class RolloutStepsError extends StepError {
  constructor(message: string) {
    super(message);
    this.name = "RolloutStepsError";
  }
}

export class CredentialsError extends StepError {
  constructor(message: string) {
    super(message);
    this.name = "CredentialsError";
  }
}

export class PlayConsoleError extends StepError {
  public readonly statusCode: number | null;
  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "PlayConsoleError";
    this.statusCode = statusCode;
  }
}

export class WebhookError extends StepError {
  public readonly statusCode: number | null;
  constructor(message: string, statusCode: number | null = null) {
    super(message);
    this.name = "WebhookError";
    this.statusCode = statusCode;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
