export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class RunStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunStateError";
  }
}

export class NoAssistantMessageError extends Error {
  readonly runId: string;

  constructor(runId: string) {
    super(`Run ${runId} produced no assistant text`);
    this.name = "NoAssistantMessageError";
    this.runId = runId;
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
