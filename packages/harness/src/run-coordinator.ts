import {
  formatElapsed,
  isTerminalFailureStatus,
  type PollOptions,
  type SessionIdentity,
  type TurnOutcome,
} from "@threadline/sdk";
import type { AssistantApi, RemoteRun } from "./assistant-api.js";
import { errorMessage, NoAssistantMessageError, RunStateError } from "./errors.js";
import type { Logger } from "./logger.js";

export type PollOutcome = Exclude<TurnOutcome, { status: "submit_failed" }>;

export const DEFAULT_POLL_INTERVAL_SECONDS = 1;
export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 20;
export const DEFAULT_DEADLINE_SECONDS = 120;

export interface RunCoordinatorOptions {
  api: AssistantApi;
  session: SessionIdentity;
  instructions?: string;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  /** epoch milliseconds */
  now?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Drives one user turn against a remote thread: post the prompt, start a run,
 * then poll the run until it reaches a terminal state or the deadline passes.
 */
export class RunCoordinator {
  private readonly api: AssistantApi;
  private readonly session: SessionIdentity;
  private readonly instructions?: string;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private submitted = false;
  private runId?: string;
  private run?: RemoteRun;

  constructor(options: RunCoordinatorOptions) {
    this.api = options.api;
    this.session = options.session;
    this.instructions = options.instructions;
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get currentRunId(): string | undefined {
    return this.runId;
  }

  async submit(prompt: string): Promise<void> {
    this.submitted = false;
    this.runId = undefined;
    this.run = undefined;
    await this.api.createMessage(this.session.threadId, prompt);
    this.submitted = true;
  }

  async startRun(): Promise<string> {
    if (!this.submitted) {
      throw new RunStateError("startRun() requires a successful submit() first");
    }
    const run = await this.api.createRun(this.session.threadId, {
      assistantId: this.session.assistantId,
      instructions: this.instructions,
    });
    this.submitted = false;
    this.runId = run.id;
    this.run = run;
    return run.id;
  }

  async awaitCompletion(options?: PollOptions): Promise<PollOutcome> {
    const runId = this.runId;
    if (!runId) {
      throw new RunStateError("awaitCompletion() requires startRun() first");
    }
    const intervalMs = (options?.pollIntervalSeconds ?? DEFAULT_POLL_INTERVAL_SECONDS) * 1000;
    const timeoutMs =
      (options?.requestTimeoutSeconds ?? DEFAULT_REQUEST_TIMEOUT_SECONDS) * 1000;
    const deadlineSeconds = options?.deadlineSeconds ?? DEFAULT_DEADLINE_SECONDS;
    const startedAt = this.now();
    const deadlineAt = startedAt + deadlineSeconds * 1000;

    while (true) {
      let run: RemoteRun;
      try {
        run = await this.api.retrieveRun(this.session.threadId, runId, { timeoutMs });
        this.run = run;
      } catch (error) {
        const message = errorMessage(error);
        this.logger.error(`Error occurred while retrieving the Run: ${message}`);
        return { status: "poll_failed", runId, phase: "retrieve", error: message };
      }

      if (run.status === "completed") {
        try {
          const responseText = await this.extractResponse();
          const elapsed = this.extractRuntime();
          return {
            status: "completed",
            result: { runId, responseText, elapsed, elapsedSeconds: this.elapsedSeconds() },
          };
        } catch (error) {
          const message = errorMessage(error);
          this.logger.error(`Error occurred while reading the Run's response: ${message}`);
          return { status: "poll_failed", runId, phase: "extract", error: message };
        }
      }

      const { status, lastError } = run;
      if (isTerminalFailureStatus(status)) {
        this.logger.error(
          `Run ${runId} ended with status "${status}"${lastError ? `: ${lastError}` : ""}`,
        );
        return {
          status: "run_failed",
          runId,
          runStatus: status,
          ...(lastError ? { reason: lastError } : {}),
        };
      }

      if (this.now() + intervalMs > deadlineAt) {
        this.logger.error(`Run ${runId} did not complete within ${deadlineSeconds}s`);
        return {
          status: "timeout",
          runId,
          waitedSeconds: Math.round((this.now() - startedAt) / 1000),
        };
      }

      this.logger.info("Waiting for Run to complete...");
      await this.sleep(intervalMs);
    }
  }

  /** Text of the newest message the run produced. */
  async extractResponse(): Promise<string> {
    const runId = this.runId;
    if (!runId) {
      throw new RunStateError("extractResponse() requires startRun() first");
    }
    const messages = await this.api.listMessages(this.session.threadId, { runId });
    const text = messages[0]?.text;
    if (text === undefined) {
      throw new NoAssistantMessageError(runId);
    }
    return text;
  }

  extractRuntime(): string {
    const elapsed = formatElapsed(0, this.elapsedSeconds());
    this.logger.info(`Run completed in: ${elapsed}`);
    return elapsed;
  }

  private elapsedSeconds(): number {
    if (!this.run) {
      throw new RunStateError("extractRuntime() requires a retrieved run");
    }
    const { createdAt, completedAt } = this.run;
    return Math.max(0, (completedAt ?? createdAt) - createdAt);
  }

  async runTurn(prompt: string, options?: PollOptions): Promise<TurnOutcome> {
    try {
      await this.submit(prompt);
      await this.startRun();
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Could not submit prompt: ${message}`);
      return { status: "submit_failed", error: message };
    }
    return this.awaitCompletion(options);
  }
}
