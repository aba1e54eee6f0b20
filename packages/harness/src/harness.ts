import { resolve } from "node:path";
import type {
  ChatTurn,
  PersistedIdentity,
  SessionIdentity,
  TurnOutcome,
} from "@threadline/sdk";
import type { AssistantApi } from "./assistant-api.js";
import {
  loadThreadlineConfig,
  resolveConfig,
  type ResolvedConfig,
  type ThreadlineConfig,
} from "./config.js";
import { ConfigurationError } from "./errors.js";
import { createIdentityStore, type IdentityStore } from "./identity-store.js";
import { loadInstructions } from "./instructions.js";
import { createLogger, type Logger } from "./logger.js";
import { OpenAiAssistantApi } from "./openai-assistant-api.js";
import { RunCoordinator } from "./run-coordinator.js";
import { SessionIdentityResolver } from "./session-identity.js";

export interface ChatHarnessOptions {
  workingDir?: string;
  /** Skips reading threadline.config.js. */
  config?: ThreadlineConfig;
  env?: NodeJS.ProcessEnv;
  api?: AssistantApi;
  identityStore?: IdentityStore;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface HarnessState {
  config: ResolvedConfig;
  logger: Logger;
  instructions: string;
  api: AssistantApi;
  store: IdentityStore;
  resolver: SessionIdentityResolver;
}

export class ChatHarness {
  private readonly workingDir: string;
  private readonly options: ChatHarnessOptions;
  private state?: HarnessState;
  private session?: SessionIdentity;
  private readonly turns: ChatTurn[] = [];

  constructor(options: ChatHarnessOptions = {}) {
    this.workingDir = resolve(options.workingDir ?? process.cwd());
    this.options = options;
  }

  async initialize(): Promise<void> {
    const env = this.options.env ?? process.env;
    const fileConfig = this.options.config ?? (await loadThreadlineConfig(this.workingDir));
    const config = resolveConfig(fileConfig, env);
    const logger =
      this.options.logger ??
      createLogger({
        file: resolve(this.workingDir, config.logging.file),
        level: config.logging.level,
      });
    const instructions = await loadInstructions(
      this.workingDir,
      config.assistant.instructionsFile,
      logger,
    );
    const api = this.options.api ?? this.createRemoteApi(env);
    const store =
      this.options.identityStore ??
      createIdentityStore(config.identity, { workingDir: this.workingDir });
    const resolver = new SessionIdentityResolver({
      api,
      store,
      logger,
      profile: {
        name: config.assistant.name,
        instructions,
        model: config.assistant.model,
      },
    });
    this.state = { config, logger, instructions, api, store, resolver };
  }

  private createRemoteApi(env: NodeJS.ProcessEnv): AssistantApi {
    const apiKey = env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError("OPENAI_API_KEY is not set. Add it to .env or the environment.");
    }
    return new OpenAiAssistantApi(apiKey, { baseURL: env.OPENAI_BASE_URL });
  }

  private requireState(): HarnessState {
    if (!this.state) {
      throw new Error("ChatHarness.initialize() must be called first");
    }
    return this.state;
  }

  get config(): ResolvedConfig {
    return this.requireState().config;
  }

  /** Resolves the remote ids once and reuses them for every later turn. */
  async resolveSession(): Promise<SessionIdentity> {
    if (!this.session) {
      this.session = await this.requireState().resolver.resolve();
    }
    return this.session;
  }

  async ask(prompt: string): Promise<TurnOutcome> {
    const { api, config, instructions, logger } = this.requireState();
    const session = await this.resolveSession();
    const coordinator = new RunCoordinator({
      api,
      session,
      instructions,
      logger,
      sleep: this.options.sleep,
      now: this.options.now,
    });
    this.turns.push({ role: "user", content: prompt });
    const outcome = await coordinator.runTurn(prompt, {
      pollIntervalSeconds: config.polling.intervalSeconds,
      requestTimeoutSeconds: config.polling.requestTimeoutSeconds,
      deadlineSeconds: config.polling.deadlineSeconds,
    });
    if (outcome.status === "completed") {
      this.turns.push({ role: "assistant", content: outcome.result.responseText });
    }
    return outcome;
  }

  history(): ChatTurn[] {
    return [...this.turns];
  }

  async cachedIdentity(): Promise<PersistedIdentity> {
    return this.requireState().store.load();
  }

  async resetIdentity(): Promise<void> {
    await this.requireState().resolver.resetIdentity();
    this.session = undefined;
    this.turns.length = 0;
  }
}

/** One line for the UI: the elapsed time on success, the failure kind otherwise. */
export const describeOutcome = (outcome: TurnOutcome): string => {
  switch (outcome.status) {
    case "completed":
      return `Time taken: ${outcome.result.elapsed}`;
    case "submit_failed":
      return `Could not submit your message: ${outcome.error}`;
    case "timeout":
      return `Timed out after ${outcome.waitedSeconds}s waiting for run ${outcome.runId}`;
    case "run_failed":
      return `Run failed remotely (${outcome.runStatus})${outcome.reason ? `: ${outcome.reason}` : ""}`;
    case "poll_failed":
      return outcome.phase === "extract"
        ? `Run ${outcome.runId} completed but its reply could not be read: ${outcome.error}`
        : `Lost contact with run ${outcome.runId}: ${outcome.error}`;
  }
};
