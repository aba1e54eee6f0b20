import { resolve } from "node:path";
import { createInterface } from "node:readline/promises";
import {
  ChatHarness,
  createIdentityStore,
  describeOutcome,
  loadThreadlineConfig,
  resolveConfig,
  type IdentityStore,
} from "@threadline/harness";
import type { TurnOutcome } from "@threadline/sdk";
import { Command } from "commander";
import dotenv from "dotenv";

export interface CliIo {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  errorOutput?: NodeJS.WritableStream;
}

const CHAT_PROMPT = "Ask me anything: ";

const loadEnvironment = (workingDir: string): void => {
  dotenv.config({ path: resolve(workingDir, ".env") });
};

const writeOutcome = (outcome: TurnOutcome, io: CliIo): void => {
  const output = io.output ?? process.stdout;
  const errorOutput = io.errorOutput ?? process.stderr;
  if (outcome.status === "completed") {
    output.write(`${outcome.result.responseText}\n${describeOutcome(outcome)}\n`);
    return;
  }
  errorOutput.write(`${describeOutcome(outcome)}\n`);
};

const createHarness = async (workingDir: string): Promise<ChatHarness> => {
  loadEnvironment(workingDir);
  const harness = new ChatHarness({ workingDir });
  await harness.initialize();
  return harness;
};

const MEMORY_PROVIDER_NOTE =
  "Note: identity.provider is \"memory\"; ids are not kept between runs.\n";

const openIdentityStore = async (
  workingDir: string,
  io: CliIo,
): Promise<IdentityStore> => {
  loadEnvironment(workingDir);
  const config = resolveConfig(await loadThreadlineConfig(workingDir));
  if (config.identity.provider === "memory") {
    (io.errorOutput ?? process.stderr).write(MEMORY_PROVIDER_NOTE);
  }
  return createIdentityStore(config.identity, { workingDir });
};

export const runOnce = async (
  prompt: string,
  options: { json: boolean; workingDir?: string } & CliIo,
): Promise<TurnOutcome> => {
  const harness = await createHarness(options.workingDir ?? process.cwd());
  const outcome = await harness.ask(prompt);
  if (options.json) {
    (options.output ?? process.stdout).write(`${JSON.stringify(outcome, null, 2)}\n`);
  } else {
    writeOutcome(outcome, options);
  }
  if (outcome.status !== "completed") {
    process.exitCode = 1;
  }
  return outcome;
};

/** One turn at a time until /exit or end of input. `/reset` starts a new assistant and thread. */
export const runInteractive = async (workingDir: string, io: CliIo = {}): Promise<void> => {
  const harness = await createHarness(workingDir);
  const output = io.output ?? process.stdout;
  const rl = createInterface({
    input: io.input ?? process.stdin,
    output: io.output ?? process.stdout,
    terminal: false,
  });
  const closed = new AbortController();
  rl.once("close", () => closed.abort());

  try {
    while (!closed.signal.aborted) {
      let line: string;
      try {
        line = await rl.question(CHAT_PROMPT, { signal: closed.signal });
      } catch (error) {
        if (closed.signal.aborted) {
          break;
        }
        throw error;
      }
      const prompt = line.trim();
      if (prompt === "/exit") {
        break;
      }
      if (prompt === "/reset") {
        await harness.resetIdentity();
        output.write("Started a new conversation.\n");
        continue;
      }
      if (prompt.length === 0) {
        continue;
      }
      writeOutcome(await harness.ask(prompt), { ...io, output });
    }
  } finally {
    rl.close();
  }
};

export const showIdentity = async (workingDir: string, io: CliIo = {}): Promise<void> => {
  const store = await openIdentityStore(workingDir, io);
  const identity = await store.load();
  (io.output ?? process.stdout).write(
    `assistant_id: ${identity.assistantId ?? "(none)"}\nthread_id: ${identity.threadId ?? "(none)"}\n`,
  );
};

export const resetIdentity = async (workingDir: string, io: CliIo = {}): Promise<void> => {
  const store = await openIdentityStore(workingDir, io);
  await store.clear();
  (io.output ?? process.stdout).write("Cleared cached assistant and thread ids.\n");
};

const workingDirOf = (command: Command): string => {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  return cwd ? resolve(cwd) : process.cwd();
};

export const buildCli = (): Command => {
  const program = new Command();
  program
    .name("threadline")
    .description("Chat with a hosted assistant from the terminal")
    .version("0.1.0")
    .option("--cwd <dir>", "working directory holding .env, instructions and caches");

  program
    .command("ask")
    .argument("<prompt>", "message to send")
    .option("--json", "print the turn outcome as json", false)
    .description("Send one message and print the reply")
    .action(async (prompt: string, options: { json: boolean }, command: Command) => {
      await runOnce(prompt, { json: options.json, workingDir: workingDirOf(command) });
    });

  program
    .command("chat")
    .description("Start an interactive conversation")
    .action(async (_options: unknown, command: Command) => {
      await runInteractive(workingDirOf(command));
    });

  const identityCommand = program
    .command("identity")
    .description("Inspect or clear the cached assistant and thread ids");
  identityCommand
    .command("show")
    .description("Print the cached ids")
    .action(async (_options: unknown, command: Command) => {
      await showIdentity(workingDirOf(command));
    });
  identityCommand
    .command("reset")
    .description("Forget the cached ids so the next turn creates new ones")
    .action(async (_options: unknown, command: Command) => {
      await resetIdentity(workingDirOf(command));
    });

  return program;
};

export const main = async (argv: string[] = process.argv): Promise<void> => {
  try {
    await buildCli().parseAsync(argv);
  } catch (error) {
    process.stderr.write(`${error instanceof Error ? error.message : "Unknown CLI error"}\n`);
    process.exitCode = 1;
  }
};
