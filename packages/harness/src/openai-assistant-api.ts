import OpenAI from "openai";
import type {
  AssistantApi,
  AssistantProfile,
  RemoteAssistant,
  RemoteMessage,
  RemoteRun,
  RemoteThread,
  RequestOptions,
} from "./assistant-api.js";

type AssistantRecord = { id: string; name: string | null; model: string };

type RunRecord = {
  id: string;
  status: string;
  created_at: number;
  completed_at: number | null;
  last_error: { message: string } | null;
};

type MessageRecord = {
  id: string;
  role: "user" | "assistant";
  content: Array<{ type: string; text?: { value: string } }>;
};

export const toRemoteAssistant = (assistant: AssistantRecord): RemoteAssistant => ({
  id: assistant.id,
  name: assistant.name,
  model: assistant.model,
});

export const toRemoteRun = (run: RunRecord): RemoteRun => ({
  id: run.id,
  status: run.status,
  createdAt: run.created_at,
  completedAt: run.completed_at,
  ...(run.last_error ? { lastError: run.last_error.message } : {}),
});

export const toRemoteMessage = (message: MessageRecord): RemoteMessage => {
  const textPart = message.content.find((part) => part.type === "text" && part.text);
  return {
    id: message.id,
    role: message.role,
    ...(textPart?.text ? { text: textPart.text.value } : {}),
  };
};

/** The slice of the OpenAI client the adapter calls. An `OpenAI` instance satisfies it. */
export interface AssistantsClient {
  beta: {
    assistants: {
      retrieve(assistantId: string): Promise<AssistantRecord>;
      create(body: { name: string; instructions: string; model: string }): Promise<AssistantRecord>;
    };
    threads: {
      retrieve(threadId: string): Promise<{ id: string }>;
      create(): Promise<{ id: string }>;
      messages: {
        create(threadId: string, body: { role: "user"; content: string }): Promise<MessageRecord>;
        list(
          threadId: string,
          query: { order: "asc" | "desc"; run_id?: string },
        ): Promise<{ data: MessageRecord[] }>;
      };
      runs: {
        create(
          threadId: string,
          body: { assistant_id: string; instructions?: string },
        ): Promise<RunRecord>;
        retrieve(
          threadId: string,
          runId: string,
          options: { timeout?: number },
        ): Promise<RunRecord>;
      };
    };
  };
}

export interface OpenAiAssistantApiOptions {
  baseURL?: string;
  client?: AssistantsClient;
}

export class OpenAiAssistantApi implements AssistantApi {
  private readonly client: AssistantsClient;

  constructor(apiKey?: string, options?: OpenAiAssistantApiOptions) {
    this.client =
      options?.client ??
      new OpenAI({
        apiKey: apiKey ?? process.env.OPENAI_API_KEY ?? "missing-openai-key",
        baseURL: options?.baseURL,
      });
  }

  async retrieveAssistant(assistantId: string): Promise<RemoteAssistant> {
    return toRemoteAssistant(await this.client.beta.assistants.retrieve(assistantId));
  }

  async createAssistant(profile: AssistantProfile): Promise<RemoteAssistant> {
    const assistant = await this.client.beta.assistants.create({
      name: profile.name,
      instructions: profile.instructions,
      model: profile.model,
    });
    return toRemoteAssistant(assistant);
  }

  async retrieveThread(threadId: string): Promise<RemoteThread> {
    const thread = await this.client.beta.threads.retrieve(threadId);
    return { id: thread.id };
  }

  async createThread(): Promise<RemoteThread> {
    const thread = await this.client.beta.threads.create();
    return { id: thread.id };
  }

  async createMessage(threadId: string, content: string): Promise<RemoteMessage> {
    const message = await this.client.beta.threads.messages.create(threadId, {
      role: "user",
      content,
    });
    return toRemoteMessage(message);
  }

  async createRun(
    threadId: string,
    input: { assistantId: string; instructions?: string },
  ): Promise<RemoteRun> {
    const run = await this.client.beta.threads.runs.create(threadId, {
      assistant_id: input.assistantId,
      instructions: input.instructions,
    });
    return toRemoteRun(run);
  }

  async retrieveRun(
    threadId: string,
    runId: string,
    options?: RequestOptions,
  ): Promise<RemoteRun> {
    const run = await this.client.beta.threads.runs.retrieve(threadId, runId, {
      timeout: options?.timeoutMs,
    });
    return toRemoteRun(run);
  }

  async listMessages(
    threadId: string,
    options?: { runId?: string },
  ): Promise<RemoteMessage[]> {
    const page = await this.client.beta.threads.messages.list(threadId, {
      order: "desc",
      ...(options?.runId ? { run_id: options.runId } : {}),
    });
    return page.data.map(toRemoteMessage);
  }
}
