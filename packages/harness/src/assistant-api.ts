export interface AssistantProfile {
  name: string;
  instructions: string;
  model: string;
}

export interface RemoteAssistant {
  id: string;
  name: string | null;
  model: string;
}

export interface RemoteThread {
  id: string;
}

export interface RemoteRun {
  id: string;
  status: string;
  /** epoch seconds */
  createdAt: number;
  /** epoch seconds, null until the run finishes */
  completedAt: number | null;
  lastError?: string;
}

export interface RemoteMessage {
  id: string;
  role: "user" | "assistant";
  text?: string;
}

export interface RequestOptions {
  timeoutMs?: number;
}

/** The hosted assistants service, reduced to the calls a chat turn needs. */
export interface AssistantApi {
  retrieveAssistant(assistantId: string): Promise<RemoteAssistant>;
  createAssistant(profile: AssistantProfile): Promise<RemoteAssistant>;
  retrieveThread(threadId: string): Promise<RemoteThread>;
  createThread(): Promise<RemoteThread>;
  createMessage(threadId: string, content: string): Promise<RemoteMessage>;
  createRun(
    threadId: string,
    input: { assistantId: string; instructions?: string },
  ): Promise<RemoteRun>;
  retrieveRun(threadId: string, runId: string, options?: RequestOptions): Promise<RemoteRun>;
  /** Newest first. */
  listMessages(threadId: string, options?: { runId?: string }): Promise<RemoteMessage[]>;
}
