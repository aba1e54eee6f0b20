export type Role = "user" | "assistant";

export interface ChatTurn {
  role: Role;
  content: string;
}

/** Ids as read from a cache; either may be missing before resolution. */
export interface PersistedIdentity {
  assistantId?: string;
  threadId?: string;
}

/** Remote ids for one user session, fixed once resolved. */
export interface SessionIdentity {
  readonly assistantId: string;
  readonly threadId: string;
}

export interface RunRequest {
  prompt: string;
  session: SessionIdentity;
}

export interface RunResult {
  runId: string;
  responseText: string;
  /** HH:MM:SS */
  elapsed: string;
  elapsedSeconds: number;
}

export type RunStatus =
  | "queued"
  | "in_progress"
  | "requires_action"
  | "cancelling"
  | "cancelled"
  | "failed"
  | "completed"
  | "incomplete"
  | "expired";

export type TerminalFailureStatus = Extract<
  RunStatus,
  "failed" | "cancelled" | "expired" | "incomplete" | "requires_action"
>;

export const TERMINAL_FAILURE_STATUSES: readonly TerminalFailureStatus[] = [
  "failed",
  "cancelled",
  "expired",
  "incomplete",
  "requires_action",
];

export const isTerminalFailureStatus = (status: string): status is TerminalFailureStatus =>
  (TERMINAL_FAILURE_STATUSES as readonly string[]).includes(status);

/** Whether the status request itself failed or reading a completed run's reply did. */
export type PollFailurePhase = "retrieve" | "extract";

export type TurnOutcome =
  | { status: "completed"; result: RunResult }
  | { status: "submit_failed"; error: string }
  | { status: "timeout"; runId: string; waitedSeconds: number }
  | { status: "run_failed"; runId: string; runStatus: TerminalFailureStatus; reason?: string }
  | { status: "poll_failed"; runId: string; phase: PollFailurePhase; error: string };

export interface PollOptions {
  pollIntervalSeconds?: number;
  requestTimeoutSeconds?: number;
  deadlineSeconds?: number;
}

const SECONDS_PER_DAY = 24 * 60 * 60;

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Formats the span between two epoch-second timestamps as HH:MM:SS.
 * Negative spans clamp to zero and spans of a day or more wrap.
 */
export const formatElapsed = (createdAt: number, completedAt: number): string => {
  const seconds = Math.max(0, Math.floor(completedAt - createdAt)) % SECONDS_PER_DAY;
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds % 60)}`;
};
