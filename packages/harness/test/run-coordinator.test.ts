import { describe, expect, it, vi } from "vitest";
import { NoAssistantMessageError, RunStateError } from "../src/errors.js";
import { createLogger } from "../src/logger.js";
import { RunCoordinator } from "../src/run-coordinator.js";
import { FakeAssistantApi } from "./fake-assistant-api.js";

const setup = async (statuses: string[] = ["completed"]) => {
  const api = new FakeAssistantApi();
  api.runStatuses = statuses;
  const assistant = await api.createAssistant({
    name: "Coach",
    instructions: "Keep answers short.",
    model: "test-model",
  });
  const thread = await api.createThread();
  const logger = createLogger({ silent: true });
  const sleep = vi.fn(api.clock.sleep);
  const coordinator = new RunCoordinator({
    api,
    session: { assistantId: assistant.id, threadId: thread.id },
    instructions: "Keep answers short.",
    logger,
    sleep,
    now: api.clock.now,
  });
  return { api, coordinator, logger, sleep };
};

describe("run coordinator", () => {
  it("returns the response once the run completes on the second poll", async () => {
    const { coordinator, sleep } = await setup(["in_progress", "completed"]);

    const outcome = await coordinator.runTurn("Hello", { pollIntervalSeconds: 1 });

    expect(outcome).toEqual({
      status: "completed",
      result: {
        runId: "run_4",
        responseText: "Hi there",
        elapsed: "00:00:01",
        elapsedSeconds: 1,
      },
    });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("sleeps N-1 times at the configured interval when completing on the Nth poll", async () => {
    const { api, coordinator, sleep } = await setup([
      "queued",
      "in_progress",
      "in_progress",
      "completed",
    ]);

    await coordinator.submit("How many push-ups?");
    await coordinator.startRun();
    const outcome = await coordinator.awaitCompletion({ pollIntervalSeconds: 2 });

    expect(outcome.status).toBe("completed");
    expect(api.calls.retrieveRun).toBe(4);
    expect(sleep.mock.calls).toEqual([[2000], [2000], [2000]]);
    expect(outcome.status === "completed" && outcome.result.elapsed).toBe("00:00:06");
  });

  it("sends the per-request timeout with every status fetch", async () => {
    const { api, coordinator } = await setup(["in_progress", "completed"]);

    await coordinator.runTurn("Hello", { requestTimeoutSeconds: 5 });

    expect(api.requestTimeouts).toEqual([5000, 5000]);
  });

  it("maps a remote failure to run_failed with the remote reason", async () => {
    const { api, coordinator, sleep } = await setup(["in_progress", "failed"]);
    api.runLastError = "Rate limit reached";

    const outcome = await coordinator.runTurn("Hello");

    expect(outcome).toEqual({
      status: "run_failed",
      runId: "run_4",
      runStatus: "failed",
      reason: "Rate limit reached",
    });
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("stops polling at cancelled and expired states", async () => {
    const cancelled = await setup(["cancelled"]);
    expect(await cancelled.coordinator.runTurn("Hello")).toEqual({
      status: "run_failed",
      runId: "run_4",
      runStatus: "cancelled",
    });
    expect(cancelled.sleep).not.toHaveBeenCalled();

    const expired = await setup(["queued", "expired"]);
    const outcome = await expired.coordinator.runTurn("Hello");
    expect(outcome.status === "run_failed" && outcome.runStatus).toBe("expired");
  });

  it("gives up with a timeout once the deadline would be passed", async () => {
    const { api, coordinator, sleep } = await setup(["in_progress"]);

    const outcome = await coordinator.runTurn("Hello", {
      pollIntervalSeconds: 1,
      deadlineSeconds: 3,
    });

    expect(outcome).toEqual({ status: "timeout", runId: "run_4", waitedSeconds: 3 });
    expect(api.calls.retrieveRun).toBe(4);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("aborts the loop and logs when a status fetch throws", async () => {
    const { api, coordinator, logger, sleep } = await setup(["in_progress"]);
    const errorSpy = vi.spyOn(logger, "error");
    api.failures.retrieveRun = new Error("socket hang up");

    const outcome = await coordinator.runTurn("Hello");

    expect(outcome).toEqual({
      status: "poll_failed",
      runId: "run_4",
      phase: "retrieve",
      error: "socket hang up",
    });
    expect(api.calls.retrieveRun).toBe(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      "Error occurred while retrieving the Run: socket hang up",
    );
  });

  it("reports a submit failure without starting a run", async () => {
    const { api, coordinator } = await setup();
    api.failures.createMessage = new Error("HTTP 500");

    await expect(coordinator.submit("Hello")).rejects.toThrow("HTTP 500");
    expect(await coordinator.runTurn("Hello")).toEqual({
      status: "submit_failed",
      error: "HTTP 500",
    });
    expect(api.calls.createRun).toBe(0);
  });

  it("refuses to start a run before a message was submitted", async () => {
    const { coordinator } = await setup();

    await expect(coordinator.startRun()).rejects.toBeInstanceOf(RunStateError);
    await expect(coordinator.awaitCompletion()).rejects.toBeInstanceOf(RunStateError);
  });

  it("fails extraction when the run produced no message", async () => {
    const { api, coordinator, logger } = await setup(["completed"]);
    const errorSpy = vi.spyOn(logger, "error");
    api.responseText = undefined;

    await coordinator.submit("Hello");
    await coordinator.startRun();
    await expect(coordinator.extractResponse()).rejects.toBeInstanceOf(NoAssistantMessageError);

    expect(await coordinator.awaitCompletion()).toEqual({
      status: "poll_failed",
      runId: "run_4",
      phase: "extract",
      error: "Run run_4 produced no assistant text",
    });
    expect(errorSpy).toHaveBeenCalledWith(
      "Error occurred while reading the Run's response: Run run_4 produced no assistant text",
    );
  });

  it("reports a failed message listing as an extraction failure", async () => {
    const { api, coordinator } = await setup(["completed"]);
    api.failures.listMessages = new Error("HTTP 502");

    expect(await coordinator.runTurn("Hello")).toEqual({
      status: "poll_failed",
      runId: "run_4",
      phase: "extract",
      error: "HTTP 502",
    });
  });

  it("formats the remote run duration as HH:MM:SS", async () => {
    const { api, coordinator } = await setup();
    api.retrieveRun = async (_threadId, runId) => ({
      id: runId,
      status: "completed",
      createdAt: 0,
      completedAt: 65,
    });

    const outcome = await coordinator.runTurn("Hello");

    expect(outcome.status === "completed" && outcome.result.elapsed).toBe("00:01:05");
    expect(coordinator.extractRuntime()).toBe("00:01:05");
  });

  it("clamps a completion time earlier than the creation time to zero", async () => {
    const { api, coordinator } = await setup();
    api.retrieveRun = async (_threadId, runId) => ({
      id: runId,
      status: "completed",
      createdAt: 1_700_000_200,
      completedAt: 1_700_000_140,
    });

    const outcome = await coordinator.runTurn("Hello");

    expect(outcome).toEqual({
      status: "completed",
      result: {
        runId: "run_4",
        responseText: "Hi there",
        elapsed: "00:00:00",
        elapsedSeconds: 0,
      },
    });
  });
});
