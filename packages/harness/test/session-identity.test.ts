import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import {
  FileIdentityStore,
  InMemoryIdentityStore,
  type IdentityStore,
} from "../src/identity-store.js";
import { createLogger } from "../src/logger.js";
import { SessionIdentityResolver } from "../src/session-identity.js";
import { FakeAssistantApi } from "./fake-assistant-api.js";

const profile = {
  name: "Personal Trainer",
  instructions: "You are a personal trainer.",
  model: "gpt-3.5-turbo",
};

const createResolver = (
  api: FakeAssistantApi,
  store: IdentityStore = new InMemoryIdentityStore(),
) => {
  const logger = createLogger({ silent: true });
  const resolver = new SessionIdentityResolver({ api, store, profile, logger });
  return { resolver, store, logger };
};

describe("session identity resolver", () => {
  it("creates one assistant and one thread when nothing is cached", async () => {
    const api = new FakeAssistantApi();
    const { resolver, store } = createResolver(api);

    const identity = await resolver.resolve();

    expect(identity).toEqual({ assistantId: "asst_1", threadId: "thread_2" });
    expect(api.calls.createAssistant).toBe(1);
    expect(api.calls.createThread).toBe(1);
    expect(api.calls.retrieveAssistant).toBe(0);
    expect(api.assistants.get("asst_1")).toEqual(profile);
    expect(await store.load()).toEqual({ assistantId: "asst_1", threadId: "thread_2" });
  });

  it("reuses cached ids that the remote lookup accepts", async () => {
    const api = new FakeAssistantApi();
    const assistant = await api.createAssistant(profile);
    const thread = await api.createThread();
    const store = new InMemoryIdentityStore();
    await store.save({ assistantId: assistant.id, threadId: thread.id });
    const { resolver } = createResolver(api, store);

    const identity = await resolver.resolve();

    expect(identity).toEqual({ assistantId: assistant.id, threadId: thread.id });
    expect(api.calls.createAssistant).toBe(1);
    expect(api.calls.createThread).toBe(1);
    expect(api.calls.retrieveAssistant).toBe(1);
    expect(api.calls.retrieveThread).toBe(1);
  });

  it("replaces only the assistant when its cached id is rejected", async () => {
    const api = new FakeAssistantApi();
    const thread = await api.createThread();
    const store = new InMemoryIdentityStore();
    await store.save({ assistantId: "asst_deleted", threadId: thread.id });
    const { resolver, logger } = createResolver(api, store);
    const errorSpy = vi.spyOn(logger, "error");

    const identity = await resolver.resolve();

    expect(identity).toEqual({ assistantId: "asst_2", threadId: thread.id });
    expect(api.calls.createAssistant).toBe(1);
    expect(api.calls.createThread).toBe(1);
    expect(api.calls.retrieveThread).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(
      "Failed to retrieve Assistant: No assistant found with id 'asst_deleted'.",
    );
    expect(await store.load()).toEqual({ assistantId: "asst_2", threadId: thread.id });
  });

  it("recreates the thread independently of the assistant", async () => {
    const api = new FakeAssistantApi();
    const assistant = await api.createAssistant(profile);
    const store = new InMemoryIdentityStore();
    await store.save({ assistantId: assistant.id, threadId: "thread_gone" });
    const { resolver } = createResolver(api, store);

    const identity = await resolver.resolve();

    expect(identity).toEqual({ assistantId: assistant.id, threadId: "thread_2" });
    expect(api.calls.createAssistant).toBe(1);
    expect(api.calls.createThread).toBe(1);
  });

  it("heals transient lookup errors by recreating", async () => {
    const api = new FakeAssistantApi();
    const assistant = await api.createAssistant(profile);
    const thread = await api.createThread();
    const store = new InMemoryIdentityStore();
    await store.save({ assistantId: assistant.id, threadId: thread.id });
    api.failures.retrieveAssistant = new Error("Connection error.");
    const { resolver } = createResolver(api, store);

    const identity = await resolver.resolve();

    expect(identity.assistantId).toBe("asst_3");
    expect(identity.threadId).toBe(thread.id);
    expect(api.calls.createAssistant).toBe(2);
  });

  it("persists the assistant id before the thread is created", async () => {
    const api = new FakeAssistantApi();
    api.failures.createThread = new Error("HTTP 503");
    const { resolver, store } = createResolver(api);

    await expect(resolver.resolve()).rejects.toThrow("HTTP 503");
    expect(await store.load()).toEqual({ assistantId: "asst_1" });
  });

  it("does not create duplicates when resolve() is called concurrently", async () => {
    const api = new FakeAssistantApi();
    const { resolver } = createResolver(api);

    const [first, second] = await Promise.all([resolver.resolve(), resolver.resolve()]);

    expect(first).toEqual(second);
    expect(api.calls.createAssistant).toBe(1);
    expect(api.calls.createThread).toBe(1);
  });

  it("treats a corrupt cache file as empty and rewrites it", async () => {
    const dir = await mkdtemp(join(tmpdir(), "threadline-identity-"));
    const cacheFile = join(dir, "cache.json");
    await writeFile(cacheFile, "{ not json", "utf8");
    const api = new FakeAssistantApi();
    const { resolver } = createResolver(api, new FileIdentityStore(cacheFile));

    const identity = await resolver.resolve();

    expect(identity).toEqual({ assistantId: "asst_1", threadId: "thread_2" });
    expect(JSON.parse(await readFile(cacheFile, "utf8"))).toEqual({
      assistant_id: "asst_1",
      thread_id: "thread_2",
    });
  });

  it("clears the cache on reset so the next resolve creates fresh entities", async () => {
    const api = new FakeAssistantApi();
    const { resolver, store } = createResolver(api);
    await resolver.resolve();

    await resolver.resetIdentity();

    expect(await store.load()).toEqual({});
    expect(await resolver.resolve()).toEqual({ assistantId: "asst_3", threadId: "thread_4" });
  });
});
