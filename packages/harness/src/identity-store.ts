import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import type { PersistedIdentity } from "@threadline/sdk";
import { z } from "zod";

export interface IdentityStore {
  load(): Promise<PersistedIdentity>;
  save(identity: PersistedIdentity): Promise<void>;
  clear(): Promise<void>;
}

export type IdentityProviderName = "local" | "memory";

export interface IdentityStoreConfig {
  provider?: IdentityProviderName;
  cacheFile?: string;
  /** Scopes the memory provider to one UI session. */
  sessionKey?: string;
}

export const DEFAULT_CACHE_FILE = "temp/cache.json";
const DEFAULT_SESSION_KEY = "default";

const cacheFileSchema = z.object({
  assistant_id: z.string().min(1).nullish(),
  thread_id: z.string().min(1).nullish(),
});

type CacheFile = z.infer<typeof cacheFileSchema>;

const writeJsonAtomic = async (filePath: string, payload: unknown): Promise<void> => {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, JSON.stringify(payload, null, 2), "utf8");
  await rename(tmpPath, filePath);
};

const fromCacheFile = (parsed: CacheFile): PersistedIdentity => ({
  ...(parsed.assistant_id ? { assistantId: parsed.assistant_id } : {}),
  ...(parsed.thread_id ? { threadId: parsed.thread_id } : {}),
});

export const parseCacheFile = (raw: string): PersistedIdentity => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return {};
  }
  const parsed = cacheFileSchema.safeParse(json);
  return parsed.success ? fromCacheFile(parsed.data) : {};
};

export class FileIdentityStore implements IdentityStore {
  readonly filePath: string;
  private writing = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  async load(): Promise<PersistedIdentity> {
    try {
      return parseCacheFile(await readFile(this.filePath, "utf8"));
    } catch {
      // Missing file reads as an empty cache.
      return {};
    }
  }

  async save(identity: PersistedIdentity): Promise<void> {
    const payload: CacheFile = {
      assistant_id: identity.assistantId ?? null,
      thread_id: identity.threadId ?? null,
    };
    const write = this.writing.then(() => writeJsonAtomic(this.filePath, payload));
    this.writing = write.catch(() => undefined);
    await write;
  }

  async clear(): Promise<void> {
    await this.writing;
    await rm(this.filePath, { force: true });
  }
}

export class InMemoryIdentityStore implements IdentityStore {
  private readonly sessions: Map<string, PersistedIdentity>;
  private readonly sessionKey: string;

  constructor(sessionKey = DEFAULT_SESSION_KEY, sessions = new Map<string, PersistedIdentity>()) {
    this.sessionKey = sessionKey;
    this.sessions = sessions;
  }

  /** A store for another UI session sharing the same backing map. */
  forSession(sessionKey: string): InMemoryIdentityStore {
    return new InMemoryIdentityStore(sessionKey, this.sessions);
  }

  async load(): Promise<PersistedIdentity> {
    return { ...this.sessions.get(this.sessionKey) };
  }

  async save(identity: PersistedIdentity): Promise<void> {
    this.sessions.set(this.sessionKey, { ...identity });
  }

  async clear(): Promise<void> {
    this.sessions.delete(this.sessionKey);
  }
}

export const createIdentityStore = (
  config?: IdentityStoreConfig,
  options?: { workingDir?: string },
): IdentityStore => {
  const provider = config?.provider ?? "local";
  if (provider === "memory") {
    return new InMemoryIdentityStore(config?.sessionKey);
  }
  const workingDir = options?.workingDir ?? process.cwd();
  return new FileIdentityStore(resolve(workingDir, config?.cacheFile ?? DEFAULT_CACHE_FILE));
};
