import type { PersistedIdentity, SessionIdentity } from "@threadline/sdk";
import type { AssistantApi, AssistantProfile } from "./assistant-api.js";
import { errorMessage } from "./errors.js";
import type { IdentityStore } from "./identity-store.js";
import type { Logger } from "./logger.js";

export interface SessionIdentityResolverOptions {
  api: AssistantApi;
  store: IdentityStore;
  profile: AssistantProfile;
  logger: Logger;
}

type RemoteEntity = {
  label: "Assistant" | "Thread";
  key: keyof PersistedIdentity;
  retrieve: (id: string) => Promise<string>;
  create: () => Promise<string>;
};

/**
 * Looks up the cached assistant and thread, recreating whichever one the
 * remote service no longer recognizes. Lookup failures are logged and healed,
 * never thrown; creation failures propagate.
 */
export class SessionIdentityResolver {
  private readonly api: AssistantApi;
  private readonly store: IdentityStore;
  private readonly profile: AssistantProfile;
  private readonly logger: Logger;
  private lock: Promise<void> = Promise.resolve();

  constructor(options: SessionIdentityResolverOptions) {
    this.api = options.api;
    this.store = options.store;
    this.profile = options.profile;
    this.logger = options.logger;
  }

  resolve(): Promise<SessionIdentity> {
    return this.exclusive(() => this.resolveUnlocked());
  }

  resetIdentity(): Promise<void> {
    return this.exclusive(async () => {
      await this.store.clear();
      this.logger.info("Cached Assistant and Thread IDs cleared");
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const next = this.lock.then(task);
    this.lock = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  private async resolveUnlocked(): Promise<SessionIdentity> {
    let current = await this.store.load();

    const entities: RemoteEntity[] = [
      {
        label: "Assistant",
        key: "assistantId",
        retrieve: async (id) => (await this.api.retrieveAssistant(id)).id,
        create: async () => (await this.api.createAssistant(this.profile)).id,
      },
      {
        label: "Thread",
        key: "threadId",
        retrieve: async (id) => (await this.api.retrieveThread(id)).id,
        create: async () => (await this.api.createThread()).id,
      },
    ];

    for (const entity of entities) {
      const cachedId = current[entity.key];
      const retrieved = cachedId ? await this.lookup(entity, cachedId) : undefined;
      if (retrieved) {
        continue;
      }
      if (!cachedId) {
        this.logger.info(`${entity.label} ID not found. Creating new ${entity.label}...`);
      }
      const createdId = await entity.create();
      current = { ...current, [entity.key]: createdId };
      await this.store.save(current);
      this.logger.info(`New ${entity.label} has been created, ID is: ${createdId}`);
    }

    const { assistantId, threadId } = current;
    if (!assistantId || !threadId) {
      throw new Error("Session identity could not be established");
    }
    return { assistantId, threadId };
  }

  private async lookup(entity: RemoteEntity, id: string): Promise<string | undefined> {
    this.logger.info(`${entity.label} ID exists. Retrieving ${entity.label}...`);
    try {
      const retrievedId = await entity.retrieve(id);
      this.logger.info(`${entity.label} retrieved successfully`);
      this.logger.info(`Current ${entity.label} ID is: ${retrievedId}`);
      return retrievedId;
    } catch (error) {
      this.logger.error(`Failed to retrieve ${entity.label}: ${errorMessage(error)}`);
      this.logger.info(`No ${entity.label} found. Creating new ${entity.label}...`);
      return undefined;
    }
  }
}
