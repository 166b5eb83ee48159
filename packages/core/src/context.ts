import type { CoreConfig, RouterContext } from "./types.js";
import { SkillRegistry } from "./registry/skill-registry.js";
import { ConversationState } from "./storage/conversation-state.js";
import { createMemoryStorage } from "./storage/in-memory/index.js";
import { createSkillConversationIdMapper } from "./skills/conversation-id-mapper.js";
import { createSkillForwarder } from "./skills/skill-forwarder.js";
import { RouterEventBus } from "./events/router-events.js";

/** Wires the router's collaborators from configuration. Throws `ConfigurationError` on an invalid skill catalog. */
export function createRouterContext(config: CoreConfig): RouterContext {
  const skills = SkillRegistry.fromConfiguration(config.skills);

  const storage = config.storage ?? (() => {
    console.log("[root-bot] Using in-memory storage (conversation state will not persist across restarts)");
    return createMemoryStorage();
  })();

  return {
    appId: config.appId ?? "",
    skills,
    storage,
    state: new ConversationState(storage.state),
    conversationIds: createSkillConversationIdMapper(storage.skillConversations),
    forwarder: createSkillForwarder({ credentials: config.credentials, fetch: config.fetch }),
    events: new RouterEventBus(),
    config,
  };
}
