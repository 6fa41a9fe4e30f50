// ---------------------------------------------------------------------------
// @lorekeeper/shared: barrel export
// ---------------------------------------------------------------------------

// Enums
export {
  ConversationStatus,
  MessageRole,
  ResourceType,
  ToolName,
} from "./enums.js";

// Tool schemas
export {
  CallPayload,
  FetchAndCacheArgs,
  LookMonsterTableArgs,
  LookTableArgs,
  SearchTableArgs,
  ToolCall,
  type ObservationRecord,
} from "./tools.js";

// Catalog records + resolver/cache shapes
export {
  CachedDetail,
  CatalogRecord,
  LookupMatch,
  NameIndex,
  ResolvedReference,
  toCatalogEntry,
  type CatalogEntry,
} from "./catalog.js";

// Chat messages
export { ChatMessage, OBSERVATION_PREFIX } from "./messages.js";
