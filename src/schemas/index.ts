/**
 * Schema Exports
 * Re-exports all schemas and utilities
 */

// Entity schemas and lifecycle
export {
  EntitySchema,
  EntityStatusSchema,
  EntityMetadataSchema,
  PlayerCountSchema,
  TutorialVideoSchema,
  EMPTY_METADATA,
  canTransition,
  normalizeEntityName,
  entityNameKey,
  type Entity,
  type EntityStatus,
  type EntityMetadata,
  type PlayerCount,
  type TutorialVideo,
} from "./entity.js";

// Source records
export {
  SourceRecordSchema,
  SourceTypeSchema,
  TEXT_BEARING_TYPES,
  type SourceRecord,
  type SourceType,
  type NewSourceRecord,
  type DiscoveredSource,
} from "./source.js";

// Conversation log
export {
  ConversationEntrySchema,
  ConversationRoleSchema,
  type ConversationEntry,
  type ConversationRole,
  type NewConversationEntry,
  type ChatContext,
} from "./conversation.js";

// Structured extraction responses
export {
  GameNameExtractionSchema,
  MetadataExtractionSchema,
  DiscoveredTypeSchema,
  WebSourcesSchema,
  DescriptionSchema,
  SearchResultsSchema,
  GeneratedAnswerSchema,
  parsePlayerCount,
  type GameNameExtraction,
  type MetadataExtraction,
  type DiscoveredType,
  type WebSources,
  type Description,
  type SearchResults,
  type GeneratedAnswer,
} from "./extraction.js";
