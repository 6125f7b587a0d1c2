export {
  ACTION_RESULT_MARKER,
  ACTION_RESULT_TAG_KIND,
  ActionResultTag,
  actionResultTagKind,
  actionResultTagSchema,
  isValidActionResult,
  newActionResultTag,
  parseActionResultTag,
  safeParseActionResultTag,
} from "./adapters/action-result/action-result-tag"
export {
  ACTION_MARKER,
  ACTION_TAG_KIND,
  ActionTag,
  actionTagKind,
  actionTagSchema,
  isValidAction,
  joinActionTag,
  newActionTag,
  parseActionTag,
  safeParseActionTag,
} from "./adapters/action/action-tag"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
export { isValidService } from "./adapters/service/service-name"
export {
  newServiceTag,
  parseServiceTag,
  SERVICE_TAG_KIND,
  ServiceTag,
  safeParseServiceTag,
  serviceOwner,
  serviceTagKind,
  serviceTagSchema,
} from "./adapters/service/service-tag"
export { isValidUnit, unitNumber, unitService } from "./adapters/unit/unit-name"
export {
  newUnitTag,
  parseUnitTag,
  safeParseUnitTag,
  UNIT_TAG_KIND,
  UnitTag,
  unitOwner,
  unitTagKind,
  unitTagSchema,
} from "./adapters/unit/unit-tag"
export { formatEnvelope, splitEnvelope, type Envelope } from "./core/envelope"
export { isTagError } from "./core/errors/is-tag-error"
export {
  type SerializeOptions,
  serializeTagError,
  TagError,
  type TagErrorOptions,
} from "./core/errors/tag-error"
export {
  DuplicateTagKindError,
  InvalidTagError,
  InvalidTagIdError,
} from "./core/errors/tag-errors"
export { IdPrefixer, type IdPrefixerFields, isValidIdPrefixTag } from "./core/id-prefixer"
export { getDefaultOwnerResolution } from "./core/owner/default-owners"
export { isOwnedPrefix, resolveOwner } from "./core/owner/resolve-owner"
export {
  builtinTagKinds,
  configureDefaultTagRegistry,
  type DefaultTagRegistryOptions,
  getDefaultTagRegistry,
  parseTag,
  safeParseTag,
} from "./core/registry/default-registry"
export { createTagRegistry } from "./core/registry/tag-registry"
export { tagSchema } from "./core/schema/tag-schema"
export {
  joinId,
  type SplitId,
  type SplitIdFailure,
  type SplitIdResult,
  splitId,
} from "./core/split-id"
export { tagsEqual } from "./core/utils/tags-equal"
export type { ErrorContext, SerializedTagError, TagErrorCode } from "./ports/error"
export type { LogContext, LogContextPatch, LogMeta } from "./ports/log-context"
export { type LogLevel, type LogLevelName, LogLevels, logLevelNames } from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"
export type { OwnerResolution, OwnerResolver } from "./ports/owner-resolver"
export type { ParsedTag, ParseResult, RejectedTag } from "./ports/parse-result"
export type { PrefixTag, Tag } from "./ports/tag"
export type { TagKind } from "./ports/tag-kind"
export type { TagRegistry, TagRegistryOptions } from "./ports/tag-registry"
