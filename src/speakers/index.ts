/**
 * Speaker domain: model, mapping to remote properties, repository.
 */

export {
  FieldSpecialty,
  ContactStatus,
  Priority,
  DEFAULT_CONTACT_STATUS,
  UNRECOGNIZED,
  parseLabel,
  type Unrecognized,
} from "./enums.js";

export {
  SpeakerCreateSchema,
  SpeakerUpdateSchema,
  SearchFilterSchema,
  GroupableField,
  TopicTag,
  type Speaker,
  type SpeakerCreate,
  type SpeakerCreateInput,
  type SpeakerUpdate,
  type SpeakerUpdateInput,
  type SearchFilter,
} from "./schema.js";

export { SPEAKER_PROPERTIES, type SpeakerField, type PropertyBinding } from "./properties.js";
export { toRemoteProperties, fromRemoteRecord, type SpeakerPropertyInput } from "./mapper.js";
export { buildFilterExpression } from "./filter.js";

export {
  SpeakerRepository,
  groupSpeakers,
  type SpeakerRepositoryOptions,
  type SpeakerListing,
  type SpeakerGroup,
  type ListOptions,
  type ConnectionStatus,
  type PropertyMismatch,
} from "./repository.js";

export {
  SpeakerTrackerError,
  ValidationError,
  NotFoundError,
  DataIntegrityError,
  RemoteServiceError,
  type ValidationIssue,
} from "./errors.js";
