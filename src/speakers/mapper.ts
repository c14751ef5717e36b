/**
 * Translation between Speaker objects and Notion page properties.
 *
 * Write direction (toRemoteProperties):
 *   - only fields that are present are emitted; an absent field leaves the
 *     remote property untouched, which is what makes partial updates work
 *   - a field set to null is emitted in the property kind's empty form
 *   - select values outside the vocabulary are rejected
 *
 * Read direction (fromRemoteRecord):
 *   - missing, empty or wrongly-typed properties read as absent
 *   - unknown select labels read as UNRECOGNIZED
 *   - a record without a title cannot be a Speaker (DataIntegrityError)
 */

import type { z } from "zod";
import {
  SelectPropertySchema,
  TitlePropertySchema,
  RichTextPropertySchema,
  MultiSelectPropertySchema,
  UrlPropertySchema,
  EmailPropertySchema,
  plainText,
  textSegments,
  type PropertyMap,
  type RemoteRecord,
} from "../notion/schema.js";
import {
  FieldSpecialty,
  ContactStatus,
  Priority,
  DEFAULT_CONTACT_STATUS,
  parseLabel,
  type Unrecognized,
} from "./enums.js";
import { SPEAKER_PROPERTIES, type SpeakerField } from "./properties.js";
import { DataIntegrityError, ValidationError, type ValidationIssue } from "./errors.js";
import type { Speaker } from "./schema.js";

/**
 * Anything carrying speaker fields: a Speaker, a SpeakerCreate, a
 * SpeakerUpdate, or loosely-typed input from outside the type system.
 */
export interface SpeakerPropertyInput {
  name?: string | null;
  fieldSpecialty?: string | null;
  affiliation?: string | null;
  position?: string | null;
  linkedinUrl?: string | null;
  potentialTopics?: readonly string[] | null;
  contactStatus?: string | null;
  researchNotes?: string | null;
  email?: string | null;
  priority?: string | null;
}

type SelectField = "fieldSpecialty" | "contactStatus" | "priority";
type TextField = "affiliation" | "position" | "researchNotes";

function propertyName(field: SpeakerField): string {
  return SPEAKER_PROPERTIES[field].property;
}

// ---------------------------------------------------------------------------
// Domain -> remote
// ---------------------------------------------------------------------------

/**
 * Build the property map for a create or update request.
 * @throws ValidationError on a blank name or an out-of-vocabulary select value
 */
export function toRemoteProperties(input: SpeakerPropertyInput): PropertyMap {
  const properties: PropertyMap = {};
  const issues: ValidationIssue[] = [];

  if (input.name !== undefined) {
    if (input.name === null || input.name.trim() === "") {
      issues.push({ field: "name", message: "Name must not be empty" });
    } else {
      properties[propertyName("name")] = { type: "title", title: textSegments(input.name) };
    }
  }

  writeSelect(properties, issues, "fieldSpecialty", input.fieldSpecialty, FieldSpecialty.options);
  writeText(properties, "affiliation", input.affiliation);
  writeText(properties, "position", input.position);

  if (input.linkedinUrl !== undefined) {
    properties[propertyName("linkedinUrl")] = { type: "url", url: input.linkedinUrl || null };
  }

  if (input.potentialTopics !== undefined) {
    const topics = [...new Set(input.potentialTopics ?? [])];
    topics.forEach((topic, index) => {
      if (topic.trim() === "" || topic.includes(",")) {
        issues.push({
          field: `potentialTopics.${index}`,
          message: "Topics must be non-empty and must not contain commas",
        });
      }
    });
    properties[propertyName("potentialTopics")] = {
      type: "multi_select",
      multi_select: topics.map((topic) => ({ name: topic })),
    };
  }

  writeSelect(properties, issues, "contactStatus", input.contactStatus, ContactStatus.options);
  writeText(properties, "researchNotes", input.researchNotes);

  if (input.email !== undefined) {
    properties[propertyName("email")] = { type: "email", email: input.email || null };
  }

  writeSelect(properties, issues, "priority", input.priority, Priority.options);

  if (issues.length > 0) {
    throw new ValidationError("Invalid speaker fields", issues);
  }

  return properties;
}

function writeSelect(
  properties: PropertyMap,
  issues: ValidationIssue[],
  field: SelectField,
  value: string | null | undefined,
  options: readonly string[]
): void {
  if (value === undefined) {
    return;
  }
  if (value !== null && !options.includes(value)) {
    issues.push({
      field,
      message: `"${value}" is not a valid option. Valid options: ${options.join(", ")}`,
    });
    return;
  }
  properties[propertyName(field)] = {
    type: "select",
    select: value === null ? null : { name: value },
  };
}

function writeText(properties: PropertyMap, field: TextField, value: string | null | undefined): void {
  if (value === undefined) {
    return;
  }
  properties[propertyName(field)] = { type: "rich_text", rich_text: textSegments(value ?? "") };
}

// ---------------------------------------------------------------------------
// Remote -> domain
// ---------------------------------------------------------------------------

/**
 * Map a database page to a Speaker.
 * @throws DataIntegrityError when the page has no usable title
 */
export function fromRemoteRecord(record: RemoteRecord): Speaker {
  const title = readProperty(record, "name", TitlePropertySchema);
  const name = title ? plainText(title.title) : "";
  if (name.trim() === "") {
    throw new DataIntegrityError(
      `Record ${record.id} has no "${propertyName("name")}" title`,
      record.id
    );
  }

  const speaker: Speaker = {
    id: record.id,
    name,
    potentialTopics:
      readProperty(record, "potentialTopics", MultiSelectPropertySchema)?.multi_select.map(
        (option) => option.name
      ) ?? [],
    contactStatus:
      readSelect(record, "contactStatus", ContactStatus.options) ?? DEFAULT_CONTACT_STATUS,
  };

  if (record.url !== undefined) {
    speaker.url = record.url;
  }

  const fieldSpecialty = readSelect(record, "fieldSpecialty", FieldSpecialty.options);
  if (fieldSpecialty !== undefined) {
    speaker.fieldSpecialty = fieldSpecialty;
  }

  const priority = readSelect(record, "priority", Priority.options);
  if (priority !== undefined) {
    speaker.priority = priority;
  }

  const affiliation = readText(record, "affiliation");
  if (affiliation !== undefined) {
    speaker.affiliation = affiliation;
  }

  const position = readText(record, "position");
  if (position !== undefined) {
    speaker.position = position;
  }

  const researchNotes = readText(record, "researchNotes");
  if (researchNotes !== undefined) {
    speaker.researchNotes = researchNotes;
  }

  const linkedinUrl = readProperty(record, "linkedinUrl", UrlPropertySchema)?.url;
  if (linkedinUrl) {
    speaker.linkedinUrl = linkedinUrl;
  }

  const email = readProperty(record, "email", EmailPropertySchema)?.email;
  if (email) {
    speaker.email = email;
  }

  return speaker;
}

/**
 * Read and validate one known property. Anything missing or not matching the
 * expected kind reads as undefined.
 */
function readProperty<S extends z.ZodTypeAny>(
  record: RemoteRecord,
  field: SpeakerField,
  schema: S
): z.infer<S> | undefined {
  const raw = record.properties[propertyName(field)];
  if (raw === undefined) {
    return undefined;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function readSelect<T extends string>(
  record: RemoteRecord,
  field: SelectField,
  options: readonly T[]
): T | Unrecognized | undefined {
  const option = readProperty(record, field, SelectPropertySchema)?.select;
  return option ? parseLabel(options, option.name) : undefined;
}

function readText(record: RemoteRecord, field: TextField): string | undefined {
  const property = readProperty(record, field, RichTextPropertySchema);
  const text = property ? plainText(property.rich_text) : "";
  return text === "" ? undefined : text;
}
