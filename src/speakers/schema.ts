/**
 * Speaker schema and type definitions.
 *
 * Three shapes share the same fields:
 *
 *   Speaker        a record as read back from the database (has `id`)
 *   SpeakerCreate  input to record creation; `name` required
 *   SpeakerUpdate  partial input to an update
 *
 * Field presence in updates:
 *   absent / undefined  → not supplied, the remote value is left alone
 *   null                → supplied as empty, the remote value is cleared
 * A blank string counts as empty. `name` can be changed but never cleared.
 */

import { z } from "zod";
import {
  FieldSpecialty,
  ContactStatus,
  Priority,
  DEFAULT_CONTACT_STATUS,
  type Unrecognized,
} from "./enums.js";

const name = z.string().trim().min(1, "Name must not be empty");

// Create: blank text means "no value".
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === "" ? undefined : value));

// Update: blank text or null means "clear".
const clearableText = z
  .string()
  .trim()
  .nullable()
  .optional()
  .transform((value) => (value === "" ? null : value));

const email = z.string().trim().email("Email must be a valid address");
const url = z.string().trim().url("LinkedIn URL must be an absolute URL");

/**
 * A single topic tag. Notion rejects commas in select option names.
 */
export const TopicTag = z
  .string()
  .trim()
  .min(1, "Topics must not be empty")
  .max(100, "Topics are limited to 100 characters")
  .refine((value) => !value.includes(","), "Topics must not contain commas");

/** Topic tags in first-occurrence order, duplicates removed. */
const topics = z.array(TopicTag).transform((values) => [...new Set(values)]);

export const SpeakerCreateSchema = z.object({
  name,
  fieldSpecialty: FieldSpecialty.optional(),
  affiliation: optionalText,
  position: optionalText,
  linkedinUrl: z.union([url, z.literal("")]).optional().transform((v) => v || undefined),
  potentialTopics: topics.default([]),
  contactStatus: ContactStatus.default(DEFAULT_CONTACT_STATUS),
  researchNotes: optionalText,
  email: z.union([email, z.literal("")]).optional().transform((v) => v || undefined),
  priority: Priority.optional(),
});
export type SpeakerCreateInput = z.input<typeof SpeakerCreateSchema>;
export type SpeakerCreate = z.infer<typeof SpeakerCreateSchema>;

export const SpeakerUpdateSchema = z
  .object({
    name: name.optional(),
    fieldSpecialty: FieldSpecialty.nullable().optional(),
    affiliation: clearableText,
    position: clearableText,
    linkedinUrl: z
      .union([url, z.literal("")])
      .nullable()
      .optional()
      .transform((v) => (v === "" ? null : v)),
    potentialTopics: topics.nullable().optional(),
    contactStatus: ContactStatus.optional(),
    researchNotes: clearableText,
    email: z
      .union([email, z.literal("")])
      .nullable()
      .optional()
      .transform((v) => (v === "" ? null : v)),
    priority: Priority.nullable().optional(),
  })
  .strict();
export type SpeakerUpdateInput = z.input<typeof SpeakerUpdateSchema>;
export type SpeakerUpdate = z.infer<typeof SpeakerUpdateSchema>;

/**
 * A speaker record as stored remotely.
 * Select fields may hold UNRECOGNIZED when the database has drifted.
 */
export interface Speaker {
  /** Remote page ID */
  id: string;
  /** Remote page URL, when the service reports one */
  url?: string;
  name: string;
  fieldSpecialty?: FieldSpecialty | Unrecognized;
  affiliation?: string;
  position?: string;
  linkedinUrl?: string;
  potentialTopics: string[];
  contactStatus: ContactStatus | Unrecognized;
  researchNotes?: string;
  email?: string;
  priority?: Priority | Unrecognized;
}

/**
 * Search predicates. All present predicates must match (AND); a blank or
 * absent predicate places no constraint on its attribute.
 */
export const SearchFilterSchema = z
  .object({
    /** Name contains (case-insensitive at the remote service) */
    name: z.string().trim().optional(),
    fieldSpecialty: FieldSpecialty.optional(),
    /** Affiliation contains */
    affiliation: z.string().trim().optional(),
    contactStatus: ContactStatus.optional(),
    priority: Priority.optional(),
  })
  .strict();
export type SearchFilter = z.input<typeof SearchFilterSchema>;

/** Fields a listing can be grouped by. */
export const GroupableField = z.enum(["fieldSpecialty", "contactStatus", "priority"]);
export type GroupableField = z.infer<typeof GroupableField>;
