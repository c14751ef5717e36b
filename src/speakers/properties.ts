/**
 * The contract between the Speaker model and the Notion database: which
 * property holds each field and what kind of property it must be.
 */

import type { PropertyKind } from "../notion/schema.js";
import type { Speaker } from "./schema.js";

export type SpeakerField = Exclude<keyof Speaker, "id" | "url">;

export interface PropertyBinding {
  /** Property name in the database */
  readonly property: string;
  /** Required property kind */
  readonly kind: PropertyKind;
}

export const SPEAKER_PROPERTIES = {
  name: { property: "Name", kind: "title" },
  fieldSpecialty: { property: "Field/Specialty", kind: "select" },
  affiliation: { property: "Affiliation", kind: "rich_text" },
  position: { property: "Position", kind: "rich_text" },
  linkedinUrl: { property: "LinkedIn URL", kind: "url" },
  potentialTopics: { property: "Potential Topics", kind: "multi_select" },
  contactStatus: { property: "Contact Status", kind: "select" },
  researchNotes: { property: "Research Notes", kind: "rich_text" },
  email: { property: "Email", kind: "email" },
  priority: { property: "Priority", kind: "select" },
} as const satisfies Record<SpeakerField, PropertyBinding>;
