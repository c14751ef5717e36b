/**
 * Closed vocabularies for speaker records.
 *
 * The labels are the option names of the select properties in the Notion
 * database, so they double as the wire values. The database is administered
 * by hand and its option lists can drift: writes only accept the labels
 * below, while reads map anything else to `UNRECOGNIZED`.
 */

import { z } from "zod";

/**
 * Marker for a select value read from the database that is not part of the
 * local vocabulary. Never accepted on write.
 */
export const UNRECOGNIZED = "Unrecognized";
export type Unrecognized = typeof UNRECOGNIZED;

/**
 * Primary field of a speaker's work.
 */
export const FieldSpecialty = z.enum([
  "Drug Discovery & AI",
  "Clinical/Medical AI",
  "Genomics & Biotech",
  "Healthcare AI/ML",
  "Regulatory Science",
  "Real World Data/Evidence",
  "Bioinformatics",
  "Medical Imaging AI",
  "NLP in Healthcare",
  "Other",
]);
export type FieldSpecialty = z.infer<typeof FieldSpecialty>;

/**
 * Outreach progress.
 */
export const ContactStatus = z.enum([
  "Not Contacted",
  "Contacted",
  "In Discussion",
  "Confirmed",
  "Declined",
  "Maybe Later",
  "No Response",
]);
export type ContactStatus = z.infer<typeof ContactStatus>;

export const DEFAULT_CONTACT_STATUS: ContactStatus = "Not Contacted";

export const Priority = z.enum(["High", "Medium", "Low"]);
export type Priority = z.infer<typeof Priority>;

/**
 * Resolve a label read from the remote side against a vocabulary.
 */
export function parseLabel<T extends string>(
  options: readonly T[],
  label: string
): T | Unrecognized {
  return options.find((option) => option === label) ?? UNRECOGNIZED;
}
