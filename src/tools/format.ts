/**
 * Text rendering for tool results.
 */

import type { Speaker } from "../speakers/schema.js";
import type { ConnectionStatus, SpeakerListing } from "../speakers/repository.js";

const NOT_SPECIFIED = "Not specified";

/**
 * Compact multi-line block used in search results.
 */
export function formatSpeakerSummary(speaker: Speaker): string {
  const lines = ["---", `Name: ${speaker.name}`, `ID: ${speaker.id}`];
  if (speaker.fieldSpecialty) {
    lines.push(`Field: ${speaker.fieldSpecialty}`);
  }
  if (speaker.affiliation) {
    lines.push(`Affiliation: ${speaker.affiliation}`);
  }
  if (speaker.position) {
    lines.push(`Position: ${speaker.position}`);
  }
  lines.push(`Status: ${speaker.contactStatus}`);
  if (speaker.priority) {
    lines.push(`Priority: ${speaker.priority}`);
  }
  if (speaker.email) {
    lines.push(`Email: ${speaker.email}`);
  }
  return lines.join("\n");
}

export function formatSearchResults(speakers: readonly Speaker[]): string {
  if (speakers.length === 0) {
    return "No speakers found matching the criteria.";
  }
  return [`Found ${speakers.length} speaker(s):`, ...speakers.map(formatSpeakerSummary)].join("\n");
}

/**
 * One-line entry: "- Name (Affiliation) [Priority]".
 */
export function formatSpeakerLine(speaker: Speaker): string {
  let line = `- ${speaker.name}`;
  if (speaker.affiliation) {
    line += ` (${speaker.affiliation})`;
  }
  if (speaker.priority) {
    line += ` [${speaker.priority}]`;
  }
  return line;
}

export function formatListing(listing: SpeakerListing): string {
  if (listing.kind === "flat") {
    if (listing.speakers.length === 0) {
      return "No speakers in the database yet.";
    }
    return [`Total speakers: ${listing.speakers.length}`, ...listing.speakers.map(formatSpeakerLine)].join(
      "\n"
    );
  }

  if (listing.total === 0) {
    return "No speakers in the database yet.";
  }
  const lines = [`Total speakers: ${listing.total}`];
  for (const group of listing.groups) {
    lines.push("", `## ${group.key ?? "Not set"} (${group.speakers.length})`);
    lines.push(...group.speakers.map(formatSpeakerLine));
  }
  return lines.join("\n");
}

/**
 * Full markdown profile of one speaker.
 */
export function formatSpeakerDetails(speaker: Speaker): string {
  const lines = [
    `# ${speaker.name}`,
    "",
    `**Notion ID:** ${speaker.id}`,
    `**Notion URL:** ${speaker.url ?? "N/A"}`,
    "",
    "## Professional Info",
    `- **Field/Specialty:** ${speaker.fieldSpecialty ?? NOT_SPECIFIED}`,
    `- **Affiliation:** ${speaker.affiliation ?? NOT_SPECIFIED}`,
    `- **Position:** ${speaker.position ?? NOT_SPECIFIED}`,
    "",
    "## Contact",
    `- **Email:** ${speaker.email ?? NOT_SPECIFIED}`,
    `- **LinkedIn:** ${speaker.linkedinUrl ?? NOT_SPECIFIED}`,
    `- **Status:** ${speaker.contactStatus}`,
    `- **Priority:** ${speaker.priority ?? "Not set"}`,
    "",
    "## Potential Topics",
  ];

  if (speaker.potentialTopics.length > 0) {
    lines.push(...speaker.potentialTopics.map((topic) => `- ${topic}`));
  } else {
    lines.push("- None specified");
  }

  lines.push("", "## Research Notes", speaker.researchNotes ?? "No notes yet.");
  return lines.join("\n");
}

export function formatConnectionStatus(status: ConnectionStatus): string {
  if (!status.success) {
    return `Connection failed: ${status.error}`;
  }
  const lines = [
    "Connection successful!",
    `Database: ${status.databaseTitle}`,
    `Database ID: ${status.databaseId}`,
  ];
  if (status.missingProperties.length === 0 && status.mismatchedProperties.length === 0) {
    lines.push("Schema: all speaker properties present");
    return lines.join("\n");
  }
  if (status.missingProperties.length > 0) {
    lines.push(`Missing properties: ${status.missingProperties.join(", ")}`);
  }
  for (const mismatch of status.mismatchedProperties) {
    lines.push(
      `Property "${mismatch.property}" is ${mismatch.actual}, expected ${mismatch.expected}`
    );
  }
  return lines.join("\n");
}

export interface ResearchSummaryInput {
  name: string;
  affiliation: string;
  position: string;
  fieldSpecialty: string;
  background: string;
  notableWork: string;
  potentialTopics: readonly string[];
  linkedinUrl?: string;
  email?: string;
  priorityRecommendation: string;
}

/**
 * Review document for research gathered about a prospective speaker,
 * shown to a person before the speaker is added.
 */
export function formatResearchSummary(input: ResearchSummaryInput): string {
  return [
    `# Research Summary: ${input.name}`,
    "",
    "## Professional Profile",
    `- **Name:** ${input.name}`,
    `- **Position:** ${input.position}`,
    `- **Affiliation:** ${input.affiliation}`,
    `- **Field:** ${input.fieldSpecialty}`,
    "",
    "## Background",
    input.background,
    "",
    "## Notable Work & Achievements",
    input.notableWork,
    "",
    "## Potential Speaking Topics",
    ...input.potentialTopics.map((topic) => `- ${topic}`),
    "",
    "## Contact Information",
    `- **LinkedIn:** ${input.linkedinUrl ?? "Not found"}`,
    `- **Email:** ${input.email ?? "Not found"}`,
    "",
    "## Recommendation",
    `- **Priority:** ${input.priorityRecommendation}`,
    "",
    "---",
    "**To add this speaker, confirm and the add_speaker tool will be called with the above information.**",
  ].join("\n");
}
