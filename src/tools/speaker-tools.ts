/**
 * Speaker operations exposed as named tools.
 *
 * Argument names are snake_case, the convention of the agent-facing surface;
 * handlers translate them to the camelCase domain model. The repository is
 * obtained through a provider on each call, so nothing touches configuration
 * or the network until a tool actually runs.
 */

import { z } from "zod";
import { ContactStatus, FieldSpecialty, Priority } from "../speakers/enums.js";
import type { GroupableField } from "../speakers/schema.js";
import type { SpeakerRepository } from "../speakers/repository.js";
import type { Logger } from "../logging/index.js";
import { ToolRegistry } from "./registry.js";
import {
  formatConnectionStatus,
  formatListing,
  formatResearchSummary,
  formatSearchResults,
  formatSpeakerDetails,
} from "./format.js";

export type RepositoryProvider = () => SpeakerRepository;

function choices(options: readonly string[]): string {
  return options.map((option) => `"${option}"`).join(", ");
}

const speakerId = z.string().describe("The Notion page ID of the speaker");

export const AddSpeakerArgs = z
  .object({
    name: z.string().describe("Speaker's full name (required)"),
    field_specialty: FieldSpecialty.optional().describe(
      `Primary field - one of: ${choices(FieldSpecialty.options)}`
    ),
    affiliation: z.string().optional().describe("University or company name"),
    position: z.string().optional().describe("Job title"),
    linkedin_url: z.string().optional().describe("LinkedIn profile URL"),
    potential_topics: z.array(z.string()).optional().describe("Topics they could speak on"),
    contact_status: ContactStatus.optional().describe(
      `Status - one of: ${choices(ContactStatus.options)} (default "Not Contacted")`
    ),
    research_notes: z.string().optional().describe("Bio summary and research findings"),
    email: z.string().optional().describe("Contact email address"),
    priority: Priority.optional().describe(`Priority level - one of: ${choices(Priority.options)}`),
  })
  .strict();

export const SearchSpeakersArgs = z
  .object({
    name: z.string().optional().describe("Filter by name (partial match)"),
    field_specialty: FieldSpecialty.optional().describe("Filter by field/specialty"),
    affiliation: z.string().optional().describe("Filter by affiliation (partial match)"),
    contact_status: ContactStatus.optional().describe("Filter by contact status"),
    priority: Priority.optional().describe("Filter by priority level"),
    limit: z.number().int().positive().optional().describe("Maximum number of results"),
  })
  .strict();

// null clears a field; an omitted argument leaves it unchanged.
export const UpdateSpeakerArgs = z
  .object({
    speaker_id: speakerId,
    name: z.string().optional().describe("New name"),
    field_specialty: FieldSpecialty.nullable().optional().describe("New field/specialty, or null to clear"),
    affiliation: z.string().nullable().optional().describe("New affiliation, or null to clear"),
    position: z.string().nullable().optional().describe("New position, or null to clear"),
    linkedin_url: z.string().nullable().optional().describe("New LinkedIn URL, or null to clear"),
    potential_topics: z
      .array(z.string())
      .nullable()
      .optional()
      .describe("Replacement list of potential topics, or null to clear"),
    contact_status: ContactStatus.optional().describe("New contact status"),
    research_notes: z.string().nullable().optional().describe("New research notes, or null to clear"),
    email: z.string().nullable().optional().describe("New email, or null to clear"),
    priority: Priority.nullable().optional().describe("New priority level, or null to clear"),
  })
  .strict();

const GROUPINGS = {
  contact_status: "contactStatus",
  field_specialty: "fieldSpecialty",
  priority: "priority",
} as const satisfies Record<string, GroupableField>;

export const ListSpeakersArgs = z
  .object({
    limit: z
      .number()
      .int()
      .positive()
      .default(50)
      .describe("Maximum number of speakers to return (default: 50)"),
    group_by: z
      .enum(["contact_status", "field_specialty", "priority", "none"])
      .default("contact_status")
      .describe("Group the list by this field, or \"none\" (default: contact_status)"),
  })
  .strict();

export const SpeakerIdArgs = z.object({ speaker_id: speakerId }).strict();

export const ResearchSummaryArgs = z
  .object({
    name: z.string().describe("Speaker's full name"),
    affiliation: z.string().describe("University or company"),
    position: z.string().describe("Job title"),
    field_specialty: FieldSpecialty.describe("Primary field"),
    background: z.string().describe("Brief biography and background summary"),
    notable_work: z.string().describe("Key publications, projects, or achievements"),
    potential_topics: z.array(z.string()).describe("Topics they could speak on"),
    linkedin_url: z.string().optional().describe("LinkedIn profile URL if found"),
    email: z.string().optional().describe("Contact email if found"),
    priority_recommendation: Priority.default("Medium").describe("Suggested priority level"),
  })
  .strict();

/**
 * Register every speaker tool on `registry` (a new one when omitted).
 */
export function createSpeakerToolRegistry(
  getRepository: RepositoryProvider,
  logger?: Logger,
  registry: ToolRegistry = new ToolRegistry(logger)
): ToolRegistry {
  return registry
    .register({
      name: "add_speaker",
      description: "Add a new speaker to the speaker database.",
      parameters: AddSpeakerArgs,
      failureContext: "adding speaker",
      handler: async (args) => {
        const speaker = await getRepository().addSpeaker({
          name: args.name,
          fieldSpecialty: args.field_specialty,
          affiliation: args.affiliation,
          position: args.position,
          linkedinUrl: args.linkedin_url,
          potentialTopics: args.potential_topics,
          contactStatus: args.contact_status,
          researchNotes: args.research_notes,
          email: args.email,
          priority: args.priority,
        });
        return [
          `Successfully added speaker '${speaker.name}' to the database.`,
          `Notion Page ID: ${speaker.id}`,
          `URL: ${speaker.url ?? "N/A"}`,
        ].join("\n");
      },
    })
    .register({
      name: "search_speakers",
      description: "Search for speakers in the database with optional filters.",
      parameters: SearchSpeakersArgs,
      failureContext: "searching speakers",
      handler: async (args) => {
        const speakers = await getRepository().searchSpeakers(
          {
            name: args.name,
            fieldSpecialty: args.field_specialty,
            affiliation: args.affiliation,
            contactStatus: args.contact_status,
            priority: args.priority,
          },
          args.limit
        );
        return formatSearchResults(speakers);
      },
    })
    .register({
      name: "update_speaker",
      description:
        "Update an existing speaker's information. Only the supplied fields change; pass null to clear a field.",
      parameters: UpdateSpeakerArgs,
      failureContext: "updating speaker",
      handler: async (args) => {
        const speaker = await getRepository().updateSpeaker(args.speaker_id, {
          name: args.name,
          fieldSpecialty: args.field_specialty,
          affiliation: args.affiliation,
          position: args.position,
          linkedinUrl: args.linkedin_url,
          potentialTopics: args.potential_topics,
          contactStatus: args.contact_status,
          researchNotes: args.research_notes,
          email: args.email,
          priority: args.priority,
        });
        return [
          `Successfully updated speaker '${speaker.name}'.`,
          `Notion Page ID: ${speaker.id}`,
          `Status: ${speaker.contactStatus}`,
        ].join("\n");
      },
    })
    .register({
      name: "list_speakers",
      description: "List all speakers in the database, grouped by contact status by default.",
      parameters: ListSpeakersArgs,
      failureContext: "listing speakers",
      handler: async (args) => {
        const listing = await getRepository().listSpeakers({
          limit: args.limit,
          groupBy: args.group_by === "none" ? undefined : GROUPINGS[args.group_by],
        });
        return formatListing(listing);
      },
    })
    .register({
      name: "get_speaker_details",
      description: "Get full details of a specific speaker.",
      parameters: SpeakerIdArgs,
      failureContext: "getting speaker details",
      handler: async (args) => formatSpeakerDetails(await getRepository().getSpeaker(args.speaker_id)),
    })
    .register({
      name: "archive_speaker",
      description: "Archive (soft delete) a speaker. Archived speakers no longer appear in searches.",
      parameters: SpeakerIdArgs,
      failureContext: "archiving speaker",
      handler: async (args) => {
        const speaker = await getRepository().archiveSpeaker(args.speaker_id);
        return `Archived speaker '${speaker.name}' (${speaker.id}).`;
      },
    })
    .register({
      name: "prepare_research_summary",
      description:
        "Format web research about a potential speaker into a summary for review before adding them.",
      parameters: ResearchSummaryArgs,
      failureContext: "preparing research summary",
      handler: async (args) =>
        formatResearchSummary({
          name: args.name,
          affiliation: args.affiliation,
          position: args.position,
          fieldSpecialty: args.field_specialty,
          background: args.background,
          notableWork: args.notable_work,
          potentialTopics: args.potential_topics,
          linkedinUrl: args.linkedin_url,
          email: args.email,
          priorityRecommendation: args.priority_recommendation,
        }),
    })
    .register({
      name: "test_connection",
      description: "Test the connection to the speaker database and check its properties.",
      parameters: z.object({}).strict(),
      failureContext: "testing connection",
      handler: async () => {
        const status = await getRepository().testConnection();
        return { text: formatConnectionStatus(status), isError: !status.success };
      },
    });
}
