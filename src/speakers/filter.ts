/**
 * Search filter -> Notion filter expression.
 */

import type { FilterCondition, FilterExpression } from "../notion/schema.js";
import { SPEAKER_PROPERTIES } from "./properties.js";
import type { SearchFilter } from "./schema.js";

/**
 * Build the filter for a database query.
 *
 * One clause is emitted per present, non-blank predicate. A single clause is
 * returned bare, several are AND-combined, and no clauses yields undefined
 * (the query then matches every record).
 */
export function buildFilterExpression(filter: SearchFilter): FilterExpression | undefined {
  const conditions: FilterCondition[] = [];

  const name = filter.name?.trim();
  if (name) {
    conditions.push({
      property: SPEAKER_PROPERTIES.name.property,
      title: { contains: name },
    });
  }

  if (filter.fieldSpecialty) {
    conditions.push({
      property: SPEAKER_PROPERTIES.fieldSpecialty.property,
      select: { equals: filter.fieldSpecialty },
    });
  }

  const affiliation = filter.affiliation?.trim();
  if (affiliation) {
    conditions.push({
      property: SPEAKER_PROPERTIES.affiliation.property,
      rich_text: { contains: affiliation },
    });
  }

  if (filter.contactStatus) {
    conditions.push({
      property: SPEAKER_PROPERTIES.contactStatus.property,
      select: { equals: filter.contactStatus },
    });
  }

  if (filter.priority) {
    conditions.push({
      property: SPEAKER_PROPERTIES.priority.property,
      select: { equals: filter.priority },
    });
  }

  if (conditions.length === 0) {
    return undefined;
  }
  if (conditions.length === 1) {
    return conditions[0];
  }
  return { and: conditions };
}
