/**
 * Remote property model for Notion database pages.
 *
 * Only the property kinds the speaker database uses are modeled. Each kind is
 * one member of the `PropertyValue` tagged union, discriminated by `type`, so
 * code that switches over it is checked for exhaustiveness.
 *
 * The same shapes serve requests and responses: a request rich-text segment
 * carries `text.content`, a response segment additionally carries
 * `plain_text`. Readers should prefer `plain_text` when present.
 */

import { z } from "zod";

/** Maximum characters Notion accepts in one rich-text segment. */
export const RICH_TEXT_SEGMENT_LIMIT = 2000;

/** Maximum page size accepted by the database query endpoint. */
export const MAX_PAGE_SIZE = 100;

export const RichTextItemSchema = z.object({
  type: z.string().optional(),
  plain_text: z.string().optional(),
  text: z.object({ content: z.string() }).optional(),
});
export type RichTextItem = z.infer<typeof RichTextItemSchema>;

export const SelectOptionSchema = z.object({
  name: z.string(),
});

export const TitlePropertySchema = z.object({
  type: z.literal("title"),
  title: z.array(RichTextItemSchema),
});

export const RichTextPropertySchema = z.object({
  type: z.literal("rich_text"),
  rich_text: z.array(RichTextItemSchema),
});

export const SelectPropertySchema = z.object({
  type: z.literal("select"),
  select: SelectOptionSchema.nullable(),
});

export const MultiSelectPropertySchema = z.object({
  type: z.literal("multi_select"),
  multi_select: z.array(SelectOptionSchema),
});

export const UrlPropertySchema = z.object({
  type: z.literal("url"),
  url: z.string().nullable(),
});

export const EmailPropertySchema = z.object({
  type: z.literal("email"),
  email: z.string().nullable(),
});

export const PropertyValueSchema = z.discriminatedUnion("type", [
  TitlePropertySchema,
  RichTextPropertySchema,
  SelectPropertySchema,
  MultiSelectPropertySchema,
  UrlPropertySchema,
  EmailPropertySchema,
]);
export type PropertyValue = z.infer<typeof PropertyValueSchema>;
export type PropertyKind = PropertyValue["type"];

/** Property name -> value, as sent in create and update requests. */
export type PropertyMap = Record<string, PropertyValue>;

/**
 * A database page. `properties` stays loosely typed here: pages may carry
 * property kinds this project does not model, and each known property is
 * validated individually when it is read.
 */
export const RemoteRecordSchema = z.object({
  id: z.string().min(1),
  url: z.string().optional(),
  archived: z.boolean().optional(),
  properties: z.record(z.unknown()),
});
export type RemoteRecord = z.infer<typeof RemoteRecordSchema>;

export const QueryResponseSchema = z.object({
  results: z.array(RemoteRecordSchema),
  has_more: z.boolean(),
  next_cursor: z.string().nullable(),
});

export const DatabaseResponseSchema = z.object({
  id: z.string(),
  title: z.array(RichTextItemSchema).default([]),
  properties: z.record(z.object({ type: z.string() })),
});

// ---------------------------------------------------------------------------
// Filters
// ---------------------------------------------------------------------------

export type FilterCondition =
  | { property: string; title: { contains: string } }
  | { property: string; rich_text: { contains: string } }
  | { property: string; select: { equals: string } };

export type FilterExpression = FilterCondition | { and: FilterCondition[] };

/**
 * Plain text of a rich-text array: segments concatenated in order.
 */
export function plainText(items: readonly RichTextItem[]): string {
  return items.map((item) => item.plain_text ?? item.text?.content ?? "").join("");
}

/**
 * Rich-text request segments for `content`, split at the segment limit.
 * A cut never separates a surrogate pair, so a segment may be one unit short.
 * Empty content yields an empty array, which clears the property.
 */
export function textSegments(content: string): RichTextItem[] {
  const segments: RichTextItem[] = [];
  let start = 0;
  while (start < content.length) {
    let end = Math.min(start + RICH_TEXT_SEGMENT_LIMIT, content.length);
    if (end < content.length && isHighSurrogate(content.charCodeAt(end - 1))) {
      end -= 1;
    }
    segments.push({ type: "text", text: { content: content.slice(start, end) } });
    start = end;
  }
  return segments;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
