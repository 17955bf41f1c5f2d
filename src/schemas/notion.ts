import { z } from 'zod';

// Raw Notion API objects. Only the fields the extractor reads are declared;
// everything else passes through untouched.

export const RawRichTextSchema = z.array(
  z
    .object({
      plain_text: z.string().default(''),
      href: z.string().nullable().default(null),
    })
    .passthrough()
);

export const RawBlockSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    has_children: z.boolean().default(false),
  })
  .catchall(z.unknown());

export const RawTextPayloadSchema = z.object({
  rich_text: RawRichTextSchema.default([]),
  checked: z.boolean().default(false),
});

export const RawCodePayloadSchema = z.object({
  rich_text: RawRichTextSchema.default([]),
  language: z.string().default(''),
  caption: RawRichTextSchema.default([]),
});

export const RawTableRowPayloadSchema = z.object({
  cells: z.array(RawRichTextSchema).default([]),
});

const HostedUrlSchema = z.object({ url: z.string().default('') }).passthrough();

export const RawImagePayloadSchema = z.object({
  caption: RawRichTextSchema.default([]),
  file: HostedUrlSchema.optional(),
  external: HostedUrlSchema.optional(),
});

export const RawLinkPayloadSchema = z.object({
  url: z.string().nullable().default(''),
  caption: RawRichTextSchema.default([]),
});

export const RawFilePayloadSchema = z.object({
  name: z.string().default(''),
  caption: RawRichTextSchema.default([]),
});

export const RawChildPayloadSchema = z.object({
  title: z.string().default(''),
});

export const RawBlockListSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean().default(false),
  next_cursor: z.string().nullable().default(null),
});

export const RawPropertySchema = z
  .object({
    type: z.string(),
  })
  .catchall(z.unknown());

export const RawPageSchema = z.object({
  id: z.string(),
  last_edited_time: z.string().default(''),
  properties: z.record(RawPropertySchema).default({}),
});

export const RawSelectSchema = z.object({ name: z.string() }).passthrough();

export type RawRichText = z.infer<typeof RawRichTextSchema>;
export type RawBlock = z.infer<typeof RawBlockSchema>;
export type RawPage = z.infer<typeof RawPageSchema>;
