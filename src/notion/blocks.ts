import {
  RawBlockSchema,
  RawChildPayloadSchema,
  RawCodePayloadSchema,
  RawFilePayloadSchema,
  RawImagePayloadSchema,
  RawLinkPayloadSchema,
  RawTableRowPayloadSchema,
  RawTextPayloadSchema,
  type RawBlock,
} from '../schemas/index.js';
import type { Block } from '../types/index.js';
import { toRichTextRuns } from './rich-text.js';

const TEXT_KINDS = [
  'paragraph',
  'quote',
  'callout',
  'toggle',
  'bulleted_list_item',
  'numbered_list_item',
  'heading_1',
  'heading_2',
  'heading_3',
] as const;

const CONTAINER_KINDS = ['table', 'divider', 'column_list', 'column', 'synced_block'] as const;

type TextKind = (typeof TEXT_KINDS)[number];
type ContainerKind = (typeof CONTAINER_KINDS)[number];

function isTextKind(type: string): type is TextKind {
  return TEXT_KINDS.some((kind) => kind === type);
}

function isContainerKind(type: string): type is ContainerKind {
  return CONTAINER_KINDS.some((kind) => kind === type);
}

function payloadOf(raw: RawBlock): unknown {
  return raw[raw.type] ?? {};
}

/**
 * Prefer the Notion-hosted file URL over an external one; empty when the
 * block carries neither.
 */
export function resolveImageUrl(payload: unknown): string {
  const { file, external } = RawImagePayloadSchema.parse(payload ?? {});
  if (file) return file.url;
  if (external) return external.url;
  return '';
}

/** Turn a raw block object from the Notion API into the closed `Block` union. */
export function normalizeBlock(value: unknown): Block {
  const raw = RawBlockSchema.parse(value);
  const base = { id: raw.id, hasChildren: raw.has_children };
  const payload = payloadOf(raw);
  const type = raw.type;

  if (isTextKind(type)) {
    const { rich_text } = RawTextPayloadSchema.parse(payload);
    return { ...base, kind: type, data: { richText: toRichTextRuns(rich_text) } };
  }

  if (isContainerKind(type)) {
    return { ...base, kind: type, data: {} };
  }

  switch (type) {
    case 'to_do': {
      const { rich_text, checked } = RawTextPayloadSchema.parse(payload);
      return { ...base, kind: 'to_do', data: { richText: toRichTextRuns(rich_text), checked } };
    }
    case 'code': {
      const { rich_text, language, caption } = RawCodePayloadSchema.parse(payload);
      return {
        ...base,
        kind: 'code',
        data: { richText: toRichTextRuns(rich_text), language, caption: toRichTextRuns(caption) },
      };
    }
    case 'table_row': {
      const { cells } = RawTableRowPayloadSchema.parse(payload);
      return { ...base, kind: 'table_row', data: { cells: cells.map(toRichTextRuns) } };
    }
    case 'image': {
      const { caption } = RawImagePayloadSchema.parse(payload);
      return { ...base, kind: 'image', data: { url: resolveImageUrl(payload), caption: toRichTextRuns(caption) } };
    }
    case 'bookmark': {
      const { url, caption } = RawLinkPayloadSchema.parse(payload);
      return { ...base, kind: 'bookmark', data: { url: url ?? '', caption: toRichTextRuns(caption) } };
    }
    case 'link_preview': {
      const { url } = RawLinkPayloadSchema.parse(payload);
      return { ...base, kind: 'link_preview', data: { url: url ?? '' } };
    }
    case 'file':
    case 'pdf': {
      const { name, caption } = RawFilePayloadSchema.parse(payload);
      return { ...base, kind: type, data: { name, caption: toRichTextRuns(caption) } };
    }
    case 'child_page':
    case 'child_database': {
      const { title } = RawChildPayloadSchema.parse(payload);
      return { ...base, kind: type, data: { title } };
    }
    default:
      return { ...base, kind: 'unsupported', data: { type } };
  }
}
