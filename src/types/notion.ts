export interface RichTextRun {
  plainText: string;
  href: string | null;
}

export type PropertyValue = string | string[];

export interface PageProperties {
  pageId: string;
  lastEdited: string;
  title: string;
  /** Named select, multi_select, url and rich_text properties. */
  properties: Record<string, PropertyValue>;
}

interface TextPayload {
  richText: RichTextRun[];
}

type EmptyPayload = Record<string, never>;

/** Per-kind block fields, keyed by the block kind. */
export interface BlockPayloads {
  paragraph: TextPayload;
  quote: TextPayload;
  callout: TextPayload;
  toggle: TextPayload;
  bulleted_list_item: TextPayload;
  numbered_list_item: TextPayload;
  to_do: TextPayload & { checked: boolean };
  heading_1: TextPayload;
  heading_2: TextPayload;
  heading_3: TextPayload;
  code: TextPayload & { language: string; caption: RichTextRun[] };
  table: EmptyPayload;
  table_row: { cells: RichTextRun[][] };
  divider: EmptyPayload;
  image: { url: string; caption: RichTextRun[] };
  bookmark: { url: string; caption: RichTextRun[] };
  link_preview: { url: string };
  file: { name: string; caption: RichTextRun[] };
  pdf: { name: string; caption: RichTextRun[] };
  child_page: { title: string };
  child_database: { title: string };
  column_list: EmptyPayload;
  column: EmptyPayload;
  synced_block: EmptyPayload;
  /** Any block type this extractor has no rule for. */
  unsupported: { type: string };
}

export type BlockKind = keyof BlockPayloads;

export type Block<K extends BlockKind = BlockKind> = {
  [P in K]: {
    id: string;
    kind: P;
    hasChildren: boolean;
    data: BlockPayloads[P];
  };
}[K];

export interface BlockChildrenPage {
  blocks: Block[];
  hasMore: boolean;
  nextCursor: string | null;
}

export interface PageSource {
  /** Page ids of a database, optionally only those edited on or after `modifiedSince`. */
  listPages(databaseId: string, modifiedSince?: Date): Promise<string[]>;
  getPageProperties(pageId: string): Promise<PageProperties>;
  listBlockChildren(blockId: string, cursor?: string | null): Promise<BlockChildrenPage>;
}
