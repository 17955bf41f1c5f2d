import { Client } from '@notionhq/client';
import { RawBlockListSchema } from '../schemas/index.js';
import type { BlockChildrenPage, PageProperties, PageSource } from '../types/index.js';
import { normalizeBlock } from './blocks.js';
import { parsePageProperties } from './properties.js';

type DatabaseQueryFilter = Parameters<Client['databases']['query']>[0]['filter'];

export interface NotionPageSourceOptions {
  auth: string;
  pageSize?: number;
}

/**
 * Page source backed by the Notion REST API.
 *
 * https://developers.notion.com/reference/post-database-query
 * https://developers.notion.com/reference/get-block-children
 */
export class NotionPageSource implements PageSource {
  private readonly client: Client;
  private readonly pageSize: number;

  constructor(options: NotionPageSourceOptions) {
    this.client = new Client({ auth: options.auth });
    this.pageSize = options.pageSize ?? 100;
  }

  async listPages(databaseId: string, modifiedSince?: Date): Promise<string[]> {
    const pageIds: string[] = [];
    const filter: DatabaseQueryFilter = modifiedSince
      ? {
          timestamp: 'last_edited_time',
          last_edited_time: { on_or_after: modifiedSince.toISOString() },
        }
      : undefined;
    let cursor: string | undefined;

    do {
      const response = await this.client.databases.query({
        database_id: databaseId,
        page_size: this.pageSize,
        start_cursor: cursor,
        filter,
      });

      for (const page of response.results) {
        pageIds.push(page.id);
      }
      cursor = response.has_more && response.next_cursor ? response.next_cursor : undefined;
    } while (cursor);

    return pageIds;
  }

  async getPageProperties(pageId: string): Promise<PageProperties> {
    const page = await this.client.pages.retrieve({ page_id: pageId });
    return parsePageProperties(page);
  }

  async listBlockChildren(blockId: string, cursor?: string | null): Promise<BlockChildrenPage> {
    const response = await this.client.blocks.children.list({
      block_id: blockId,
      page_size: this.pageSize,
      start_cursor: cursor ?? undefined,
    });
    const parsed = RawBlockListSchema.parse(response);

    return {
      blocks: parsed.results.map(normalizeBlock),
      hasMore: parsed.has_more,
      nextCursor: parsed.next_cursor,
    };
  }
}
