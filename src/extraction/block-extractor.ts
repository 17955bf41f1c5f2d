import type { Logger } from 'winston';
import type { Block, ExtractedDocument, ImageAnalysisService, PageSource } from '../types/index.js';
import { renderBlock } from './renderers.js';

export interface BlockTreeExtractorOptions {
  source: PageSource;
  images: ImageAnalysisService;
  /** Recursion levels below the root before a subtree is cut off. */
  maxDepth?: number;
  logger?: Logger;
}

interface WalkState {
  imageCost: number;
  images: ExtractedDocument['images'];
  /** Ids on the path from the root to the block being walked. */
  ancestors: Set<string>;
}

/**
 * Renders a page's block tree into one normalized text body, depth first and
 * in source order. Image blocks are analyzed as they are reached and their
 * cost is summed into the result.
 */
export class BlockTreeExtractor {
  private readonly source: PageSource;
  private readonly images: ImageAnalysisService;
  private readonly maxDepth: number;
  private readonly logger: Logger | undefined;

  constructor(options: BlockTreeExtractorOptions) {
    this.source = options.source;
    this.images = options.images;
    this.maxDepth = options.maxDepth ?? 32;
    this.logger = options.logger;
  }

  async extract(rootBlockId: string, depth = 0): Promise<ExtractedDocument> {
    const state: WalkState = { imageCost: 0, images: [], ancestors: new Set([rootBlockId]) };
    const text = await this.walk(rootBlockId, depth, 0, state);
    return { text, imageCost: state.imageCost, images: state.images };
  }

  private async *children(blockId: string): AsyncGenerator<Block> {
    let cursor: string | null = null;
    do {
      const page = await this.source.listBlockChildren(blockId, cursor);
      yield* page.blocks;
      cursor = page.hasMore ? page.nextCursor : null;
    } while (cursor);
  }

  private async walk(blockId: string, depth: number, level: number, state: WalkState): Promise<string> {
    const indent = '  '.repeat(depth);
    const texts: string[] = [];

    for await (const block of this.children(blockId)) {
      if (block.kind === 'unsupported') {
        this.logger?.debug(`Unsupported block type ${block.data.type}`, { blockId: block.id });
      }

      const outcome = await renderBlock(block, { indent, images: this.images });
      texts.push(...outcome.lines);
      if (outcome.imageCost) state.imageCost += outcome.imageCost;
      if (outcome.image) state.images.push(outcome.image);

      if (!block.hasChildren || outcome.children === 'none') continue;

      if (level + 1 > this.maxDepth) {
        this.logger?.warn('Block tree too deep, skipping children', { blockId: block.id, level: level + 1 });
        continue;
      }
      if (state.ancestors.has(block.id)) {
        this.logger?.warn('Block cycle detected, skipping children', { blockId: block.id });
        continue;
      }

      const childDepth = outcome.children === 'same-depth' ? depth : depth + 1;
      state.ancestors.add(block.id);
      try {
        const childText = await this.walk(block.id, childDepth, level + 1, state);
        if (childText) texts.push(childText);
      } finally {
        state.ancestors.delete(block.id);
      }
    }

    return texts.join('\n');
  }
}
