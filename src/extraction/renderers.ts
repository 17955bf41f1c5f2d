import { renderRichText } from '../notion/rich-text.js';
import type {
  Block,
  BlockKind,
  BlockPayloads,
  ImageAnalysisRecord,
  ImageAnalysisService,
  RichTextRun,
} from '../types/index.js';

/**
 * How the walker treats a block's children after rendering it:
 * `nested` recurses one level deeper, `same-depth` recurses without
 * indenting (transparent containers), `none` leaves them alone.
 */
export type ChildMode = 'nested' | 'same-depth' | 'none';

export interface RenderContext {
  indent: string;
  images: ImageAnalysisService;
}

export interface RenderOutcome {
  lines: string[];
  children: ChildMode;
  imageCost?: number;
  image?: ImageAnalysisRecord;
}

type Renderer<K extends BlockKind> = (
  data: BlockPayloads[K],
  context: RenderContext
) => RenderOutcome | Promise<RenderOutcome>;

export type RendererTable = { [K in BlockKind]: Renderer<K> };

const FENCE = '```';

function nested(lines: string[]): RenderOutcome {
  return { lines, children: 'nested' };
}

const transparent = (): RenderOutcome => ({ lines: [], children: 'same-depth' });

function prefixed(prefix: string) {
  return (data: { richText: RichTextRun[] }, { indent }: RenderContext): RenderOutcome => {
    const text = renderRichText(data.richText);
    return nested(text ? [`${indent}${prefix}${text}`] : []);
  };
}

function heading(level: 1 | 2 | 3) {
  return (data: { richText: RichTextRun[] }): RenderOutcome => {
    const text = renderRichText(data.richText);
    return nested(text ? [`\n${'#'.repeat(level)} ${text}`] : []);
  };
}

async function renderImage(data: BlockPayloads['image'], { indent, images }: RenderContext): Promise<RenderOutcome> {
  const caption = renderRichText(data.caption);
  const placeholder = caption ? `${indent}[IMAGE: ${caption}]` : `${indent}[IMAGE]`;

  if (!data.url) {
    return { lines: [placeholder], children: 'none' };
  }

  const result = await images.analyze(data.url, caption);

  if (!result.success) {
    return {
      lines: [placeholder, `${indent}${result.error}`],
      children: 'none',
      imageCost: 0,
      image: {
        url: data.url,
        caption,
        classification: 'error',
        cost: 0,
        elapsedMs: result.elapsedMs,
        descriptionPreview: result.error.substring(0, 100),
      },
    };
  }

  const { classification, description, code } = result;
  const lines: string[] = [];

  if (classification === 'terminal') {
    if (description) lines.push(`\n${indent}${description}`);
    if (code) lines.push(`\n${indent}${FENCE}\n${code}\n${indent}${FENCE}\n`);
  } else {
    const label = caption ? `Image: ${caption}` : 'Image';
    if (description) {
      lines.push(`\n\n${indent}**[${label}]**\n${indent}${description}\n${indent}**[/${label}]**\n\n`);
    }
    if (code) lines.push(`${indent}${FENCE}\n${code}\n${indent}${FENCE}\n`);
  }

  return {
    lines,
    children: 'none',
    imageCost: result.cost,
    image: {
      url: data.url,
      caption,
      classification,
      cost: result.cost,
      elapsedMs: result.elapsedMs,
      descriptionPreview: description.substring(0, 100),
    },
  };
}

export const RENDERERS: RendererTable = {
  paragraph: prefixed(''),
  quote: prefixed('> '),
  callout: prefixed('> [!NOTE] '),
  toggle: prefixed('▶ '),
  bulleted_list_item: prefixed('- '),
  numbered_list_item: prefixed('1. '),
  to_do: (data, context) => prefixed(data.checked ? '- [x] ' : '- [ ] ')(data, context),
  heading_1: heading(1),
  heading_2: heading(2),
  heading_3: heading(3),

  code: (data, { indent }) => {
    const text = renderRichText(data.richText);
    if (!text) return nested([]);
    const caption = renderRichText(data.caption);
    const lines = [`${indent}${FENCE}${data.language}`, text, `${indent}${FENCE}`];
    if (caption) lines.push(`${indent}[Code description: ${caption}]`);
    return nested(lines);
  },

  table: transparent,
  table_row: (data, { indent }) => nested([`${indent}| ${data.cells.map(renderRichText).join(' | ')} |`]),
  divider: (_data, { indent }) => nested([`${indent}---`]),
  image: renderImage,

  bookmark: (data, { indent }) => {
    const caption = renderRichText(data.caption);
    if (caption) return nested([`${indent}[REF: ${caption} - ${data.url}]`]);
    return nested(data.url ? [`${indent}[REF: ${data.url}]`] : []);
  },
  link_preview: (data, { indent }) => nested(data.url ? [`${indent}[LINK: ${data.url}]`] : []),

  file: (data, { indent }) =>
    nested([`${indent}[FILE: ${data.name || renderRichText(data.caption) || 'attachment'}]`]),
  pdf: (data, { indent }) =>
    nested([`${indent}[FILE: ${data.name || renderRichText(data.caption) || 'attachment'}]`]),

  child_page: (data, { indent }) => nested([`${indent}[CHILD PAGE: ${data.title}]`]),
  child_database: (data, { indent }) => nested([`${indent}[CHILD DB: ${data.title}]`]),

  column_list: transparent,
  column: transparent,
  synced_block: transparent,

  // Contributes no text of its own; children still go through generic recursion.
  unsupported: () => nested([]),
};

function dispatch<K extends BlockKind>(
  kind: K,
  data: BlockPayloads[K],
  context: RenderContext
): RenderOutcome | Promise<RenderOutcome> {
  return RENDERERS[kind](data, context);
}

export function renderBlock(block: Block, context: RenderContext): RenderOutcome | Promise<RenderOutcome> {
  return dispatch(block.kind, block.data, context);
}
