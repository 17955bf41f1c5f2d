import type { RawRichText } from '../schemas/index.js';
import type { RichTextRun } from '../types/index.js';

export function renderRichText(runs: readonly RichTextRun[]): string {
  return runs.map((run) => run.plainText).join('');
}

export function toRichTextRuns(raw: RawRichText): RichTextRun[] {
  return raw.map((item) => ({ plainText: item.plain_text, href: item.href }));
}
