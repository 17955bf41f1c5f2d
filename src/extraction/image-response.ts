import type { ImageClassification } from '../types/index.js';

export interface ParsedImageResponse {
  classification: ImageClassification;
  description: string;
  code: string;
}

type Section = 'description' | 'code' | null;

const FENCE = '```';
const LANGUAGE_TAG = /^[A-Za-z0-9_+#.-]{1,19}$/;

function classify(value: string): ImageClassification {
  const lower = value.toLowerCase();
  if (lower.includes('terminal')) return 'terminal';
  if (lower.includes('diagram')) return 'diagram';
  return 'other';
}

function markerValue(line: string, marker: string): string | null {
  return line.toUpperCase().startsWith(marker) ? line.slice(marker.length).trim() : null;
}

/** Remove one layer of ``` fences and a leading language tag, when the block is fully fenced. */
export function stripCodeFence(code: string): string {
  if (code.length < FENCE.length * 2 || !code.startsWith(FENCE) || !code.endsWith(FENCE)) {
    return code;
  }

  let inner = code.slice(FENCE.length, code.length - FENCE.length);
  const firstNewline = inner.indexOf('\n');
  if (firstNewline !== -1) {
    const firstLine = inner.slice(0, firstNewline).trim();
    if (LANGUAGE_TAG.test(firstLine)) {
      inner = inner.slice(firstNewline + 1);
    }
  }
  return inner.trim();
}

/**
 * Parse a `TYPE:` / `DESCRIPTION:` / `CODE:` reply. Section bodies run until
 * the next marker. A reply with neither description nor code becomes the
 * description verbatim.
 */
export function parseImageResponse(raw: string): ParsedImageResponse {
  let classification: ImageClassification = 'other';
  let section: Section = null;
  const descriptionLines: string[] = [];
  const codeLines: string[] = [];

  for (const line of raw.trim().split('\n')) {
    const stripped = line.trim();

    const typeValue = markerValue(stripped, 'TYPE:');
    if (typeValue !== null) {
      classification = classify(typeValue);
      section = null;
      continue;
    }

    const descriptionValue = markerValue(stripped, 'DESCRIPTION:');
    if (descriptionValue !== null) {
      descriptionLines.push(descriptionValue);
      section = 'description';
      continue;
    }

    const codeValue = markerValue(stripped, 'CODE:');
    if (codeValue !== null) {
      if (codeValue) codeLines.push(codeValue);
      section = 'code';
      continue;
    }

    if (section === 'description') {
      descriptionLines.push(line.trimEnd());
    } else if (section === 'code') {
      codeLines.push(line.trimEnd());
    }
  }

  let description = descriptionLines.join('\n').trim();
  const code = stripCodeFence(codeLines.join('\n').trim());

  if (!description && !code) {
    description = raw.trim();
  }

  return { classification, description, code };
}
