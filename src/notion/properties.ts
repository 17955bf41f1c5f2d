import { RawPageSchema, RawRichTextSchema, RawSelectSchema } from '../schemas/index.js';
import type { PageProperties, PropertyValue } from '../types/index.js';
import { renderRichText, toRichTextRuns } from './rich-text.js';

function propertyValue(type: string, payload: unknown): PropertyValue | null {
  switch (type) {
    case 'select': {
      const parsed = RawSelectSchema.nullable().safeParse(payload);
      return parsed.success && parsed.data ? parsed.data.name : null;
    }
    case 'multi_select': {
      const parsed = RawSelectSchema.array().safeParse(payload);
      return parsed.success ? parsed.data.map((option) => option.name) : null;
    }
    case 'url':
      return typeof payload === 'string' ? payload : '';
    case 'rich_text': {
      const parsed = RawRichTextSchema.safeParse(payload);
      return parsed.success ? renderRichText(toRichTextRuns(parsed.data)) : null;
    }
    default:
      return null;
  }
}

/** Flatten a page object into its id, edit fingerprint, title and simple named properties. */
export function parsePageProperties(value: unknown): PageProperties {
  const page = RawPageSchema.parse(value);
  const result: PageProperties = {
    pageId: page.id,
    lastEdited: page.last_edited_time,
    title: '',
    properties: {},
  };

  for (const [name, property] of Object.entries(page.properties)) {
    const payload = property[property.type];

    if (property.type === 'title') {
      const parsed = RawRichTextSchema.safeParse(payload);
      result.title = parsed.success ? renderRichText(toRichTextRuns(parsed.data)) : '';
      continue;
    }

    const flattened = propertyValue(property.type, payload);
    if (flattened !== null) {
      result.properties[name] = flattened;
    }
  }

  return result;
}
