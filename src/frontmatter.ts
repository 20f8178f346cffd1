import { DEFAULT_SCHEMA, Type, YAMLException, load, types } from 'js-yaml';
import type { PropertyMap } from './types.js';

const DELIMITER = '---';

/**
 * Result of splitting frontmatter off a document
 */
export interface FrontmatterResult {
  /** Parsed key/value header (empty when absent or unusable) */
  properties: PropertyMap;
  /** Text after the closing delimiter, or the whole input when nothing was stripped */
  body: string;
  /** Set when a frontmatter block was present but could not be used */
  warning?: string;
}

function isDelimiter(line: string): boolean {
  return line.trimEnd() === DELIMITER;
}

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * YAML timestamps load as ISO-8601 strings. A date-only scalar stays
 * `YYYY-MM-DD`; anything with a time of day becomes `Date#toISOString()`.
 */
const timestampAsText = new Type('tag:yaml.org,2002:timestamp', {
  kind: 'scalar',
  resolve: (data: string) => types.timestamp.resolve(data),
  construct: (data: string) => {
    if (DATE_ONLY.test(data)) {
      return data;
    }
    const value: unknown = types.timestamp.construct(data);
    return value instanceof Date ? value.toISOString() : value;
  }
});

const FRONTMATTER_SCHEMA = DEFAULT_SCHEMA.extend({ implicit: [timestampAsText] });

function unusable(content: string, warning: string): FrontmatterResult {
  console.warn(`[Frontmatter] ${warning}`);
  return { properties: {}, body: content, warning };
}

/**
 * Split a leading YAML frontmatter block off a document.
 *
 * Only a block opened on the very first line counts. A malformed or
 * non-mapping block leaves the whole input untouched.
 */
export function extractFrontmatter(content: string): FrontmatterResult {
  const lines = content.split('\n');
  if (!isDelimiter(lines[0])) {
    return { properties: {}, body: content };
  }

  let closing = -1;
  for (let i = 1; i < lines.length; i++) {
    if (isDelimiter(lines[i])) {
      closing = i;
      break;
    }
  }
  if (closing === -1) {
    return { properties: {}, body: content };
  }

  const yamlText = lines.slice(1, closing).join('\n');
  const body = lines.slice(closing + 1).join('\n');

  let loaded: unknown;
  try {
    loaded = load(yamlText, { schema: FRONTMATTER_SCHEMA });
  } catch (err) {
    if (err instanceof YAMLException) {
      return unusable(content, `Failed to parse YAML frontmatter: ${err.reason || err.message}`);
    }
    throw err;
  }

  if (loaded === undefined || loaded === null) {
    return { properties: {}, body };
  }
  if (!isMapping(loaded)) {
    const kind = Array.isArray(loaded) ? 'array' : typeof loaded;
    return unusable(content, `Frontmatter is not a mapping, ignoring: ${kind}`);
  }

  // fromEntries defines own keys, so a `__proto__` key survives as data
  const properties: PropertyMap = Object.fromEntries(Object.entries(loaded));
  return { properties, body };
}
