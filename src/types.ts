/**
 * Arbitrary structured metadata attached to a page or block.
 */
export type PropertyMap = Record<string, unknown>;

/**
 * A single block in the outline being built from markdown.
 */
export interface BlockNode {
  /** Display text after list markers are stripped or rewritten */
  content: string;

  /** Nested blocks, in document order */
  children: BlockNode[];

  /** Attached metadata (empty unless a caller sets it) */
  properties: PropertyMap;

  /** Heading depth (1-6) for headings, indentation depth for list items */
  level: number;
}

/**
 * Result of parsing a markdown document.
 */
export interface ParsedDocument {
  /** Properties from the frontmatter block */
  properties: PropertyMap;

  /** Root-level blocks in first-appearance order */
  blocks: BlockNode[];

  /** Any parsing warnings or issues */
  warnings: string[];
}

/**
 * Nested record accepted by the note graph's batch-insert API.
 * Empty children and properties are omitted rather than sent empty.
 */
export interface BatchBlock {
  content: string;
  children?: BatchBlock[];
  properties?: PropertyMap;
}

/**
 * A parsed document in wire shape, ready for the API client.
 */
export interface SerializedDocument {
  properties: PropertyMap;
  blocks: BatchBlock[];
}
