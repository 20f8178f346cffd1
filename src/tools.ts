/**
 * Named operations exposed to a calling agent.
 *
 * Each tool validates its arguments, talks to Logseq through the client and
 * answers with plain text meant to be read by a model.
 */

import * as z from 'zod';
import type { LogseqClient, BlockEntity, PageUpdate, SearchResult } from './logseq.js';
import { parseContent } from './parser.js';
import { serializeDocument } from './serializer.js';
import type { ParsedDocument, PropertyMap } from './types.js';
import { PageNotFoundError, ToolInputError } from './errors.js';

export interface ToolHandler {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  run(args: unknown): Promise<string>;
}

const EMPTY_DOCUMENT: ParsedDocument = { properties: {}, blocks: [], warnings: [] };

const PropertiesSchema = z.record(z.string(), z.unknown());

const CreatePageArgs = z.object({
  title: z.string().min(1),
  content: z.string().optional(),
  properties: PropertiesSchema.optional()
});

const UpdatePageArgs = z.object({
  page_name: z.string().min(1),
  content: z.string().optional(),
  mode: z.enum(['append', 'replace']).default('append'),
  properties: PropertiesSchema.optional()
});

const ListPagesArgs = z.object({
  include_journals: z.boolean().default(false)
});

const GetPageContentArgs = z.object({
  page_name: z.string().min(1),
  format: z.enum(['text', 'json']).default('text'),
  max_depth: z.number().int().min(-1).default(-1)
});

const DeletePageArgs = z.object({
  page_name: z.string().min(1)
});

const SearchArgs = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().default(20),
  include_blocks: z.boolean().default(true),
  include_pages: z.boolean().default(true),
  include_files: z.boolean().default(false)
});

function parseArgs<S extends z.ZodType>(toolName: string, schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map(issue => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    }).join('; ');
    throw new ToolInputError(`Invalid arguments for ${toolName}: ${detail}`);
  }
  return parsed.data;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Explicit properties win over frontmatter properties on key collision.
 */
export function mergeProperties(frontmatter: PropertyMap, explicit: PropertyMap = {}): PropertyMap {
  return { ...frontmatter, ...explicit };
}

function parseOptional(content: string | undefined): ParsedDocument {
  return content ? parseContent(content) : EMPTY_DOCUMENT;
}

/**
 * Render a block tree as an indented outline, one "- content" line per block.
 * maxDepth of -1 means unlimited.
 */
export function formatBlockTree(block: BlockEntity, indentLevel = 0, maxDepth = -1): string[] {
  const content = (block.content ?? '').trim();
  if (!content) {
    return [];
  }

  const lines = [`${'  '.repeat(indentLevel)}- ${content}`];
  const children = block.children ?? [];
  if (children.length > 0 && (maxDepth === -1 || indentLevel < maxDepth)) {
    for (const child of children) {
      lines.push(...formatBlockTree(child, indentLevel + 1, maxDepth));
    }
  }
  return lines;
}

function describeUpdate(update: PageUpdate): string {
  switch (update.type) {
    case 'cleared':
      return '  - Existing content cleared';
    case 'properties':
      return `  - ${Object.keys(update.properties).length} property/ies updated`;
    case 'blocks_replaced':
      return `  - ${update.count} block(s) added`;
    case 'blocks_appended':
      return `  - ${update.count} block(s) appended`;
  }
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

const SNIPPET_HIGHLIGHT_MARKS = ['$pfts_2lqh>$', '$<pfts_2lqh$'];

function stripHighlightMarks(snippet: string): string {
  return SNIPPET_HIGHLIGHT_MARKS.reduce((text, mark) => text.split(mark).join(''), snippet);
}

export function createTools(client: LogseqClient): ToolHandler[] {
  const createPage: ToolHandler = {
    name: 'create_page',
    description: `Create a new page in Logseq with properly structured blocks.

Markdown content is parsed into Logseq's block hierarchy:
- Headings (# ## ###) create nested sections
- Lists (- or 1.) become proper block trees
- Code blocks are preserved as single blocks
- YAML frontmatter (---) becomes page properties`,
    inputSchema: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Title of the new page' },
        content: { type: 'string', description: 'Markdown content to parse into blocks (optional)' },
        properties: {
          type: 'object',
          description: 'Page properties (merged with frontmatter if both provided)',
          additionalProperties: true
        }
      },
      required: ['title']
    },
    async run(args) {
      const { title, content, properties } = parseArgs('create_page', CreatePageArgs, args);
      const parsed = parseOptional(content);
      const doc = serializeDocument(parsed);
      const pageProperties = mergeProperties(doc.properties, properties);

      await client.createPageWithBlocks(title, doc.blocks, pageProperties);

      const lines = [`Successfully created page '${title}'`];
      if (doc.blocks.length > 0) {
        lines.push(`  - ${doc.blocks.length} top-level block(s) created`);
      }
      const propertyCount = Object.keys(pageProperties).length;
      if (propertyCount > 0) {
        lines.push(`  - ${propertyCount} page property/ies set`);
      }
      for (const warning of parsed.warnings) {
        lines.push(`  - Warning: ${warning}`);
      }
      return lines.join('\n');
    }
  };

  const updatePage: ToolHandler = {
    name: 'update_page',
    description: `Update a page in Logseq with new content and/or properties.

Supports two modes:
- append: Add new blocks after existing content (default)
- replace: Clear all existing blocks and add new content

Markdown is parsed into block hierarchy just like create_page.
YAML frontmatter in content is merged with explicit properties.`,
    inputSchema: {
      type: 'object',
      properties: {
        page_name: { type: 'string', description: 'Name of the page to update' },
        content: { type: 'string', description: 'Markdown content to add or replace with' },
        mode: {
          type: 'string',
          enum: ['append', 'replace'],
          default: 'append',
          description: 'append: add after existing content. replace: clear page and add new content.'
        },
        properties: {
          type: 'object',
          description: 'Page properties to set/update',
          additionalProperties: true
        }
      },
      required: ['page_name']
    },
    async run(args) {
      const { page_name: pageName, content, mode, properties } = parseArgs('update_page', UpdatePageArgs, args);
      const explicit = properties ?? {};

      if (!content && Object.keys(explicit).length === 0) {
        return "Error: Either 'content' or 'properties' must be provided for update";
      }

      const parsed = parseOptional(content);
      const doc = serializeDocument(parsed);
      const merged = mergeProperties(doc.properties, explicit);
      const pageProperties = Object.keys(merged).length > 0 ? merged : null;

      try {
        const result = await client.updatePageWithBlocks(pageName, doc.blocks, pageProperties, mode);
        const lines = [`Successfully updated page '${pageName}'`, ...result.updates.map(describeUpdate)];
        for (const warning of parsed.warnings) {
          lines.push(`  - Warning: ${warning}`);
        }
        lines.push(`Mode: ${mode}`);
        return lines.join('\n');
      } catch (err) {
        if (err instanceof PageNotFoundError) {
          return `Error: ${err.message}`;
        }
        console.error(`[Tools] Failed to update page: ${errorMessage(err)}`);
        return `Failed to update page '${pageName}': ${errorMessage(err)}`;
      }
    }
  };

  const listPages: ToolHandler = {
    name: 'list_pages',
    description: 'Lists all pages in a Logseq graph.',
    inputSchema: {
      type: 'object',
      properties: {
        include_journals: {
          type: 'boolean',
          description: 'Whether to include journal/daily notes in the list',
          default: false
        }
      },
      required: []
    },
    async run(args) {
      const { include_journals: includeJournals } = parseArgs('list_pages', ListPagesArgs, args);
      const pages = await client.listPages();

      const entries: string[] = [];
      for (const page of pages) {
        const isJournal = page['journal?'] ?? false;
        if (isJournal && !includeJournals) {
          continue;
        }
        const name = page.originalName || page.name || '<unknown>';
        entries.push(isJournal ? `- ${name} [journal]` : `- ${name}`);
      }
      entries.sort();

      const journalNote = includeJournals ? ' (including journal pages)' : ' (excluding journal pages)';
      return `Logseq Pages:\n\n${entries.join('\n')}\nTotal pages: ${entries.length}${journalNote}`;
    }
  };

  const getPageContent: ToolHandler = {
    name: 'get_page_content',
    description: 'Get the content of a specific page from Logseq.',
    inputSchema: {
      type: 'object',
      properties: {
        page_name: { type: 'string', description: 'Name of the page to retrieve' },
        format: {
          type: 'string',
          description: 'Output format (text or json)',
          enum: ['text', 'json'],
          default: 'text'
        },
        max_depth: {
          type: 'integer',
          description: 'Maximum nesting depth to display (default: -1 for unlimited)',
          default: -1
        }
      },
      required: ['page_name']
    },
    async run(args) {
      const { page_name: pageName, format, max_depth: maxDepth } = parseArgs('get_page_content', GetPageContentArgs, args);
      const result = await client.getPageContent(pageName);
      if (!result) {
        return `Page '${pageName}' not found.`;
      }

      if (format === 'json') {
        return JSON.stringify(result, null, 2);
      }

      if (result.blocks.length === 0) {
        return '-';
      }
      return result.blocks.flatMap(block => formatBlockTree(block, 0, maxDepth)).join('\n');
    }
  };

  const deletePage: ToolHandler = {
    name: 'delete_page',
    description: 'Delete a page from Logseq.',
    inputSchema: {
      type: 'object',
      properties: {
        page_name: { type: 'string', description: 'Name of the page to delete' }
      },
      required: ['page_name']
    },
    async run(args) {
      const { page_name: pageName } = parseArgs('delete_page', DeletePageArgs, args);
      try {
        const result = await client.deletePage(pageName);

        const lines = [`Successfully deleted page '${pageName}'`];
        const status = z.object({ success: z.boolean(), message: z.string().optional() }).safeParse(result);
        if (status.success && status.data.success) {
          lines.push(`Status: ${status.data.message ?? 'Deletion confirmed'}`);
        }
        lines.push(`Page '${pageName}' has been permanently removed from Logseq`);
        return lines.join('\n');
      } catch (err) {
        if (err instanceof PageNotFoundError) {
          return `Error: ${err.message}`;
        }
        console.error(`[Tools] Failed to delete page: ${errorMessage(err)}`);
        return `Failed to delete page '${pageName}': ${errorMessage(err)}`;
      }
    }
  };

  const search: ToolHandler = {
    name: 'search',
    description: 'Search for content across Logseq pages, blocks, and files',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query text' },
        limit: { type: 'integer', description: 'Maximum number of results to return', default: 20 },
        include_blocks: { type: 'boolean', description: 'Include block content results', default: true },
        include_pages: { type: 'boolean', description: 'Include page name results', default: true },
        include_files: { type: 'boolean', description: 'Include file name results', default: false }
      },
      required: ['query']
    },
    async run(args) {
      const {
        query,
        limit,
        include_blocks: includeBlocks,
        include_pages: includePages,
        include_files: includeFiles
      } = parseArgs('search', SearchArgs, args);

      let result: SearchResult | null;
      try {
        result = await client.search(query, { limit });
      } catch (err) {
        console.error(`[Tools] Failed to search: ${errorMessage(err)}`);
        return `Search failed: ${errorMessage(err)}`;
      }
      if (!result) {
        return `No search results found for '${query}'`;
      }

      const parts = [`# Search Results for '${query}'\n`];
      const blocks = result.blocks ?? [];
      const snippets = result['pages-content'] ?? [];
      const pages = result.pages ?? [];
      const files = result.files ?? [];

      if (includeBlocks && blocks.length > 0) {
        parts.push(`## Content Blocks (${blocks.length} found)`);
        blocks.slice(0, limit).forEach((block, i) => {
          const content = (block['block/content'] ?? '').trim();
          if (content) {
            parts.push(`${i + 1}. ${truncate(content, 150)}`);
          }
        });
        parts.push('');
      }

      if (includeBlocks && snippets.length > 0) {
        parts.push(`## Page Snippets (${snippets.length} found)`);
        snippets.slice(0, limit).forEach((snippet, i) => {
          const text = stripHighlightMarks((snippet['block/snippet'] ?? '').trim());
          if (text) {
            parts.push(`${i + 1}. ${truncate(text, 200)}`);
          }
        });
        parts.push('');
      }

      if (includePages && pages.length > 0) {
        parts.push(`## Matching Pages (${pages.length} found)`);
        for (const page of pages) {
          parts.push(`- ${page}`);
        }
        parts.push('');
      }

      if (includeFiles && files.length > 0) {
        parts.push(`## Matching Files (${files.length} found)`);
        for (const file of files) {
          parts.push(`- ${file}`);
        }
        parts.push('');
      }

      if (result['has-more?']) {
        parts.push('*More results available - increase limit to see more*');
      }

      const total = blocks.length + pages.length + files.length;
      parts.push(`\n**Total results found: ${total}**`);
      return parts.join('\n');
    }
  };

  return [createPage, updatePage, listPages, getPageContent, deletePage, search];
}
