/**
 * Client for the Logseq HTTP API server.
 *
 * Every call is a POST to {apiUrl}/api with a body of { method, args },
 * where method is a plugin API name such as logseq.Editor.getPage.
 */

import * as z from 'zod';
import type { BatchBlock, PropertyMap } from './types.js';
import { LogseqApiError, PageNotFoundError } from './errors.js';

export interface BlockEntity {
  uuid?: string;
  content?: string;
  properties?: PropertyMap;
  children?: BlockEntity[];
}

const BlockEntitySchema: z.ZodType<BlockEntity> = z.lazy(() => z.object({
  uuid: z.string().optional(),
  content: z.string().optional(),
  properties: z.record(z.string(), z.unknown()).optional(),
  children: z.array(BlockEntitySchema).optional()
}));

const PageEntitySchema = z.object({
  name: z.string().optional(),
  originalName: z.string().optional(),
  uuid: z.string().optional(),
  'journal?': z.boolean().optional()
});

export type PageEntity = z.infer<typeof PageEntitySchema>;

const SearchResultSchema = z.object({
  blocks: z.array(z.object({ 'block/content': z.string().optional() })).optional(),
  'pages-content': z.array(z.object({ 'block/snippet': z.string().optional() })).optional(),
  pages: z.array(z.string()).optional(),
  files: z.array(z.string()).optional(),
  'has-more?': z.boolean().optional()
});

export type SearchResult = z.infer<typeof SearchResultSchema>;

const RecordSchema = z.record(z.string(), z.unknown());

export interface PageContent {
  page: PropertyMap;
  blocks: BlockEntity[];
}

export type UpdateMode = 'append' | 'replace';

export type PageUpdate =
  | { type: 'cleared' }
  | { type: 'blocks_replaced'; count: number }
  | { type: 'blocks_appended'; count: number }
  | { type: 'properties'; properties: PropertyMap };

export interface PageUpdateResult {
  page: string;
  updates: PageUpdate[];
}

export interface LogseqClientOptions {
  /** Base URL of the API server, without the /api suffix */
  apiUrl: string;
  apiToken: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  /** Fetch implementation (defaults to the global fetch) */
  fetch?: typeof fetch;
}

const LIST_PROPERTY_KEYS = new Set(['tags', 'alias', 'aliases']);

function pageDisplayName(page: PageEntity): string | undefined {
  return page.originalName || page.name;
}

/**
 * tags/alias given as { name: true } mappings become the list of truthy keys.
 */
export function normalizePropertyValue(key: string, value: unknown): unknown {
  if (LIST_PROPERTY_KEYS.has(key) && typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.entries(value).filter(([, enabled]) => Boolean(enabled)).map(([name]) => name);
  }
  return value;
}

export class LogseqClient {
  private readonly endpoint: string;
  private readonly apiToken: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: LogseqClientOptions) {
    this.endpoint = `${options.apiUrl.replace(/\/+$/, '')}/api`;
    this.apiToken = options.apiToken;
    this.timeoutMs = options.timeoutMs ?? 6000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Invoke one API method and return the decoded JSON result.
   */
  async call(method: string, args: unknown[]): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiToken}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({ method, args }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Logseq] ${method} failed: ${message}`);
      throw new LogseqApiError(`Logseq request ${method} failed: ${message}`);
    }

    const text = await response.text();
    if (!response.ok) {
      console.error(`[Logseq] ${method} returned ${response.status}`);
      throw new LogseqApiError(`Logseq request ${method} failed (${response.status}): ${text}`, response.status);
    }

    if (!text) {
      return null;
    }
    try {
      const result: unknown = JSON.parse(text);
      return result;
    } catch {
      throw new LogseqApiError(`Logseq request ${method} returned invalid JSON`);
    }
  }

  private async callParsed<S extends z.ZodType>(method: string, args: unknown[], schema: S): Promise<z.output<S>> {
    const raw = await this.call(method, args);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new LogseqApiError(`Unexpected response from ${method}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
  }

  async listPages(): Promise<PageEntity[]> {
    console.log('[Logseq] Listing pages');
    const pages = await this.callParsed('logseq.Editor.getAllPages', [], z.array(PageEntitySchema).nullable());
    return pages ?? [];
  }

  async pageExists(pageName: string): Promise<boolean> {
    const pages = await this.listPages();
    return pages.some(page => pageDisplayName(page) === pageName);
  }

  async getPage(pageName: string): Promise<PropertyMap | null> {
    return this.callParsed('logseq.Editor.getPage', [pageName], RecordSchema.nullable());
  }

  async getPageBlocks(pageName: string): Promise<BlockEntity[]> {
    const blocks = await this.callParsed('logseq.Editor.getPageBlocksTree', [pageName], z.array(BlockEntitySchema).nullable());
    return blocks ?? [];
  }

  /**
   * Page metadata plus its block tree. Page properties live on the first block.
   */
  async getPageContent(pageName: string): Promise<PageContent | null> {
    console.log(`[Logseq] Getting content for page '${pageName}'`);
    const page = await this.getPage(pageName);
    if (!page) {
      console.warn(`[Logseq] Page '${pageName}' not found`);
      return null;
    }

    const blocks = await this.getPageBlocks(pageName);
    const properties = blocks[0]?.properties ?? {};
    return { page: { ...page, properties }, blocks };
  }

  async search(query: string, options: { limit?: number } = {}): Promise<SearchResult | null> {
    console.log(`[Logseq] Searching for '${query}'`);
    return this.callParsed('logseq.search', [query, options], SearchResultSchema.nullable());
  }

  async deletePage(pageName: string): Promise<unknown> {
    console.log(`[Logseq] Deleting page '${pageName}'`);
    if (!await this.pageExists(pageName)) {
      throw new PageNotFoundError(pageName);
    }
    const result = await this.call('logseq.Editor.deletePage', [pageName]);
    console.log(`[Logseq] Deleted page '${pageName}'`);
    return result;
  }

  async removeBlock(blockUuid: string): Promise<void> {
    await this.call('logseq.Editor.removeBlock', [blockUuid]);
  }

  async clearPageContent(pageName: string): Promise<number> {
    const blocks = await this.getPageBlocks(pageName);
    for (const block of blocks) {
      if (block.uuid) {
        await this.removeBlock(block.uuid);
      }
    }
    console.log(`[Logseq] Cleared ${blocks.length} blocks from page '${pageName}'`);
    return blocks.length;
  }

  /**
   * Insert a tree of blocks next to (or under) an anchor block.
   */
  async insertBatchBlock(anchorUuid: string, blocks: BatchBlock[], options: { sibling: boolean } = { sibling: true }): Promise<unknown> {
    console.log(`[Logseq] Inserting batch of ${blocks.length} blocks`);
    return this.call('logseq.Editor.insertBatchBlock', [anchorUuid, blocks, { sibling: options.sibling }]);
  }

  async appendBlockInPage(pageName: string, content: string, properties?: PropertyMap): Promise<BlockEntity | null> {
    const args: unknown[] = [pageName, content];
    if (properties && Object.keys(properties).length > 0) {
      args.push({ properties });
    }
    return this.callParsed('logseq.Editor.appendBlockInPage', args, BlockEntitySchema.nullable());
  }

  /**
   * Fallback when there is no anchor block: append each block, then its
   * children, at the end of the page.
   */
  private async appendBlockRecursive(pageName: string, block: BatchBlock): Promise<void> {
    await this.appendBlockInPage(pageName, block.content, block.properties);
    for (const child of block.children ?? []) {
      await this.appendBlockRecursive(pageName, child);
    }
  }

  async createPageWithBlocks(title: string, blocks: BatchBlock[], properties: PropertyMap = {}): Promise<unknown> {
    console.log(`[Logseq] Creating page '${title}' with ${blocks.length} blocks`);
    const page = await this.call('logseq.Editor.createPage', [title, {}, { createFirstBlock: true }]);

    if (blocks.length > 0) {
      const pageBlocks = await this.getPageBlocks(title);
      const placeholder = pageBlocks[0];
      if (placeholder) {
        if (placeholder.uuid) {
          await this.insertBatchBlock(placeholder.uuid, blocks, { sibling: true });
          await this.removeBlock(placeholder.uuid);
        }
      } else {
        console.warn('[Logseq] No first block found, appending blocks one by one');
        for (const block of blocks) {
          await this.appendBlockRecursive(title, block);
        }
      }
    }

    // Properties go on the first block, so they are set after the blocks exist
    if (Object.keys(properties).length > 0) {
      await this.updatePageProperties(title, properties);
    }

    return page;
  }

  async updatePageWithBlocks(
    pageName: string,
    blocks: BatchBlock[],
    properties: PropertyMap | null = null,
    mode: UpdateMode = 'append'
  ): Promise<PageUpdateResult> {
    console.log(`[Logseq] Updating page '${pageName}' with ${blocks.length} blocks (mode=${mode})`);
    if (!await this.pageExists(pageName)) {
      throw new PageNotFoundError(pageName);
    }

    const updates: PageUpdate[] = [];

    if (mode === 'replace') {
      await this.clearPageContent(pageName);
      updates.push({ type: 'cleared' });
    }

    if (blocks.length > 0) {
      if (mode === 'replace') {
        const [first, ...rest] = blocks;
        const anchor = await this.appendBlockInPage(pageName, first.content, first.properties);
        const anchorUuid = anchor?.uuid;
        if (anchorUuid) {
          if (first.children && first.children.length > 0) {
            await this.insertBatchBlock(anchorUuid, first.children, { sibling: false });
          }
          if (rest.length > 0) {
            await this.insertBatchBlock(anchorUuid, rest, { sibling: true });
          }
        }
        updates.push({ type: 'blocks_replaced', count: blocks.length });
      } else {
        const pageBlocks = await this.getPageBlocks(pageName);
        const last = pageBlocks[pageBlocks.length - 1];
        if (last) {
          if (last.uuid) {
            await this.insertBatchBlock(last.uuid, blocks, { sibling: true });
            updates.push({ type: 'blocks_appended', count: blocks.length });
          }
        } else {
          for (const block of blocks) {
            await this.appendBlockRecursive(pageName, block);
          }
          updates.push({ type: 'blocks_appended', count: blocks.length });
        }
      }
    }

    if (properties && Object.keys(properties).length > 0) {
      // Append merges with what is there; replace sets only the new ones
      const target = mode === 'append'
        ? { ...await this.getPageProperties(pageName), ...properties }
        : properties;
      await this.updatePageProperties(pageName, target);
      updates.push({ type: 'properties', properties: target });
    }

    return { page: pageName, updates };
  }

  async getPageProperties(pageName: string): Promise<PropertyMap> {
    const blocks = await this.getPageBlocks(pageName);
    return blocks[0]?.properties ?? {};
  }

  async updatePageProperties(pageName: string, properties: PropertyMap): Promise<void> {
    const blocks = await this.getPageBlocks(pageName);
    const firstUuid = blocks[0]?.uuid;
    if (!firstUuid) {
      console.warn(`[Logseq] Page '${pageName}' has no first block, cannot set properties`);
      return;
    }

    for (const [key, value] of Object.entries(properties)) {
      await this.upsertBlockProperty(firstUuid, key, normalizePropertyValue(key, value));
    }
    console.log(`[Logseq] Updated ${Object.keys(properties).length} properties on page '${pageName}'`);
  }

  async upsertBlockProperty(blockUuid: string, key: string, value: unknown): Promise<void> {
    await this.call('logseq.Editor.upsertBlockProperty', [blockUuid, key, value]);
  }
}
