import type { BlockNode, ParsedDocument } from './types.js';
import { extractFrontmatter } from './frontmatter.js';
import {
  type LineClass,
  type ListItemClass,
  classifyLine,
  indentDepth,
  isFenceClose,
  isListItem,
  endsListScan,
  breaksParagraph,
  listItemContent
} from './classifier.js';

/**
 * A finished list item plus the index of the first line it did not consume
 */
interface ListItemResult {
  node: BlockNode;
  next: number;
}

function createNode(content: string, level: number): BlockNode {
  return { content, children: [], properties: {}, level };
}

/**
 * Build the block forest for a markdown body (frontmatter already removed).
 *
 * Headings open sections: content that follows becomes a child of the
 * innermost open heading, and a heading closes every open heading of the
 * same or deeper level. List items nest purely by indentation.
 */
export function buildBlockTree(body: string): BlockNode[] {
  const lines = body.split('\n');
  const classes: LineClass[] = lines.map(classifyLine);
  const roots: BlockNode[] = [];
  // Open headings, outermost first
  const headingStack: BlockNode[] = [];

  function attach(node: BlockNode): void {
    const parent = headingStack[headingStack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }

  function openHeading(node: BlockNode): void {
    while (headingStack.length > 0 && headingStack[headingStack.length - 1].level >= node.level) {
      headingStack.pop();
    }
    attach(node);
    headingStack.push(node);
  }

  function consumeFence(start: number): number {
    const codeLines = [lines[start]];
    let i = start + 1;
    while (i < lines.length) {
      codeLines.push(lines[i]);
      if (isFenceClose(lines[i])) break;
      i++;
    }
    attach(createNode(codeLines.join('\n'), 0));
    return i + 1;
  }

  function consumeQuote(start: number): number {
    const quoteLines: string[] = [];
    let i = start;
    while (i < lines.length && classes[i].kind === 'quote') {
      quoteLines.push(lines[i].trimEnd());
      i++;
    }
    attach(createNode(quoteLines.join('\n'), 0));
    return i;
  }

  function consumeParagraph(start: number): number {
    const paragraphLines = [lines[start].trim()];
    let i = start + 1;
    while (i < lines.length) {
      const cls = classes[i];
      if (cls.kind === 'blank' || breaksParagraph(cls)) break;
      paragraphLines.push(lines[i].trim());
      i++;
    }
    attach(createNode(paragraphLines.join(' '), 0));
    return i;
  }

  function parseListItem(start: number, cls: ListItemClass): ListItemResult {
    const depth = indentDepth(lines[start]);
    const node = createNode(listItemContent(cls), depth);

    let i = start + 1;
    while (i < lines.length) {
      const next = classes[i];
      if (next.kind === 'blank') {
        i++;
        continue;
      }

      const nextDepth = indentDepth(lines[i]);
      if (nextDepth <= depth || endsListScan(next)) break;

      if (isListItem(next)) {
        const nested = parseListItem(i, next);
        node.children.push(nested.node);
        i = nested.next;
      } else {
        // Continuation text under this item; not parsed further
        node.children.push(createNode(lines[i].trim(), nextDepth));
        i++;
      }
    }

    return { node, next: i };
  }

  let i = 0;
  while (i < lines.length) {
    const cls = classes[i];
    switch (cls.kind) {
      case 'blank':
        i++;
        break;
      case 'fence':
        i = consumeFence(i);
        break;
      case 'heading':
        openHeading(createNode(cls.text, cls.level));
        i++;
        break;
      case 'rule':
        attach(createNode('---', 0));
        i++;
        break;
      case 'quote':
        i = consumeQuote(i);
        break;
      case 'checkbox':
      case 'bullet':
      case 'numbered':
      case 'marker': {
        const item = parseListItem(i, cls);
        attach(item.node);
        i = item.next;
        break;
      }
      case 'paragraph':
        i = consumeParagraph(i);
        break;
    }
  }

  return roots;
}

/**
 * Parse a markdown body (no frontmatter handling) into root blocks.
 */
export function parseMarkdownToBlocks(body: string): BlockNode[] {
  if (!body.trim()) return [];
  return buildBlockTree(body);
}

/**
 * Parse a full document: frontmatter becomes properties, the rest blocks.
 */
export function parseContent(content: string): ParsedDocument {
  // Normalize line endings (handle Windows \r\n)
  const text = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  if (!text.trim()) {
    return { properties: {}, blocks: [], warnings: [] };
  }

  const { properties, body, warning } = extractFrontmatter(text);
  return {
    properties,
    blocks: parseMarkdownToBlocks(body),
    warnings: warning ? [warning] : []
  };
}
