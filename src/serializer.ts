import type { BatchBlock, BlockNode, ParsedDocument, SerializedDocument } from './types.js';

/**
 * Convert one block (and its subtree) to the batch-insert record shape.
 */
export function toBatchBlock(node: BlockNode): BatchBlock {
  const result: BatchBlock = { content: node.content };

  if (node.children.length > 0) {
    result.children = toBatchBlocks(node.children);
  }

  if (Object.keys(node.properties).length > 0) {
    result.properties = { ...node.properties };
  }

  return result;
}

export function toBatchBlocks(nodes: readonly BlockNode[]): BatchBlock[] {
  return nodes.map(toBatchBlock);
}

export function serializeDocument(doc: ParsedDocument): SerializedDocument {
  return {
    properties: doc.properties,
    blocks: toBatchBlocks(doc.blocks)
  };
}
