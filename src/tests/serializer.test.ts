import * as test from 'node:test';
import * as assert from 'node:assert';
import { serializeDocument, toBatchBlock, toBatchBlocks } from '../serializer.js';
import { parseContent } from '../parser.js';
import type { BlockNode } from '../types.js';

const { describe, it } = test;

function node(content: string, children: BlockNode[] = [], properties: Record<string, unknown> = {}): BlockNode {
  return { content, children, properties, level: 0 };
}

describe('toBatchBlock', () => {

  it('should emit only content for a leaf', () => {
    assert.deepStrictEqual(toBatchBlock(node('Leaf')), { content: 'Leaf' });
  });

  it('should include children recursively', () => {
    const tree = node('Parent', [node('Child', [node('Grandchild')])]);

    assert.deepStrictEqual(toBatchBlock(tree), {
      content: 'Parent',
      children: [{ content: 'Child', children: [{ content: 'Grandchild' }] }]
    });
  });

  it('should include properties only when present', () => {
    const result = toBatchBlock(node('With props', [], { status: 'active' }));

    assert.deepStrictEqual(result, { content: 'With props', properties: { status: 'active' } });
  });

  it('should not share the properties object with the source node', () => {
    const source = node('x', [], { a: 1 });
    const result = toBatchBlock(source);
    source.properties.a = 2;

    assert.deepStrictEqual(result.properties, { a: 1 });
  });

  it('should drop the level field', () => {
    const result = toBatchBlock({ content: 'Deep', children: [], properties: {}, level: 3 });

    assert.deepStrictEqual(Object.keys(result), ['content']);
  });
});

describe('toBatchBlocks', () => {

  it('should keep sibling order', () => {
    assert.deepStrictEqual(toBatchBlocks([node('a'), node('b'), node('c')]), [
      { content: 'a' },
      { content: 'b' },
      { content: 'c' }
    ]);
  });

  it('should return an empty list for no blocks', () => {
    assert.deepStrictEqual(toBatchBlocks([]), []);
  });
});

describe('serializeDocument', () => {

  it('should pair page properties with batch blocks', () => {
    const doc = parseContent('---\nstatus: draft\n---\n# Title\n- item');

    assert.deepStrictEqual(serializeDocument(doc), {
      properties: { status: 'draft' },
      blocks: [{ content: '# Title', children: [{ content: 'item' }] }]
    });
  });

  it('should produce JSON that round-trips unchanged', () => {
    const serialized = serializeDocument(parseContent('# A\n- b\n  - c'));

    assert.deepStrictEqual(JSON.parse(JSON.stringify(serialized)), serialized);
  });
});
