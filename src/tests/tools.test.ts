import * as test from 'node:test';
import * as assert from 'node:assert';
import { createTools, formatBlockTree, mergeProperties, type ToolHandler } from '../tools.js';
import { ToolInputError } from '../errors.js';
import { parseContent } from '../parser.js';
import { FakeLogseqApi } from './fake-logseq.js';

const { describe, it } = test;

function toolFor(api: FakeLogseqApi, name: string): ToolHandler {
  const tool = createTools(api.client()).find(t => t.name === name);
  assert.ok(tool, `missing tool ${name}`);
  return tool;
}

describe('createTools', () => {

  it('should expose the six page tools', () => {
    const names = createTools(new FakeLogseqApi().client()).map(t => t.name);

    assert.deepStrictEqual(names, ['create_page', 'update_page', 'list_pages', 'get_page_content', 'delete_page', 'search']);
  });
});

describe('mergeProperties', () => {

  it('should let explicit properties win', () => {
    assert.deepStrictEqual(
      mergeProperties({ status: 'draft', tags: ['a'] }, { status: 'active' }),
      { status: 'active', tags: ['a'] }
    );
  });

  it('should carry a __proto__ frontmatter key through the merge', () => {
    const { properties } = parseContent('---\n__proto__:\n  polluted: yes\nok: 1\n---\nBody');
    const merged = mergeProperties(properties, { status: 'active' });

    assert.deepStrictEqual(Object.keys(merged), ['__proto__', 'ok', 'status']);
    assert.strictEqual(JSON.stringify(merged), '{"__proto__":{"polluted":"yes"},"ok":1,"status":"active"}');
  });
});

describe('formatBlockTree', () => {

  const block = {
    content: '# Roadmap',
    children: [
      { content: 'Beta', children: [{ content: 'Deep' }] },
      { content: '   ' }
    ]
  };

  it('should indent each level and skip empty blocks', () => {
    assert.deepStrictEqual(formatBlockTree(block), ['- # Roadmap', '  - Beta', '    - Deep']);
  });

  it('should stop at the requested depth', () => {
    assert.deepStrictEqual(formatBlockTree(block, 0, 1), ['- # Roadmap', '  - Beta']);
    assert.deepStrictEqual(formatBlockTree(block, 0, 0), ['- # Roadmap']);
  });
});

describe('create_page', () => {

  it('should create the page from parsed markdown and merged properties', async () => {
    const api = new FakeLogseqApi()
      .on('logseq.Editor.createPage', { name: 'notes' })
      .on('logseq.Editor.getPageBlocksTree', [{ uuid: 'ph' }]);

    const text = await toolFor(api, 'create_page').run({
      title: 'Notes',
      content: '---\ntags: [a, b]\n---\n# Title\n- one\n- two',
      properties: { status: 'active' }
    });

    assert.strictEqual(text, "Successfully created page 'Notes'\n  - 1 top-level block(s) created\n  - 2 page property/ies set");
    assert.deepStrictEqual(api.argsOf('logseq.Editor.insertBatchBlock'), [[
      'ph',
      [{ content: '# Title', children: [{ content: 'one' }, { content: 'two' }] }],
      { sibling: true }
    ]]);
    assert.deepStrictEqual(api.argsOf('logseq.Editor.upsertBlockProperty'), [
      ['ph', 'tags', ['a', 'b']],
      ['ph', 'status', 'active']
    ]);
  });

  it('should create an empty page when no content is given', async () => {
    const api = new FakeLogseqApi();

    const text = await toolFor(api, 'create_page').run({ title: 'Blank' });

    assert.strictEqual(text, "Successfully created page 'Blank'");
    assert.deepStrictEqual(api.methods(), ['logseq.Editor.createPage']);
  });

  it('should report unusable frontmatter as a warning', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getPageBlocksTree', [{ uuid: 'ph' }]);

    const text = await toolFor(api, 'create_page').run({ title: 'Draft', content: '---\nbad: [x\n---\nBody' });
    const lines = text.split('\n');

    assert.strictEqual(lines.length, 3);
    assert.strictEqual(lines[0], "Successfully created page 'Draft'");
    assert.strictEqual(lines[1], '  - 4 top-level block(s) created');
    assert.ok(lines[2].startsWith('  - Warning: Failed to parse YAML frontmatter: '));
  });

  it('should reject a missing title', async () => {
    const api = new FakeLogseqApi();

    await assert.rejects(toolFor(api, 'create_page').run({}), (err: unknown) => {
      assert.ok(err instanceof ToolInputError);
      assert.match(err.message, /^Invalid arguments for create_page: title: /);
      return true;
    });
    assert.deepStrictEqual(api.calls, []);
  });
});

describe('update_page', () => {

  it('should require content or properties', async () => {
    const text = await toolFor(new FakeLogseqApi(), 'update_page').run({ page_name: 'Notes' });

    assert.strictEqual(text, "Error: Either 'content' or 'properties' must be provided for update");
  });

  it('should report a missing page', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getAllPages', []);

    const text = await toolFor(api, 'update_page').run({ page_name: 'Ghost', content: '- x' });

    assert.strictEqual(text, "Error: Page 'Ghost' does not exist");
  });

  it('should describe a replace', async () => {
    const api = new FakeLogseqApi()
      .on('logseq.Editor.getAllPages', [{ name: 'Notes' }])
      .on('logseq.Editor.getPageBlocksTree', [{ uuid: 'b1' }])
      .on('logseq.Editor.appendBlockInPage', { uuid: 'n1' });

    const text = await toolFor(api, 'update_page').run({ page_name: 'Notes', content: '- x\n- y', mode: 'replace' });

    assert.strictEqual(text, "Successfully updated page 'Notes'\n  - Existing content cleared\n  - 2 block(s) added\nMode: replace");
  });

  it('should update properties alone in append mode', async () => {
    const api = new FakeLogseqApi()
      .on('logseq.Editor.getAllPages', [{ name: 'Notes' }])
      .on('logseq.Editor.getPageBlocksTree', [{ uuid: 'b1', properties: {} }]);

    const text = await toolFor(api, 'update_page').run({ page_name: 'Notes', properties: { status: 'done' } });

    assert.strictEqual(text, "Successfully updated page 'Notes'\n  - 1 property/ies updated\nMode: append");
    assert.deepStrictEqual(api.argsOf('logseq.Editor.upsertBlockProperty'), [['b1', 'status', 'done']]);
  });

  it('should report API failures as text', async () => {
    const api = new FakeLogseqApi().fail('logseq.Editor.getAllPages', 500, 'boom');

    const text = await toolFor(api, 'update_page').run({ page_name: 'Notes', content: 'x' });

    assert.strictEqual(text, "Failed to update page 'Notes': Logseq request logseq.Editor.getAllPages failed (500): boom");
  });

  it('should reject an unknown mode', async () => {
    await assert.rejects(
      toolFor(new FakeLogseqApi(), 'update_page').run({ page_name: 'Notes', content: 'x', mode: 'merge' }),
      ToolInputError
    );
  });
});

describe('list_pages', () => {

  const pages = [
    { name: 'zeta' },
    { name: 'alpha', originalName: 'Alpha' },
    { name: 'oct 1st, 2026', 'journal?': true },
    {}
  ];

  it('should list sorted non-journal pages by default', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getAllPages', pages);

    const text = await toolFor(api, 'list_pages').run({});

    assert.strictEqual(text, 'Logseq Pages:\n\n- <unknown>\n- Alpha\n- zeta\nTotal pages: 3 (excluding journal pages)');
  });

  it('should mark journal pages when they are included', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getAllPages', pages);

    const text = await toolFor(api, 'list_pages').run({ include_journals: true });

    assert.strictEqual(
      text,
      'Logseq Pages:\n\n- <unknown>\n- Alpha\n- oct 1st, 2026 [journal]\n- zeta\nTotal pages: 4 (including journal pages)'
    );
  });
});

describe('get_page_content', () => {

  function roadmapApi(): FakeLogseqApi {
    return new FakeLogseqApi()
      .on('logseq.Editor.getPage', { name: 'roadmap' })
      .on('logseq.Editor.getPageBlocksTree', [
        { content: '# Roadmap', children: [{ content: 'Beta', children: [{ content: 'Deep' }] }] },
        { content: 'Other' }
      ]);
  }

  it('should render the outline as text', async () => {
    const text = await toolFor(roadmapApi(), 'get_page_content').run({ page_name: 'roadmap' });

    assert.strictEqual(text, '- # Roadmap\n  - Beta\n    - Deep\n- Other');
  });

  it('should honor max_depth', async () => {
    const text = await toolFor(roadmapApi(), 'get_page_content').run({ page_name: 'roadmap', max_depth: 1 });

    assert.strictEqual(text, '- # Roadmap\n  - Beta\n- Other');
  });

  it('should return JSON when asked', async () => {
    const text = await toolFor(roadmapApi(), 'get_page_content').run({ page_name: 'roadmap', format: 'json' });

    assert.deepStrictEqual(JSON.parse(text), {
      page: { name: 'roadmap', properties: {} },
      blocks: [
        { content: '# Roadmap', children: [{ content: 'Beta', children: [{ content: 'Deep' }] }] },
        { content: 'Other' }
      ]
    });
  });

  it('should say when a page is missing', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getPage', null);

    assert.strictEqual(await toolFor(api, 'get_page_content').run({ page_name: 'nope' }), "Page 'nope' not found.");
  });

  it('should render an empty page as a single dash', async () => {
    const api = new FakeLogseqApi()
      .on('logseq.Editor.getPage', { name: 'empty' })
      .on('logseq.Editor.getPageBlocksTree', []);

    assert.strictEqual(await toolFor(api, 'get_page_content').run({ page_name: 'empty' }), '-');
  });
});

describe('delete_page', () => {

  it('should confirm a deletion with the reported status', async () => {
    const api = new FakeLogseqApi()
      .on('logseq.Editor.getAllPages', [{ name: 'old' }])
      .on('logseq.Editor.deletePage', { success: true, message: 'Page deleted' });

    const text = await toolFor(api, 'delete_page').run({ page_name: 'old' });

    assert.strictEqual(text, "Successfully deleted page 'old'\nStatus: Page deleted\nPage 'old' has been permanently removed from Logseq");
  });

  it('should confirm a deletion without a status', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getAllPages', [{ name: 'old' }]);

    const text = await toolFor(api, 'delete_page').run({ page_name: 'old' });

    assert.strictEqual(text, "Successfully deleted page 'old'\nPage 'old' has been permanently removed from Logseq");
  });

  it('should report a missing page', async () => {
    const api = new FakeLogseqApi().on('logseq.Editor.getAllPages', []);

    assert.strictEqual(await toolFor(api, 'delete_page').run({ page_name: 'gone' }), "Error: Page 'gone' does not exist");
  });
});

describe('search', () => {

  it('should format each result section', async () => {
    const longBlock = 'x'.repeat(160);
    const api = new FakeLogseqApi().on('logseq.search', {
      blocks: [{ 'block/content': 'First hit' }, { 'block/content': longBlock }],
      'pages-content': [{ 'block/snippet': 'see $pfts_2lqh>$road$<pfts_2lqh$map' }],
      pages: ['Roadmap'],
      files: ['pages/roadmap.md'],
      'has-more?': true
    });

    const text = await toolFor(api, 'search').run({ query: 'road' });

    assert.strictEqual(text, [
      "# Search Results for 'road'\n",
      '## Content Blocks (2 found)',
      '1. First hit',
      `2. ${'x'.repeat(150)}...`,
      '',
      '## Page Snippets (1 found)',
      '1. see roadmap',
      '',
      '## Matching Pages (1 found)',
      '- Roadmap',
      '',
      '*More results available - increase limit to see more*',
      '\n**Total results found: 4**'
    ].join('\n'));
    assert.deepStrictEqual(api.argsOf('logseq.search'), [['road', { limit: 20 }]]);
  });

  it('should include files only when asked', async () => {
    const api = new FakeLogseqApi().on('logseq.search', { files: ['pages/roadmap.md'] });

    const text = await toolFor(api, 'search').run({ query: 'road', include_files: true, limit: 5 });

    assert.strictEqual(text, [
      "# Search Results for 'road'\n",
      '## Matching Files (1 found)',
      '- pages/roadmap.md',
      '',
      '\n**Total results found: 1**'
    ].join('\n'));
  });

  it('should say when nothing was found', async () => {
    const text = await toolFor(new FakeLogseqApi(), 'search').run({ query: 'road' });

    assert.strictEqual(text, "No search results found for 'road'");
  });

  it('should report a failed search', async () => {
    const api = new FakeLogseqApi().fail('logseq.search', 500, 'down');

    const text = await toolFor(api, 'search').run({ query: 'road' });

    assert.strictEqual(text, 'Search failed: Logseq request logseq.search failed (500): down');
  });
});
