/**
 * Test: Markdown renderer
 *
 * Each block kind renders to a fixed line shape; skip and unrecognized
 * blocks render to nothing.
 */

import assert from 'node:assert/strict';
import { renderBlock, renderBlocks, toMarkdown } from '../src/render.js';

console.log('Running renderer tests...\n');

// ── Test 1: Heading ──────────────────────────────────────────────────────────
{
    assert.deepEqual(renderBlock({ kind: 'heading', title: 'Use let' }), ['### Use let', '']);
    console.log('✓ Test 1 passed: heading renders as level-3 with blank line');
}

// ── Test 2: Code example ─────────────────────────────────────────────────────
{
    const lines = renderBlock({
        kind: 'code-example',
        caption: 'good',
        language: 'ruby',
        lines: ['it { is_expected.to be_valid }', '  # indented stays indented'],
    });
    assert.deepEqual(lines, [
        '```ruby',
        '# good',
        'it { is_expected.to be_valid }',
        '  # indented stays indented',
        '```',
        '',
    ]);

    const empty = renderBlock({ kind: 'code-example', caption: 'bad', language: 'ruby', lines: [] });
    assert.deepEqual(empty, ['```ruby', '# bad', '```', '']);
    console.log('✓ Test 2 passed: code example renders a fenced block');
}

// ── Test 3: Prose ────────────────────────────────────────────────────────────
{
    assert.deepEqual(
        renderBlock({ kind: 'plain-text', text: '\n   Keep   it\n   short.  ' }),
        ['Keep it short.', ''],
    );
    assert.deepEqual(
        renderBlock({
            kind: 'link-annotated',
            text: 'See  the\n  RSpec docs.',
            linkText: 'RSpec docs',
            href: 'https://example.com/docs',
        }),
        ['See the [RSpec docs](https://example.com/docs).', ''],
    );
    console.log('✓ Test 3 passed: prose is normalized and links annotated');
}

// ── Test 4: Dropped blocks ───────────────────────────────────────────────────
{
    assert.deepEqual(renderBlock({ kind: 'skip', text: 'More about mocks', marker: 'More about' }), []);
    assert.deepEqual(renderBlock({ kind: 'unrecognized', text: 'Note', firstChildTag: 'span' }), []);
    console.log('✓ Test 4 passed: skip and unrecognized render nothing');
}

// ── Test 5: File content ─────────────────────────────────────────────────────
{
    const lines = renderBlocks([
        { kind: 'heading', title: 'A' },
        { kind: 'skip', text: 'Learn more about A', marker: 'Learn more about' },
        { kind: 'plain-text', text: 'Text.' },
    ]);
    assert.deepEqual(lines, ['### A', '', 'Text.', '']);
    assert.equal(toMarkdown(lines), '### A\n\nText.\n\n');
    assert.equal(toMarkdown([]), '');
    console.log('✓ Test 5 passed: every line is newline-terminated');
}

console.log('\n✅ All renderer tests passed!');
