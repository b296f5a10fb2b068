/**
 * Test: text helpers
 *
 * Verifies whitespace normalization, code-line splitting and literal
 * replacement used when rendering paragraphs.
 */

import { normalizeWhitespace, splitCodeLines, replaceAllLiteral } from '../src/utils.js';
import assert from 'node:assert/strict';

console.log('Running text helper tests...\n');

// ── Test 1: Normalization trims and collapses ────────────────────────────────
{
    assert.equal(normalizeWhitespace('  Do   this.  '), 'Do this.');
    assert.equal(normalizeWhitespace('a\t\tb'), 'a b');
    assert.equal(normalizeWhitespace('a\tb'), 'a\tb', 'A single tab is not a run');
    console.log('✓ Test 1 passed: trims and collapses whitespace runs');
}

// ── Test 2: Line breaks are deleted, not replaced ────────────────────────────
{
    assert.equal(normalizeWhitespace('one\ntwo'), 'onetwo');
    assert.equal(normalizeWhitespace('one,\n    two'), 'one, two');
    assert.equal(normalizeWhitespace('one\r\ntwo'), 'onetwo');
    console.log('✓ Test 2 passed: embedded line breaks removed');
}

// ── Test 3: Code lines kept verbatim, trailing blanks dropped ────────────────
{
    assert.deepEqual(splitCodeLines('let(:foo) { Foo.new }'), ['let(:foo) { Foo.new }']);
    assert.deepEqual(
        splitCodeLines('describe User do\n  it { }\n\nend\n\n'),
        ['describe User do', '  it { }', '', 'end'],
    );
    assert.deepEqual(splitCodeLines(''), []);
    console.log('✓ Test 3 passed: code lines split verbatim');
}

// ── Test 4: Literal replacement ──────────────────────────────────────────────
{
    assert.equal(replaceAllLiteral('see docs (docs)', 'docs', '[docs](/d)'), 'see [docs](/d) ([docs](/d))');
    assert.equal(replaceAllLiteral('a.b', '.', '!'), 'a!b', 'Search string is not a pattern');
    assert.equal(replaceAllLiteral('abc', '', 'x'), 'abc');
    console.log('✓ Test 4 passed: literal replacement of every occurrence');
}

console.log('\n✅ All text helper tests passed!');
