import type { GuideBlock } from './classify.js';
import { normalizeWhitespace, replaceAllLiteral } from './utils.js';

const FENCE = '```';

/**
 * Markdown lines for a single block. Skip and unrecognized blocks render to
 * nothing; every other block ends with a blank line.
 */
export function renderBlock(block: GuideBlock): string[] {
    switch (block.kind) {
        case 'heading':
            return [`### ${block.title}`, ''];
        case 'code-example':
            return [`${FENCE}${block.language}`, `# ${block.caption}`, ...block.lines, FENCE, ''];
        case 'plain-text':
            return [normalizeWhitespace(block.text), ''];
        case 'link-annotated': {
            const link = `[${block.linkText}](${block.href})`;
            return [normalizeWhitespace(replaceAllLiteral(block.text, block.linkText, link)), ''];
        }
        case 'skip':
        case 'unrecognized':
            return [];
    }
}

export function renderBlocks(blocks: GuideBlock[]): string[] {
    return blocks.flatMap(renderBlock);
}

/** Joins lines into file content: every line, the last included, ends in "\n". */
export function toMarkdown(lines: string[]): string {
    return lines.map(line => `${line}\n`).join('');
}
