/**
 * Block Classifier
 *
 * Turns the DOM nodes of one guide article into an ordered list of tagged
 * blocks. Nothing here writes Markdown: render.ts decides what each block
 * becomes, so every paragraph shape is named before anything is emitted.
 */

import { GuideStructureError } from './errors.js';
import type { GuideProfile } from './profiles.js';
import { normalizeWhitespace, splitCodeLines } from './utils.js';

export interface HeadingBlock {
    kind: 'heading';
    title: string;
}

export interface CodeExampleBlock {
    kind: 'code-example';
    /** Paragraph text, normalized; becomes the comment line inside the fence */
    caption: string;
    language: string;
    /** Lines of the code block, verbatim */
    lines: string[];
}

export interface SkipBlock {
    kind: 'skip';
    text: string;
    /** The boilerplate phrase that matched */
    marker: string;
}

export interface PlainTextBlock {
    kind: 'plain-text';
    text: string;
}

export interface LinkAnnotatedBlock {
    kind: 'link-annotated';
    text: string;
    linkText: string;
    href: string;
}

export interface UnrecognizedBlock {
    kind: 'unrecognized';
    text: string;
    /** Lower-case tag name of the first child element */
    firstChildTag: string;
}

export type ParagraphBlock =
    | CodeExampleBlock
    | SkipBlock
    | PlainTextBlock
    | LinkAnnotatedBlock
    | UnrecognizedBlock;

export type GuideBlock = HeadingBlock | ParagraphBlock;

export type BlockKind = GuideBlock['kind'];

/** Where a paragraph sits, used to locate structural errors. */
export interface ArticleContext {
    index: number;
    title?: string;
}

// ── Title ──────────────────────────────────────────────────────────────────────

export function classifyTitle(article: Element, profile: GuideProfile, index: number): HeadingBlock {
    const titleEl = article.querySelector(profile.title_selector);
    if (!titleEl) {
        throw new GuideStructureError(`no title element matching "${profile.title_selector}"`, index);
    }
    return { kind: 'heading', title: normalizeWhitespace(titleEl.textContent ?? '') };
}

// ── Code block lookup ──────────────────────────────────────────────────────────

/**
 * Returns the code element belonging to a code-marker paragraph: the first
 * <pre> inside the paragraph's next element sibling, or the sibling itself
 * when it is a <pre>.
 */
export function findCodeBlock(paragraph: Element, context: ArticleContext): Element {
    const sibling = paragraph.nextElementSibling;
    if (!sibling) {
        throw new GuideStructureError('code example paragraph has no following element', context.index, context.title);
    }
    const pre = sibling.tagName === 'PRE' ? sibling : sibling.querySelector('pre');
    if (!pre) {
        throw new GuideStructureError(
            `element after code example paragraph (<${sibling.tagName.toLowerCase()}>) contains no <pre>`,
            context.index,
            context.title,
        );
    }
    return pre;
}

// ── Paragraph ──────────────────────────────────────────────────────────────────

export function classifyParagraph(
    paragraph: Element,
    profile: GuideProfile,
    context: ArticleContext,
): ParagraphBlock {
    const text = paragraph.textContent ?? '';

    // Code markers take precedence over boilerplate markers
    const isCodeMarker = profile.code_marker_classes.some(cls => paragraph.classList.contains(cls));
    if (isCodeMarker) {
        const pre = findCodeBlock(paragraph, context);
        return {
            kind: 'code-example',
            caption: normalizeWhitespace(text),
            language: profile.language,
            lines: splitCodeLines(pre.textContent ?? ''),
        };
    }

    const marker = profile.boilerplate_markers.find(m => text.includes(m));
    if (marker !== undefined) {
        return { kind: 'skip', text, marker };
    }

    const firstChild = paragraph.firstElementChild;
    if (!firstChild) {
        return { kind: 'plain-text', text };
    }

    const href = firstChild.getAttribute('href');
    if (firstChild.tagName === 'A' && href !== null) {
        return { kind: 'link-annotated', text, linkText: firstChild.textContent ?? '', href };
    }

    return { kind: 'unrecognized', text, firstChildTag: firstChild.tagName.toLowerCase() };
}

// ── Article ────────────────────────────────────────────────────────────────────

/**
 * Classifies one article: its heading first, then every paragraph in
 * document order.
 */
export function classifyArticle(article: Element, profile: GuideProfile, index: number): GuideBlock[] {
    const heading = classifyTitle(article, profile, index);
    const context: ArticleContext = { index, title: heading.title };

    const blocks: GuideBlock[] = [heading];
    article.querySelectorAll(profile.paragraph_selector).forEach(paragraph => {
        blocks.push(classifyParagraph(paragraph, profile, context));
    });
    return blocks;
}
