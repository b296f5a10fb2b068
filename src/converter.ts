import fs from 'fs';
import { JSDOM } from 'jsdom';
import { classifyArticle, type BlockKind, type GuideBlock } from './classify.js';
import { GuideInputError, GuideOutputError } from './errors.js';
import { getProfile, type GuideProfile } from './profiles.js';
import { renderBlocks, toMarkdown } from './render.js';

export * from './errors.js';
export { GUIDE_PROFILES, getProfile, type GuideProfile } from './profiles.js';
export type { GuideBlock, BlockKind } from './classify.js';

export type LogSink = (message: string) => void;

/** Default sink: stderr, one line per message. */
export const stderrLog: LogSink = (message) => {
    process.stderr.write(`[converter] ${message}\n`);
};

export interface ConvertOptions {
    /** Guide layout. Defaults to the Generic profile. */
    profile?: GuideProfile;
    /** Receives warnings such as dropped paragraphs. Defaults to stderr. */
    log?: LogSink;
}

/** When profile is omitted, the one matching inputPath is used. */
export interface ConvertFileOptions extends ConvertOptions {
    inputPath: string;
    outputPath: string;
}

export interface ConversionResult {
    /** Full file content */
    markdown: string;
    lines: string[];
    /** Article titles, in document order */
    articles: string[];
    /** Block count per kind */
    stats: Record<BlockKind, number>;
    profile: GuideProfile;
}

function emptyStats(): Record<BlockKind, number> {
    return {
        'heading': 0,
        'code-example': 0,
        'skip': 0,
        'plain-text': 0,
        'link-annotated': 0,
        'unrecognized': 0,
    };
}

// ── In-memory conversion ───────────────────────────────────────────────────────

/**
 * Converts a style-guide HTML document into Markdown.
 *
 * Every article becomes a `### title` section; its paragraphs become prose,
 * Markdown links or fenced code examples depending on their classification.
 * Paragraphs whose first child is not a link are dropped with a warning.
 *
 * Throws GuideStructureError when an article has no title or a code example
 * paragraph has no code block after it.
 */
export function convertGuideHtml(html: string, options: ConvertOptions = {}): ConversionResult {
    const profile = options.profile ?? getProfile('');
    const log = options.log ?? stderrLog;

    const dom = new JSDOM(html);
    try {
        const document = dom.window.document;
        const blocks: GuideBlock[] = [];
        const articles: string[] = [];

        document.querySelectorAll(profile.article_selector).forEach((article, index) => {
            const articleBlocks = classifyArticle(article, profile, index);
            for (const block of articleBlocks) {
                if (block.kind === 'heading') articles.push(block.title);
                if (block.kind === 'unrecognized') {
                    log(`Dropping paragraph in "${articles[articles.length - 1]}": first child is <${block.firstChildTag}>, not a link`);
                }
            }
            blocks.push(...articleBlocks);
        });

        const stats = emptyStats();
        for (const block of blocks) stats[block.kind] += 1;

        const lines = renderBlocks(blocks);
        return { markdown: toMarkdown(lines), lines, articles, stats, profile };
    } finally {
        dom.window.close();
    }
}

// ── File conversion ────────────────────────────────────────────────────────────

/**
 * Reads inputPath, converts it, and overwrites outputPath with the result.
 * The output file is only touched after the whole document converted.
 */
export function convertGuideFile(options: ConvertFileOptions): ConversionResult {
    const { inputPath, outputPath } = options;
    const profile = options.profile ?? getProfile(inputPath);

    let html: string;
    try {
        html = fs.readFileSync(inputPath, 'utf8');
    } catch (err) {
        throw new GuideInputError(inputPath, err);
    }

    const result = convertGuideHtml(html, { profile, log: options.log });

    try {
        fs.writeFileSync(outputPath, result.markdown, 'utf8');
    } catch (err) {
        throw new GuideOutputError(outputPath, err);
    }
    return result;
}
