/**
 * Guide Profiles
 *
 * Describes how a saved style-guide page is laid out so the converter knows
 * where articles, titles and paragraphs live, which paragraph classes
 * introduce a code example, and which boilerplate paragraphs to drop.
 *
 * When a source path matches a profile's source_pattern, that profile is used.
 * The Generic profile matches everything and must stay last.
 */

export interface GuideProfile {
    /** Human-readable name of the profile */
    name: string;
    /** Regex pattern matched against the input file path */
    source_pattern: RegExp;
    /** Selector for one guideline section */
    article_selector: string;
    /** Selector (inside an article) for the element holding the section title */
    title_selector: string;
    /** Selector (inside an article) for paragraphs */
    paragraph_selector: string;
    /** Class tokens marking a paragraph as the caption of a code example */
    code_marker_classes: string[];
    /** Phrases marking a paragraph as boilerplate to drop */
    boilerplate_markers: string[];
    /** Language tag written after the opening code fence */
    language: string;
}

const CODE_MARKER_CLASSES = ['wrong', 'correct', 'base', 'good', 'bad'];
const BOILERPLATE_MARKERS = ['Discuss this guideline', 'Learn more about', 'More about'];

export const GUIDE_PROFILES: GuideProfile[] = [
    // ── Ruby / RSpec style guides ───────────────────────────────────────────────
    {
        name: 'Ruby style guide',
        source_pattern: /rspec|ruby/i,
        article_selector: 'article',
        title_selector: 'h1 a',
        paragraph_selector: 'p',
        code_marker_classes: CODE_MARKER_CLASSES,
        boilerplate_markers: BOILERPLATE_MARKERS,
        language: 'ruby',
    },

    // ── Generic fallback (matches everything) ───────────────────────────────────
    {
        name: 'Generic',
        source_pattern: /.*/,
        article_selector: 'article',
        title_selector: 'h1 a',
        paragraph_selector: 'p',
        code_marker_classes: CODE_MARKER_CLASSES,
        boilerplate_markers: BOILERPLATE_MARKERS,
        // Fences always carry a language tag
        language: 'ruby',
    },
];

/**
 * Returns the first profile whose source_pattern matches the given path,
 * or the Generic fallback if none match.
 */
export function getProfile(sourcePath: string): GuideProfile {
    const fallback = GUIDE_PROFILES[GUIDE_PROFILES.length - 1];
    return GUIDE_PROFILES.find(profile => profile.source_pattern.test(sourcePath)) ?? fallback;
}
