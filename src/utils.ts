/**
 * Text helpers shared by the classifier and the renderer.
 */

/**
 * Flattens paragraph text onto one line: trims, deletes line breaks outright
 * (no space is inserted), then collapses every run of two or more whitespace
 * characters into a single space.
 */
export function normalizeWhitespace(text: string): string {
    return text
        .trim()
        .replace(/[\r\n]/g, '')
        .replace(/\s\s+/g, ' ');
}

/**
 * Splits a code block into lines, verbatim. Trailing empty lines are dropped
 * so a block ending in a newline does not grow a blank line inside the fence:
 * a trailing newline inside <pre> terminates the last line, it is not a line.
 */
export function splitCodeLines(code: string): string[] {
    const lines = code.split('\n');
    while (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

/**
 * Replaces every literal occurrence of `search` in `text`.
 * An empty search string leaves the text unchanged.
 */
export function replaceAllLiteral(text: string, search: string, replacement: string): string {
    if (search === '') return text;
    return text.split(search).join(replacement);
}
