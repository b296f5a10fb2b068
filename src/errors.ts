export type ConvertErrorKind = 'input' | 'structure' | 'output';

export class GuideConvertError extends Error {
    readonly kind: ConvertErrorKind;
    override readonly cause?: unknown;

    constructor(kind: ConvertErrorKind, message: string, cause?: unknown) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
        this.cause = cause;
    }
}

/** The HTML source could not be read. */
export class GuideInputError extends GuideConvertError {
    readonly path: string;

    constructor(path: string, cause?: unknown) {
        super('input', `Cannot read guide source: ${path}`, cause);
        this.path = path;
    }
}

/** The document does not have the shape the profile expects. */
export class GuideStructureError extends GuideConvertError {
    /** Zero-based position of the offending article in the document */
    readonly articleIndex: number;
    readonly articleTitle?: string;

    constructor(message: string, articleIndex: number, articleTitle?: string) {
        const where = articleTitle ? `"${articleTitle}"` : `#${articleIndex + 1}`;
        super('structure', `Article ${where}: ${message}`);
        this.articleIndex = articleIndex;
        this.articleTitle = articleTitle;
    }
}

/** The Markdown destination could not be written. */
export class GuideOutputError extends GuideConvertError {
    readonly path: string;

    constructor(path: string, cause?: unknown) {
        super('output', `Cannot write guide output: ${path}`, cause);
        this.path = path;
    }
}
