#!/usr/bin/env node

import path from 'path';
import { convertGuideFile, stderrLog } from './converter.js';

// Usage: guide-to-markdown [input.html] [output.md]
const DEFAULT_INPUT = 'guide.html';
const DEFAULT_OUTPUT = 'guide.md';

function main() {
    const [inputArg, outputArg] = process.argv.slice(2);
    const inputPath = path.resolve(inputArg ?? DEFAULT_INPUT);
    const outputPath = path.resolve(outputArg ?? DEFAULT_OUTPUT);

    const { stats, profile } = convertGuideFile({ inputPath, outputPath });

    stderrLog(
        `✓ ${outputPath} (profile: ${profile.name}, articles: ${stats['heading']}, ` +
        `code examples: ${stats['code-example']}, skipped: ${stats['skip']}, dropped: ${stats['unrecognized']})`
    );
}

try {
    main();
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    stderrLog(`Conversion failed: ${message}`);
    process.exit(1);
}
