/**
 * FileGlobber — Format → Glob Candidates
 *
 * Renders a format as a glob (placeholders become `*`, literal text is
 * escaped) and lists the files it matches under a directory.
 */
import { escape, globSync } from 'glob';
import { join } from 'node:path';
import type { Reporter } from './types.js';
import { rewriteFormat } from './TokenScanner.js';
import { lookupPlaceholder } from './FormatRenderer.js';
import { silentReporter } from './Reporter.js';

const GLOB_TABLE = Object.freeze({ s: '*', e: '*' });

/**
 * @example
 * renderGlobPattern('sample[%s].%e') // 'sample\\[*\\].*'
 */
export function renderGlobPattern(format: string): string {
    return rewriteFormat(format, {
        literal: text => escape(text),
        placeholder: key => lookupPlaceholder(GLOB_TABLE, key, format),
    });
}

/**
 * Candidate files for a format, joined onto `directory` and sorted.
 * Dotfiles are not matched by `*`, as with any shell glob. Braces are
 * literal: `escape` leaves them alone, so expansion stays off.
 */
export function globWithFormat(
    directory: string,
    format: string,
    reporter: Reporter = silentReporter,
): string[] {
    const matches = globSync(renderGlobPattern(format), { cwd: directory, nodir: true, nobrace: true });
    const paths = matches.sort().map(relative => join(directory, relative));
    for (const path of paths) {
        reporter.report('debug', `testcase globbed: ${path}`);
    }
    return paths;
}
