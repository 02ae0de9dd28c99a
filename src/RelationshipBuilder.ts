/**
 * RelationshipBuilder — Pair Candidate Files into Test Cases
 *
 * Matches every candidate against the format and groups the matches by
 * name. Any file that does not fit, any output without an input, and an
 * empty result abort the whole scan: no partial map is ever returned.
 */
import type { ExtensionTag, Reporter, TestCaseFiles, TestCaseMap } from './types.js';
import { matchWithFormat } from './FormatMatcher.js';
import { validateFormat } from './FormatValidator.js';
import { silentReporter } from './Reporter.js';
import {
    DanglingOutputError,
    DuplicateTestCaseFileError,
    NoCasesFoundError,
    UnrecognizedFileError,
} from './TestCaseErrors.js';

/**
 * @example
 * buildTestCaseMap(['t/a.in', 't/a.out', 't/b.in'], 't', '%s.%e')
 * // Map { 'a' => { in: 't/a.in', out: 't/a.out' }, 'b' => { in: 't/b.in' } }
 *
 * @throws UnrecognizedFileError, DanglingOutputError, NoCasesFoundError
 * @throws DuplicateTestCaseFileError when two candidates resolve to the same slot
 */
export function buildTestCaseMap(
    paths: readonly string[],
    directory: string,
    format: string,
    reporter: Reporter = silentReporter,
): TestCaseMap {
    validateFormat(format);

    const grouped = new Map<string, Map<ExtensionTag, string>>();
    for (const path of paths) {
        const match = matchWithFormat(directory, format, path);
        if (!match) {
            const error = new UnrecognizedFileError(path, format);
            reporter.report('error', error.message);
            throw error;
        }

        const files = grouped.get(match.name) ?? new Map<ExtensionTag, string>();
        const existing = files.get(match.ext);
        if (existing !== undefined) {
            throw new DuplicateTestCaseFileError(match.name, match.ext, [existing, path]);
        }
        files.set(match.ext, path);
        grouped.set(match.name, files);
        reporter.report('debug', `${path} is the ${match.ext} file of "${match.name}"`);
    }

    const cases = new Map<string, TestCaseFiles>();
    for (const [name, files] of grouped) {
        const input = files.get('in');
        const output = files.get('out');
        if (input === undefined) {
            const error = new DanglingOutputError(name, [...files.values()]);
            reporter.report('error', error.message);
            throw error;
        }
        cases.set(name, Object.freeze(output === undefined ? { in: input } : { in: input, out: output }));
    }

    if (cases.size === 0) {
        const error = new NoCasesFoundError(directory, format);
        reporter.report('error', error.message);
        throw error;
    }

    reporter.report('info', `${cases.size} cases found`);
    return cases;
}
