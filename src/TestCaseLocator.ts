/**
 * TestCaseLocator — Public Facade
 *
 * The single entry point for locating test cases on disk.
 * Validates its config at construction time and delegates to the
 * globber, the file filter and the relationship builder.
 */
import type { ExtensionTag, LocatorConfig, Reporter, TestCaseMap } from './types.js';
import { DEFAULT_FORMAT, validateFormat } from './FormatValidator.js';
import { globWithFormat } from './FileGlobber.js';
import { dropBackupOrHiddenFiles } from './FileFilter.js';
import { buildTestCaseMap } from './RelationshipBuilder.js';
import { pathFromFormat } from './FormatRenderer.js';
import { silentReporter } from './Reporter.js';

export class TestCaseLocator {
    readonly directory: string;
    readonly format: string;
    private readonly reporter: Reporter;

    constructor(config: LocatorConfig) {
        if (!config.directory || typeof config.directory !== 'string') {
            throw new Error("TestCaseLocator: 'directory' must be a non-empty string.");
        }
        const format = config.format ?? DEFAULT_FORMAT;
        validateFormat(format);

        this.directory = config.directory;
        this.format = format;
        this.reporter = config.reporter ?? silentReporter;
    }

    /** Files the format's glob finds, sorted. Backup files are still included. */
    glob(): string[] {
        return globWithFormat(this.directory, this.format, this.reporter);
    }

    /**
     * Pair externally listed candidates into test cases.
     * Backup and hidden files are dropped with a warning first.
     */
    relate(paths: readonly string[]): TestCaseMap {
        const candidates = dropBackupOrHiddenFiles(paths, this.reporter);
        return buildTestCaseMap(candidates, this.directory, this.format, this.reporter);
    }

    /**
     * Glob, filter and pair in one step.
     *
     * @example
     * ```typescript
     * const locator = new TestCaseLocator({ directory: 'test' });
     * for (const [name, files] of locator.discover()) {
     *     run(name, files.in, files.out);
     * }
     * ```
     */
    discover(): TestCaseMap {
        return this.relate(this.glob());
    }

    /** Where the `ext` file of case `name` belongs, e.g. when saving samples. */
    pathFor(name: string, ext: ExtensionTag): string {
        return pathFromFormat(this.directory, this.format, name, ext);
    }
}
