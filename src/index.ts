/**
 * judge-testcase-format — Public API
 *
 * Locates and pairs the input/output files of judge test cases
 * with printf-style formats such as `%s.%e` or `test_%s/in.txt`.
 */

// Main class
export { TestCaseLocator } from './TestCaseLocator.js';

// Types
export type {
    FormatToken,
    PlaceholderTable,
    ExtensionTag,
    TestCaseFiles,
    TestCaseMap,
    FormatMatch,
    ReportLevel,
    Reporter,
    LocatorConfig,
} from './types.js';

export type { TokenVisitor } from './TokenScanner.js';
export type { CompiledFormat } from './FormatMatcher.js';
export type { TestCaseFormatErrorTag } from './TestCaseErrors.js';

// Pure functions
export { scanFormat, rewriteFormat, placeholderKeys } from './TokenScanner.js';
export { percentFormat, pathFromFormat } from './FormatRenderer.js';
export { compileFormatPattern, percentParse, matchWithFormat } from './FormatMatcher.js';
export { validateFormat, DEFAULT_FORMAT, VALID_PLACEHOLDERS } from './FormatValidator.js';
export { isBackupOrHiddenFile, dropBackupOrHiddenFiles } from './FileFilter.js';

// Filesystem
export { resolvePath } from './PathResolver.js';
export { renderGlobPattern, globWithFormat } from './FileGlobber.js';
export { buildTestCaseMap } from './RelationshipBuilder.js';
export { silentReporter } from './Reporter.js';

// Errors
export {
    TestCaseFormatError,
    MalformedFormatError,
    InvalidFormatError,
    UndefinedPlaceholderError,
    UnrecognizedFileError,
    DuplicateTestCaseFileError,
    DanglingOutputError,
    NoCasesFoundError,
    isTestCaseFormatError,
} from './TestCaseErrors.js';
