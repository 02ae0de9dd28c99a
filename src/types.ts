/**
 * judge-testcase-format — Public Types
 *
 * A format string such as `%s.%e` is read three ways: rendered into a
 * literal path, rendered into a glob, or compiled into an extraction pattern.
 */

// ── Format Strings ──────────────────────────────────────────────────

/** One scanned unit of a format string. `%%` scans as the placeholder `%`. */
export type FormatToken =
    | { readonly kind: 'literal'; readonly text: string }
    | { readonly kind: 'placeholder'; readonly key: string };

/**
 * Placeholder key → substitution. Literal text in render mode,
 * a regular-expression fragment in match mode.
 */
export type PlaceholderTable = Readonly<Record<string, string>>;

// ── Test Cases ──────────────────────────────────────────────────────

/** Role of a file within a test case. Fixed enumeration. */
export type ExtensionTag = 'in' | 'out';

/** Files belonging to one test case. Every case has an input. */
export interface TestCaseFiles {
    readonly in: string;
    readonly out?: string;
}

/** Test-case name → its files, in discovery order. */
export type TestCaseMap = ReadonlyMap<string, TestCaseFiles>;

/** Fields extracted from a path that conforms to the active format. */
export interface FormatMatch {
    readonly name: string;
    readonly ext: ExtensionTag;
}

// ── Reporting ───────────────────────────────────────────────────────

export type ReportLevel = 'debug' | 'info' | 'warning' | 'error';

/** Receives diagnostics. The package never writes to a terminal itself. */
export interface Reporter {
    report(level: ReportLevel, message: string): void;
}

// ── Locator Configuration ───────────────────────────────────────────

/** TestCaseLocator configuration. */
export interface LocatorConfig {
    /** Directory the format is relative to. */
    readonly directory: string;
    /** Format with `%s` (name) and `%e` (extension). Defaults to `%s.%e`. */
    readonly format?: string;
    /** Diagnostics sink. Defaults to a reporter that drops everything. */
    readonly reporter?: Reporter;
}
