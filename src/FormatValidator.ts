/**
 * FormatValidator — Eager Format Validation
 *
 * Pure functions. Checks a test-case format at construction time
 * (fail-fast), before any file is globbed or matched.
 */
import { placeholderKeys } from './TokenScanner.js';
import { InvalidFormatError, UndefinedPlaceholderError } from './TestCaseErrors.js';

// ── Constants ───────────────────────────────────────────────────────

export const DEFAULT_FORMAT = '%s.%e';

/** `%s` names the case, `%e` is its extension tag. `%%` is always allowed. */
export const VALID_PLACEHOLDERS = new Set<string>(['s', 'e']);

// ── Validate Format ─────────────────────────────────────────────────

/**
 * Throws on the first problem found:
 * - `InvalidFormatError` for an empty format or a missing `%s` / `%e`
 * - `MalformedFormatError` for a trailing lone `%`
 * - `UndefinedPlaceholderError` for any placeholder other than `%s`, `%e`, `%%`
 */
export function validateFormat(format: string): void {
    if (!format || typeof format !== 'string') {
        throw new InvalidFormatError(String(format), 'must be a non-empty string.');
    }

    const used = placeholderKeys(format);
    for (const key of used) {
        if (!VALID_PLACEHOLDERS.has(key)) {
            throw new UndefinedPlaceholderError(key, format);
        }
    }

    if (!used.includes('s')) {
        throw new InvalidFormatError(format, 'missing "%s" for the test case name.');
    }
    if (!used.includes('e')) {
        throw new InvalidFormatError(format, 'missing "%e" for the extension (in/out).');
    }
}
