/**
 * FormatRenderer — Literal Substitution
 *
 * Pure functions. Replaces every placeholder with its table value and
 * passes literal characters through unchanged.
 */
import { join } from 'node:path';
import type { ExtensionTag, PlaceholderTable } from './types.js';
import { rewriteFormat } from './TokenScanner.js';
import { UndefinedPlaceholderError } from './TestCaseErrors.js';

/**
 * Render a format with literal values.
 *
 * @example
 * percentFormat('foo %a%a bar %b', { a: 'AA', b: '12345' })
 * // 'foo AAAA bar 12345'
 *
 * @throws UndefinedPlaceholderError if a placeholder has no table entry
 */
export function percentFormat(format: string, table: PlaceholderTable): string {
    if (Object.hasOwn(table, '%') && table['%'] !== '%') {
        throw new Error(
            `percentFormat: a table entry for "%" must be "%", received "${table['%']}".`,
        );
    }

    return rewriteFormat(format, {
        literal: text => text,
        placeholder: key => lookupPlaceholder(table, key, format),
    });
}

/**
 * Path a test case's file lives at under `directory`.
 *
 * @example
 * pathFromFormat('tests', 'sample-%s.%e', '1', 'out') // 'tests/sample-1.out'
 */
export function pathFromFormat(
    directory: string,
    format: string,
    name: string,
    ext: ExtensionTag,
): string {
    return join(directory, percentFormat(format, { s: name, e: ext }));
}

/** Own-property lookup; inherited keys such as `toString` are not entries. */
export function lookupPlaceholder(
    table: PlaceholderTable,
    key: string,
    format: string,
): string {
    if (!Object.hasOwn(table, key)) {
        throw new UndefinedPlaceholderError(key, format);
    }
    return table[key];
}
