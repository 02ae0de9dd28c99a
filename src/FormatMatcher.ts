/**
 * FormatMatcher — Format → Extraction Pattern
 *
 * Compiles a format into a regular expression. The first occurrence of a
 * placeholder becomes a named capture group around its table fragment;
 * every later occurrence becomes a back-reference, so `%a%a` only matches
 * two identical substrings.
 */
import { sep } from 'node:path';
import type { FormatMatch, PlaceholderTable } from './types.js';
import { rewriteFormat } from './TokenScanner.js';
import { lookupPlaceholder } from './FormatRenderer.js';
import { resolvePath } from './PathResolver.js';

/** Fragments used to read test-case files: any name, `in` or `out`. */
const TEST_CASE_TABLE: PlaceholderTable = Object.freeze({ s: '.+', e: 'in|out' });

export interface CompiledFormat {
    /** Regular-expression source, unanchored. */
    readonly source: string;
    /** Placeholder key → capture group name, in order of first use. */
    readonly groups: ReadonlyMap<string, string>;
}

/** Escape regular-expression syntax so `text` matches itself. */
export function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Group names must be identifiers, placeholder keys need not be,
 * so the key's code point names the group.
 */
function groupNameFor(key: string): string {
    return `p${key.codePointAt(0)}`;
}

/**
 * @throws UndefinedPlaceholderError if a placeholder has no table entry
 */
export function compileFormatPattern(format: string, table: PlaceholderTable): CompiledFormat {
    const groups = new Map<string, string>();

    const source = rewriteFormat(format, {
        literal: escapeRegExp,
        placeholder: key => {
            const seen = groups.get(key);
            if (seen !== undefined) return `\\k<${seen}>`;

            const fragment = lookupPlaceholder(table, key, format);
            const name = groupNameFor(key);
            groups.set(key, name);
            return `(?<${name}>${fragment})`;
        },
    });

    return { source, groups };
}

/**
 * Parse a whole string with a format. Returns the text captured for each
 * placeholder, or `null` when the string does not conform.
 *
 * @example
 * percentParse('123456789', '%x%y%z', { x: '\\d+', y: '\\d', z: '(\\d\\d\\d)+' })
 * // { x: '12345', y: '6', z: '789' }
 * percentParse('AB', '%a%a', { a: '.' }) // null
 */
export function percentParse(
    text: string,
    format: string,
    table: PlaceholderTable,
): Record<string, string> | null {
    const { source, groups } = compileFormatPattern(format, table);
    const match = new RegExp(`^${source}$`).exec(text);
    if (!match) return null;

    const fields: Record<string, string> = {};
    for (const [key, name] of groups) {
        fields[key] = match.groups?.[name] ?? '';
    }
    return fields;
}

/**
 * Match a candidate path against `directory` joined with the format.
 * Both sides are resolved first, so spellings of the same file agree.
 * Returns `null` when the path does not conform, or when the format
 * lacks `%s` or `%e`.
 */
export function matchWithFormat(
    directory: string,
    format: string,
    path: string,
): FormatMatch | null {
    const { source, groups } = compileFormatPattern(format, TEST_CASE_TABLE);
    const nameGroup = groups.get('s');
    const extGroup = groups.get('e');
    if (nameGroup === undefined || extGroup === undefined) return null;

    const root = resolvePath(directory);
    const prefix = root.endsWith(sep) ? root : root + sep;
    const match = new RegExp(`^${escapeRegExp(prefix)}${source}$`).exec(resolvePath(path));
    if (!match?.groups) return null;

    const ext = match.groups[extGroup];
    if (ext !== 'in' && ext !== 'out') return null;

    return { name: match.groups[nameGroup], ext };
}
