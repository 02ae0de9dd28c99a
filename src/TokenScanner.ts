/**
 * TokenScanner — printf-Style Format Tokenizer
 *
 * Pure functions. Splits a format string into literal characters and
 * `%x` placeholders, and walks the tokens for the three readings of a
 * format (render, glob, match) so that they escape and substitute alike.
 *
 * - `%x` is a placeholder keyed by the single character `x`
 * - `%%` is the placeholder `%`, which every reading treats as a literal `%`
 * - a trailing lone `%` is malformed
 */
import type { FormatToken } from './types.js';
import { MalformedFormatError } from './TestCaseErrors.js';

/**
 * Lazily scan a format string, one code point per literal and two per
 * placeholder. Throws `MalformedFormatError` on reaching a trailing `%`.
 *
 * @example
 * [...scanFormat('a%s%%')]
 * // [{ kind: 'literal', text: 'a' },
 * //  { kind: 'placeholder', key: 's' },
 * //  { kind: 'placeholder', key: '%' }]
 */
export function* scanFormat(format: string): Generator<FormatToken, void, undefined> {
    const chars = [...format];
    for (let i = 0; i < chars.length; i++) {
        if (chars[i] !== '%') {
            yield { kind: 'literal', text: chars[i] };
            continue;
        }
        if (i + 1 === chars.length) {
            throw new MalformedFormatError(format);
        }
        yield { kind: 'placeholder', key: chars[i + 1] };
        i++;
    }
}

/** How one reading of a format turns each token into output text. */
export interface TokenVisitor {
    literal(text: string): string;
    placeholder(key: string): string;
}

/**
 * Rewrite a format token by token. `%%` is handed to `visitor.literal`
 * as `%`, so no reading has to special-case it.
 */
export function rewriteFormat(format: string, visitor: TokenVisitor): string {
    let result = '';
    for (const token of scanFormat(format)) {
        if (token.kind === 'literal') {
            result += visitor.literal(token.text);
        } else if (token.key === '%') {
            result += visitor.literal('%');
        } else {
            result += visitor.placeholder(token.key);
        }
    }
    return result;
}

/** Distinct placeholder keys in order of first use, excluding `%`. */
export function placeholderKeys(format: string): string[] {
    const keys: string[] = [];
    for (const token of scanFormat(format)) {
        if (token.kind === 'placeholder' && token.key !== '%' && !keys.includes(token.key)) {
            keys.push(token.key);
        }
    }
    return keys;
}
