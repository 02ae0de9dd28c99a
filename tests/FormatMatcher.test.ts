import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { compileFormatPattern, escapeRegExp, percentParse, matchWithFormat } from '../src/FormatMatcher.js';
import { UndefinedPlaceholderError } from '../src/TestCaseErrors.js';

const ROOT = '/nonexistent-judge-root/cases';

// ── percentParse ────────────────────────────────────────────────────

describe('percentParse', () => {
    it('extracts literal table values', () => {
        expect(percentParse('foo AAAA bar 12345', 'foo %a%a bar %b', { a: 'AA', b: '12345' }))
            .toEqual({ a: 'AA', b: '12345' });
    });

    it('extracts regular-expression fragments', () => {
        expect(percentParse('123456789', '%x%y%z', { x: '\\d+', y: '\\d', z: '(\\d\\d\\d)+' }))
            .toEqual({ x: '12345', y: '6', z: '789' });
    });

    it('requires repeated placeholders to match identical text', () => {
        expect(percentParse('AB', '%a%a', { a: '.' })).toBeNull();
        expect(percentParse('AA', '%a%a', { a: '.' })).toEqual({ a: 'A' });
    });

    it('matches literal characters literally', () => {
        expect(percentParse('a.b(c)', '%x.b(c)', { x: 'a' })).toEqual({ x: 'a' });
        expect(percentParse('aXb(c)', '%x.b(c)', { x: 'a' })).toBeNull();
    });

    it('matches %% as a literal percent sign', () => {
        expect(percentParse('50%', '%n%%', { n: '\\d+' })).toEqual({ n: '50' });
    });

    it('matches the whole string only', () => {
        expect(percentParse('12x', '%n', { n: '\\d+' })).toBeNull();
    });

    it('keeps alternation inside the placeholder group', () => {
        expect(percentParse('out', '%e', { e: 'in|out' })).toEqual({ e: 'out' });
        expect(percentParse('input', '%e', { e: 'in|out' })).toBeNull();
    });

    it('returns an empty record for a matching literal-only format', () => {
        expect(percentParse('abc', 'abc', {})).toEqual({});
    });
});

// ── escapeRegExp ────────────────────────────────────────────────────

describe('escapeRegExp', () => {
    it('escapes regular-expression syntax and leaves other text alone', () => {
        expect(escapeRegExp('a.b*(c)[d]{1,2}%')).toBe('a\\.b\\*\\(c\\)\\[d\\]\\{1,2\\}%');
    });
});

// ── compileFormatPattern ────────────────────────────────────────────

describe('compileFormatPattern', () => {
    it('uses a back-reference for the second occurrence', () => {
        const compiled = compileFormatPattern('%a-%a', { a: '\\w+' });
        expect(compiled.source).toBe('(?<p97>\\w+)-\\k<p97>');
        expect([...compiled.groups]).toEqual([['a', 'p97']]);
    });

    it('throws UndefinedPlaceholderError for a missing entry', () => {
        expect(() => compileFormatPattern('%q', {})).toThrow(UndefinedPlaceholderError);
    });
});

// ── matchWithFormat ─────────────────────────────────────────────────

describe('matchWithFormat', () => {
    it('extracts name and extension', () => {
        expect(matchWithFormat(ROOT, '%s.%e', `${ROOT}/a.in`)).toEqual({ name: 'a', ext: 'in' });
        expect(matchWithFormat(ROOT, '%s.%e', `${ROOT}/a.b.out`)).toEqual({ name: 'a.b', ext: 'out' });
    });

    it('normalizes the candidate before matching', () => {
        expect(matchWithFormat(ROOT, '%s.%e', `${ROOT}/sub/../a.out`))
            .toEqual({ name: 'a', ext: 'out' });
    });

    it('rejects unknown extensions', () => {
        expect(matchWithFormat(ROOT, '%s.%e', `${ROOT}/a.txt`)).toBeNull();
    });

    it('rejects files outside the directory', () => {
        expect(matchWithFormat(ROOT, '%s.%e', '/nonexistent-judge-root/other/a.in')).toBeNull();
    });

    it('matches nested formats', () => {
        expect(matchWithFormat(ROOT, 'test_%s/%e.txt', `${ROOT}/test_7/out.txt`))
            .toEqual({ name: '7', ext: 'out' });
    });

    it('enforces repeated %s', () => {
        expect(matchWithFormat(ROOT, '%s/%s.%e', `${ROOT}/a/a.in`)).toEqual({ name: 'a', ext: 'in' });
        expect(matchWithFormat(ROOT, '%s/%s.%e', `${ROOT}/a/b.in`)).toBeNull();
    });

    it('returns null when the format has no %e', () => {
        expect(matchWithFormat(ROOT, '%s.in', `${ROOT}/a.in`)).toBeNull();
    });

    describe('through a symlinked directory', () => {
        let tmp: string;

        beforeEach(() => {
            tmp = mkdtempSync(join(tmpdir(), 'testcase-format-'));
            mkdirSync(join(tmp, 'real'));
            symlinkSync(join(tmp, 'real'), join(tmp, 'link'));
        });

        afterEach(() => {
            rmSync(tmp, { recursive: true, force: true });
        });

        it('treats both spellings as the same directory', () => {
            expect(matchWithFormat(join(tmp, 'link'), '%s.%e', join(tmp, 'real', 'a.in')))
                .toEqual({ name: 'a', ext: 'in' });
            expect(matchWithFormat(join(tmp, 'real'), '%s.%e', join(tmp, 'link', 'a.out')))
                .toEqual({ name: 'a', ext: 'out' });
        });
    });
});
