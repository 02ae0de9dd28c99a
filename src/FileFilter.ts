/**
 * FileFilter — Backup and Hidden File Exclusion
 *
 * Editors leave `foo~`, `#foo#` and dotfiles next to test cases.
 * They are dropped with a warning; filtering itself never fails.
 */
import { parse } from 'node:path';
import type { Reporter } from './types.js';
import { silentReporter } from './Reporter.js';

/**
 * Classify by the base name with its last extension stripped.
 *
 * @example
 * isBackupOrHiddenFile('tests/1.in~')  // false, the stem is "1"
 * isBackupOrHiddenFile('tests/1~.in')  // true
 * isBackupOrHiddenFile('tests/#1#.in') // true
 */
export function isBackupOrHiddenFile(path: string): boolean {
    const stem = parse(path).name;
    return stem.endsWith('~')
        || (stem.startsWith('#') && stem.endsWith('#'))
        || stem.startsWith('.');
}

export function dropBackupOrHiddenFiles(
    paths: readonly string[],
    reporter: Reporter = silentReporter,
): string[] {
    const kept: string[] = [];
    for (const path of paths) {
        if (isBackupOrHiddenFile(path)) {
            reporter.report('warning', `ignore a backup file: ${path}`);
        } else {
            kept.push(path);
        }
    }
    return kept;
}
