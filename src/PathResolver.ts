/**
 * PathResolver — Absolute, Symlink-Free Paths
 *
 * Resolves the deepest existing ancestor through the filesystem and
 * appends the segments that do not exist yet unchanged.
 */
import { realpathSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';

function isMissingEntry(error: unknown): boolean {
    return error instanceof Error
        && 'code' in error
        && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export function resolvePath(target: string): string {
    const absolute = resolve(target);
    try {
        return realpathSync(absolute);
    } catch (error) {
        if (!isMissingEntry(error)) throw error;

        const parent = dirname(absolute);
        if (parent === absolute) return absolute;
        return join(resolvePath(parent), basename(absolute));
    }
}
