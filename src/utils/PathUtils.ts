import * as path from 'path';
import * as fs from 'fs';

function isWithin(candidate: string, root: string): boolean {
    return candidate === root || candidate.startsWith(root + path.sep);
}

/**
 * Whether `inputPath` stays inside `root`, both lexically and once symlinks
 * are resolved. Paths that cannot be resolved are treated as unsafe.
 */
export function isSafePath(inputPath: string, root: string = process.cwd()): boolean {
    const allowedRoot = path.resolve(root);
    const resolvedPath = path.resolve(allowedRoot, inputPath);

    if (!isWithin(resolvedPath, allowedRoot)) {
        return false;
    }

    if (!fs.existsSync(resolvedPath)) {
        return true;
    }

    try {
        return isWithin(fs.realpathSync(resolvedPath), fs.realpathSync(allowedRoot));
    } catch (err) {
        // realpath fails on permission errors; deny rather than guess
        return false;
    }
}

/** File name of `filePath` ends with one of `suffixes`, ignoring case. */
export function hasAcceptedSuffix(filePath: string, suffixes: readonly string[]): boolean {
    const fileName = path.basename(filePath).toLowerCase();
    return suffixes.some((suffix) => fileName.endsWith(suffix.toLowerCase()));
}
