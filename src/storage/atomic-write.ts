import { mkdirSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, basename, join } from 'node:path';
import { randomBytes } from 'node:crypto';

/**
 * Write a file so readers see either the old content or the new, never a prefix.
 * Content goes to a temp file in the same directory, which is then renamed
 * over the target (rename is atomic within one filesystem).
 */
export function writeFileAtomic(path: string, content: string): void {
    const dir = dirname(path);
    mkdirSync(dir, { recursive: true });

    const tmpPath = join(dir, `.${basename(path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

    try {
        writeFileSync(tmpPath, content, 'utf-8');
        renameSync(tmpPath, path);
    } catch (error) {
        rmSync(tmpPath, { force: true });
        throw error;
    }
}
