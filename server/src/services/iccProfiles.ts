/**
 * Read-only ICC profile library.
 *
 * Profiles are `.icc` files in a configured directory. They are embedded into
 * the generated document as base64 for the PDF output intent.
 */
import fs from 'fs';
import path from 'path';
import type { IccProfileInfo } from '../../../shared/types.js';
import { debugLog } from '../utils/debug.js';

const ICC_EXTENSION = '.icc';

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** Profiles sorted by case-insensitive name; an absent directory has none. */
export async function listIccProfiles(dir: string): Promise<IccProfileInfo[]> {
    let entries: string[];
    try {
        entries = await fs.promises.readdir(dir);
    } catch (err) {
        if (isNotFound(err)) {
            debugLog(`[ICC] Profile directory ${dir} does not exist`);
            return [];
        }
        throw err;
    }

    return entries
        .filter((filename) => filename.toLowerCase().endsWith(ICC_EXTENSION))
        .map((filename) => ({
            filename,
            name: filename.slice(0, -ICC_EXTENSION.length),
        }))
        .sort((a, b) => {
            const left = a.name.toLowerCase();
            const right = b.name.toLowerCase();
            return left < right ? -1 : left > right ? 1 : 0;
        });
}

/**
 * Read a profile by name (with or without the `.icc` suffix) as base64.
 * Returns null when the profile does not exist or the name would leave the directory.
 */
export async function readIccProfileBase64(dir: string, profileName: string): Promise<string | null> {
    if (!profileName) return null;
    if (profileName.includes('/') || profileName.includes('\\') || profileName.includes('..')) {
        console.warn(`[ICC] Rejected profile name: ${profileName}`);
        return null;
    }

    const filename = profileName.toLowerCase().endsWith(ICC_EXTENSION)
        ? profileName
        : `${profileName}${ICC_EXTENSION}`;

    try {
        const contents = await fs.promises.readFile(path.join(dir, filename));
        return contents.toString('base64');
    } catch (err) {
        if (isNotFound(err)) {
            debugLog(`[ICC] Profile not found: ${filename}`);
            return null;
        }
        throw err;
    }
}
