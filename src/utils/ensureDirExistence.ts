import fs from 'fs';
import path from 'path';

/**
 * Create the parent directory of a file if needed. Returns true when it was created.
 */
export function ensureDirExistence(filePath: string): boolean {
    const dir = path.dirname(filePath);
    if (fs.existsSync(dir)) {
        return false;
    }
    console.warn(`[Warning] creating missing log directory ${dir}`);
    fs.mkdirSync(dir, { recursive: true });
    return true;
}
