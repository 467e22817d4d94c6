import fs from 'fs';
import path from 'path';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RotateFileOptions {
  /** Directory where the log file lives */
  dir: string;
  /** File to rotate, e.g. app.log */
  filename: string;
  /** Days rotated copies are kept (default: 7) */
  retentionDays?: number;
  /** Reference time, defaults to the current date */
  now?: Date;
}

/**
 * Moves `<name>.log` aside as `<name>-YYYY-MM-DD.log` and prunes expired copies.
 * Returns the names of the deleted copies.
 */
export function rotateFile({
  dir,
  filename,
  retentionDays = 7,
  now = new Date(),
}: RotateFileOptions): string[] {
  const day = now.toISOString().slice(0, 10);
  const ext = path.extname(filename);
  const base = path.basename(filename, ext);

  const sourcePath = path.join(dir, filename);
  const rotatedPath = path.join(dir, `${base}-${day}${ext}`);

  // at most one rotation per day
  if (fs.existsSync(sourcePath) && !fs.existsSync(rotatedPath)) {
    fs.renameSync(sourcePath, rotatedPath);
  }

  const escapedExt = ext.replace('.', '\\.');
  const pattern = new RegExp(`^${base}-(\\d{4}-\\d{2}-\\d{2})${escapedExt}$`);
  const cutoff = now.getTime() - retentionDays * DAY_MS;
  const deleted: string[] = [];

  for (const file of fs.readdirSync(dir)) {
    const match = file.match(pattern);
    if (!match) {
      continue;
    }
    const rotatedAt = new Date(match[1]).getTime();
    if (!Number.isNaN(rotatedAt) && rotatedAt < cutoff) {
      fs.unlinkSync(path.join(dir, file));
      deleted.push(file);
    }
  }

  return deleted;
}
