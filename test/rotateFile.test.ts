import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { rotateFile } from '../src/utils/rotateFile.js';

describe('rotateFile', () => {
  let dir: string;
  const now = new Date('2024-03-10T12:00:00Z');

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'deauth-rotate-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should move the current file aside under today\'s date', () => {
    fs.writeFileSync(path.join(dir, 'app.log'), 'line\n');

    rotateFile({ dir, filename: 'app.log', now });

    expect(fs.existsSync(path.join(dir, 'app.log'))).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'app-2024-03-10.log'), 'utf-8')).toBe('line\n');
  });

  it('should rotate at most once per day', () => {
    fs.writeFileSync(path.join(dir, 'app-2024-03-10.log'), 'first\n');
    fs.writeFileSync(path.join(dir, 'app.log'), 'second\n');

    rotateFile({ dir, filename: 'app.log', now });

    expect(fs.readFileSync(path.join(dir, 'app-2024-03-10.log'), 'utf-8')).toBe('first\n');
    expect(fs.readFileSync(path.join(dir, 'app.log'), 'utf-8')).toBe('second\n');
  });

  it('should delete rotated copies past the retention period', () => {
    for (const name of ['app-2024-03-01.log', 'app-2024-03-05.log', 'deauth-events-2024-01-01.log']) {
      fs.writeFileSync(path.join(dir, name), '');
    }

    const deleted = rotateFile({ dir, filename: 'app.log', retentionDays: 7, now });

    expect(deleted).toEqual(['app-2024-03-01.log']);
    expect(fs.readdirSync(dir).sort()).toEqual(['app-2024-03-05.log', 'deauth-events-2024-01-01.log']);
  });
});
