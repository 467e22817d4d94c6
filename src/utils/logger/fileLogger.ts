import fs from 'fs';
import path from 'path';
import schedule from 'node-schedule';
import { ensureDirExistence } from '../ensureDirExistence.js';
import { rotateFile, RotateFileOptions } from '../rotateFile.js';

export interface FileLoggerOptions {
  logFile: string;
  retentionDays: number;
}

type ConsoleMethod = 'log' | 'warn' | 'error';

/**
 * Tee console.log / warn / error into a log file rotated every midnight.
 * Resolves the returned function's promise once the original console is back
 * and the file is flushed.
 */
export function installFileLogger({
  logFile,
  retentionDays,
}: FileLoggerOptions): () => Promise<void> {
  const orig = {
    log: console.log,
    warn: console.warn,
    error: console.error,
  };

  ensureDirExistence(logFile);

  const rotateFileOptions: RotateFileOptions = {
    dir: path.dirname(logFile),
    filename: path.basename(logFile),
    retentionDays,
  };

  let logStream = fs.createWriteStream(logFile, { flags: 'a' });
  rotateFile(rotateFileOptions);
  const job = schedule.scheduleJob('0 0 * * *', () => {
    logStream.end();
    rotateFile(rotateFileOptions);
    logStream = fs.createWriteStream(logFile, { flags: 'a' });
  });

  const tee = (type: ConsoleMethod) => (...args: unknown[]) => {
    const now = new Date().toISOString();
    logStream.write(`[${now}] [${type.toUpperCase()}] ${args.map(String).join(' ')}\n`);
    orig[type](...args);
  };

  console.log = tee('log');
  console.warn = tee('warn');
  console.error = tee('error');

  return () => {
    job.cancel();
    console.log = orig.log;
    console.warn = orig.warn;
    console.error = orig.error;
    return new Promise<void>((resolve) => {
      logStream.end(() => resolve());
    });
  };
}
