/**
 * Test utilities and helper functions
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../logger/index.js';
import type { DetectionContext } from '../raid/context.js';
import type { ExecResult } from '../utils/exec.js';
import { CommandError, ErrorCode } from '../errors/index.js';

export function createTestLogger(): Logger {
  return new Logger({ level: 'error', format: 'simple', maxFiles: 1, maxSize: '1m' });
}

export function createTestContext(overrides?: Partial<DetectionContext>): DetectionContext {
  return {
    logger: createTestLogger(),
    commandTimeout: 0,
    ...overrides,
  };
}

const fixtureDirs: string[] = [];

/**
 * Write a fixture into a fresh temp directory and return its path.
 * Call removeFixtures from afterAll.
 */
export function writeFixture(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'health-plugins-'));
  fixtureDirs.push(dir);
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

export function removeFixtures(): void {
  for (const dir of fixtureDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function okResult(stdout: string): ExecResult {
  return { stdout, stderr: '', exitCode: 0 };
}

export function notFoundResult(file: string): ExecResult {
  return {
    stdout: '',
    stderr: `spawn ${file} ENOENT`,
    exitCode: 127,
    error: new CommandError(`${file} not found`, ErrorCode.COMMAND_NOT_FOUND, { file }),
  };
}
