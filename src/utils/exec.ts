/**
 * Utilities for executing external status tools
 */

import { execFile } from 'child_process';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { promisify } from 'util';
import { CommandError, ErrorCode } from '../errors/index.js';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when the tool could not be started or was killed */
  error?: CommandError;
}

export interface ExecOptions {
  /** Milliseconds; 0 waits indefinitely */
  timeout?: number;
}

/**
 * Run a tool directly (no shell) and capture its output. Stdout is returned
 * as printed, since callers may correlate output lines by position.
 * A non-zero exit is not an error here: several RAID tools exit non-zero
 * while still printing a usable report.
 */
export async function executeCommand(
  file: string,
  args: readonly string[] = [],
  options?: ExecOptions
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(file, args, {
      encoding: 'utf8',
      timeout: options?.timeout ?? 0,
      maxBuffer: 10 * 1024 * 1024, // 10MB
    });

    return {
      stdout,
      stderr: stderr.trim(),
      exitCode: 0,
    };
  } catch (error) {
    return toFailedResult(file, error);
  }
}

function toFailedResult(file: string, error: unknown): ExecResult {
  if (!(error instanceof Error)) {
    return {
      stdout: '',
      stderr: String(error),
      exitCode: 1,
      error: new CommandError(`${file}: ${String(error)}`, ErrorCode.COMMAND_FAILED, { file }),
    };
  }

  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr =
    'stderr' in error && typeof error.stderr === 'string' && error.stderr !== ''
      ? error.stderr.trim()
      : error.message;
  const code = 'code' in error ? error.code : undefined;

  // Process ran to completion with a non-zero status
  if (typeof code === 'number') {
    return { stdout, stderr, exitCode: code };
  }

  if ('killed' in error && error.killed === true) {
    return {
      stdout,
      stderr,
      exitCode: 124,
      error: new CommandError(`${file} was killed before finishing`, ErrorCode.COMMAND_TIMEOUT, { file }, error),
    };
  }

  if (code === 'ENOENT') {
    return {
      stdout,
      stderr,
      exitCode: 127,
      error: new CommandError(`${file} not found`, ErrorCode.COMMAND_NOT_FOUND, { file }, error),
    };
  }

  if (code === 'EACCES') {
    return {
      stdout,
      stderr,
      exitCode: 126,
      error: new CommandError(`${file} is not executable`, ErrorCode.COMMAND_NOT_EXECUTABLE, { file }, error),
    };
  }

  return {
    stdout,
    stderr,
    exitCode: 1,
    error: new CommandError(`${file} failed: ${error.message}`, ErrorCode.COMMAND_FAILED, { file, code }, error),
  };
}

/**
 * Check whether a tool exists at the given path and may be executed
 */
export async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse simple key-value output (key: value format)
 */
export function parseKeyValue(output: string): Map<string, string> {
  const map = new Map<string, string>();
  const lines = output.split('\n');

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed === '') continue;

    const colonIndex = trimmed.indexOf(':');
    if (colonIndex > 0) {
      const key = trimmed.substring(0, colonIndex).trim();
      const value = trimmed.substring(colonIndex + 1).trim();
      map.set(key, value);
    }
  }

  return map;
}
