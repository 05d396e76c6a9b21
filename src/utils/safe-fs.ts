/**
 * Safe file system utilities with path validation.
 *
 * Every wrapper resolves its path to an absolute path and rejects empty paths
 * and paths containing null bytes before touching the file system. Document
 * paths and ledger paths arrive from the command line and the config file, so
 * all file access in sesame goes through here.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { statSync, type Stats } from 'node:fs';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is not a string, is empty, or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to write.
 * @param data - The text to write.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, 'utf-8');
}

/**
 * Checks whether a file or directory exists after validating the path.
 *
 * @param filePath - The path to check.
 * @returns True if the path exists, false otherwise.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeExists(filePath: string): Promise<boolean> {
  const validatedPath = validatePath(filePath);
  try {
    await fs.access(validatedPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Creates a directory after validating the path.
 *
 * @param filePath - The path to the directory to create.
 * @param options - Optional recursive mode and mode options.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeMkdir(
  filePath: string,
  options?: { recursive?: boolean; mode?: number }
): Promise<string | undefined> {
  const validatedPath = validatePath(filePath);
  return fs.mkdir(validatedPath, options);
}

/**
 * Gets file statistics after validating the path.
 *
 * @param filePath - The path to the file or directory.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeStat(filePath: string): Promise<Stats> {
  const validatedPath = validatePath(filePath);
  return fs.stat(validatedPath);
}

/**
 * Synchronous {@link safeStat}, for checks that run inside synchronous validation.
 *
 * @param filePath - The path to the file or directory.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeStatSync(filePath: string): Stats {
  return statSync(validatePath(filePath));
}

/**
 * Deletes a file after validating the path.
 *
 * @param filePath - The path to the file to delete.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.unlink(validatedPath);
}

/**
 * Renames a file after validating both paths.
 *
 * @param oldPath - The current path.
 * @param newPath - The new path.
 * @throws {PathValidationError} If either path is invalid.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  const validatedOldPath = validatePath(oldPath);
  const validatedNewPath = validatePath(newPath);
  return fs.rename(validatedOldPath, validatedNewPath);
}

/**
 * Opens a file handle after validating the path.
 *
 * The caller owns the handle and must close it.
 *
 * @param filePath - The path to open.
 * @param flags - File system flags, such as `'r'` or `'a+'`.
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeOpen(filePath: string, flags: string): Promise<fs.FileHandle> {
  const validatedPath = validatePath(filePath);
  return fs.open(validatedPath, flags);
}
