/**
 * SHA-256 hashing for uploaded files
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Stream a file through SHA-256
 *
 * @param filePath - Absolute path to file
 * @throws Error if the path is relative, missing, unreadable or not a file
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(`Cannot access file: ${filePath} - ${String(error)}`);
  }

  const stats = await fs.promises.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error) => {
      stream.destroy();
      reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
    });
  });
}

export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}
