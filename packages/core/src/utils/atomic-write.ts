import fs from 'fs/promises';
import path from 'path';
import crypto from 'crypto';

function createTempPath(filePath: string): string {
  const unique = crypto.randomBytes(6).toString('hex');
  return `${filePath}.${unique}.tmp`;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Writes through a sibling temp file and a rename, so readers never see a
 * half-written file.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = createTempPath(filePath);
  await fs.writeFile(tempPath, contents, 'utf8');

  try {
    await fs.rename(tempPath, filePath);
  } catch (error) {
    const code = errorCode(error);
    if (code !== 'EEXIST' && code !== 'EPERM') {
      throw error;
    }
    // Windows refuses to rename over an existing file
    await fs.rm(filePath, { force: true });
    await fs.rename(tempPath, filePath);
  } finally {
    await fs.rm(tempPath, { force: true });
  }
}
