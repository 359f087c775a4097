/**
 * Build-context archiving.
 */

import { buffer } from 'node:stream/consumers';
import tar from 'tar-fs';
import { RequestBuildError } from '../errors';

/**
 * Pack `directory` into an uncompressed tar archive held in memory.
 */
export async function packDirectory(directory: string): Promise<Buffer> {
  try {
    return await buffer(tar.pack(directory));
  } catch (error) {
    throw new RequestBuildError(
      `Cannot archive build context ${directory}`,
      undefined,
      error instanceof Error ? error : undefined,
    );
  }
}
