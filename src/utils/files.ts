import { access } from 'fs/promises';
import { constants } from 'fs';

/**
 * Checks whether a path exists and is readable
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
