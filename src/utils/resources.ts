/**
 * Location of bundled resource files
 *
 * resources/ sits at the package root, two levels above this module in both
 * src/utils and dist/utils.
 *
 * @module utils/resources
 */

import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const RESOURCES_DIR = path.resolve(__dirname, '..', '..', 'resources');

export function resourcePath(name: string): string {
  return path.join(RESOURCES_DIR, name);
}
