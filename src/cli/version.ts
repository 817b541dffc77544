import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PackageSchema = z.object({ version: z.string() });

/**
 * Version from the package.json two levels above this module (the project
 * root, from both src/cli and dist/cli).
 */
export function readPackageVersion(): string {
  const path = fileURLToPath(new URL('../../package.json', import.meta.url));
  return PackageSchema.parse(JSON.parse(readFileSync(path, 'utf-8'))).version;
}
