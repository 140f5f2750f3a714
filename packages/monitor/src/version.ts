import { readFileSync } from 'node:fs';
import { z } from 'zod';

const Manifest = z.object({ name: z.string(), version: z.string() });

/** Version field of the package.json one level above `moduleUrl`. */
export function readPackageVersion(moduleUrl: string | URL): string {
  const manifestUrl = new URL('../package.json', moduleUrl);
  return Manifest.parse(JSON.parse(readFileSync(manifestUrl, 'utf-8'))).version;
}

export const VERSION = readPackageVersion(import.meta.url);
