import { readFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { z } from 'zod';

export type ZipLocation = {
  zip: string;
  city: string;
  state: string;
  lat: number;
  lon: number;
};

export interface ZipDirectory {
  has(zip: string): boolean;
  lookup(zip: string): ZipLocation | undefined;
  size(): number;
  /** Every known ZIP, ascending. */
  codes(): string[];
}

const zipReferenceSchema = z.object({
  zips: z.array(
    z.object({
      zip: z.string().regex(/^\d{5}$/),
      city: z.string().min(1),
      state: z.string().length(2),
      lat: z.number().min(-90).max(90),
      lon: z.number().min(-180).max(180),
    }),
  ),
});

const DEFAULT_REFERENCE_PATH = path.join(process.cwd(), 'config', 'zip-reference.json');

let cachedDirectory: ZipDirectory | null = null;

export function createZipDirectory(entries: ZipLocation[]): ZipDirectory {
  const byZip = new Map(entries.map((entry) => [entry.zip, Object.freeze({ ...entry })]));
  return {
    has: (zip) => byZip.has(zip),
    lookup: (zip) => byZip.get(zip),
    size: () => byZip.size,
    codes: () => [...byZip.keys()].sort(),
  };
}

export async function loadZipDirectory(
  referencePath: string = process.env.ZIP_REFERENCE_PATH ?? DEFAULT_REFERENCE_PATH,
): Promise<ZipDirectory> {
  if (cachedDirectory) {
    return cachedDirectory;
  }
  const contents = await readFile(referencePath, 'utf8');
  const parsed = zipReferenceSchema.parse(JSON.parse(contents));
  cachedDirectory = createZipDirectory(parsed.zips);
  return cachedDirectory;
}
