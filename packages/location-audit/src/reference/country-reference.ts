/**
 * Country reference data
 *
 * ISO3/ISO2 code pairs used to build the p-code value pattern. Loaded once
 * per run from `data/countries.json` (or a configured file) and passed to the
 * classifier explicitly.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

export const CountryCodesSchema = z.object({
  iso3: z.string().regex(/^[A-Z]{3}$/, 'ISO3 code must be three upper-case letters'),
  iso2: z.string().regex(/^[A-Z]{2}$/, 'ISO2 code must be two upper-case letters'),
  name: z.string().min(1),
});

export const CountryReferenceSchema = z.object({
  countries: z.array(CountryCodesSchema).min(1),
});

export type CountryCodes = z.infer<typeof CountryCodesSchema>;

/**
 * Find a file shipped with the package by walking up from this module, so the
 * lookup works from both `src/` and the compiled `dist/src/`
 */
function locatePackageFile(relativePath: string): string {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  let dir = moduleDir;

  for (;;) {
    const candidate = join(dir, relativePath);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return join(moduleDir, '..', '..', relativePath);
    }
    dir = parent;
  }
}

export const DEFAULT_COUNTRIES_PATH = locatePackageFile(join('data', 'countries.json'));

/**
 * Read and validate a country reference file
 *
 * @throws {Error} When the file is missing or does not match the schema
 */
export async function loadCountryReference(
  filePath: string = DEFAULT_COUNTRIES_PATH
): Promise<CountryCodes[]> {
  const content = await readFile(filePath, 'utf-8');
  const parsed = CountryReferenceSchema.safeParse(JSON.parse(content));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid country reference ${filePath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown issue'}`
    );
  }

  return parsed.data.countries;
}
