/**
 * @file resources - Bundled data files
 * @description Reads a JSON file shipped beside this module and validates it
 * @depends zod
 */

import { readFileSync } from 'node:fs';
import type { z } from 'zod';

/**
 * @throws ZodError when the file does not match the schema
 */
export function loadResource<S extends z.ZodTypeAny>(fileName: string, schema: S): z.infer<S> {
  const raw = readFileSync(new URL(`./${fileName}`, import.meta.url), 'utf-8');
  return schema.parse(JSON.parse(raw));
}
