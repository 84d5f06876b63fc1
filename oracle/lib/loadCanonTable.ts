import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { z } from "zod";
import { CanonDataError } from "../chart/errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const CANON_DIR = path.resolve(__dirname, "../canon");

/**
 * Read and validate one JSON table from oracle/canon.
 * Callers cache the result; the tables never change at run time.
 */
export function loadCanonTable<S extends z.ZodTypeAny>(file: string, schema: S): z.infer<S> {
  const fullPath = path.join(CANON_DIR, file);
  const raw = fs.readFileSync(fullPath, "utf-8");

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new CanonDataError(file, err instanceof Error ? err.message : String(err));
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new CanonDataError(file, result.error.message);
  }
  return result.data;
}
