import { readFileSync, renameSync, writeFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { z } from 'zod';

/**
 * Outcome of reading one JSON document against a schema.
 */
export type JsonReadResult<T> =
    | { ok: true; value: T }
    | { ok: false; reason: string };

/**
 * Read and validate a JSON file. Never throws: a missing, unreadable,
 * malformed or mis-shaped file comes back as `ok: false` with a reason.
 */
export function readJsonFile<T>(filePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): JsonReadResult<T> {
    let raw: string;
    try {
        raw = readFileSync(filePath, 'utf-8');
    } catch (error) {
        return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        return { ok: false, reason: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
    }

    const result = schema.safeParse(data);
    if (!result.success) {
        return { ok: false, reason: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
    }
    return { ok: true, value: result.data };
}

/**
 * Pretty-print `data` to `filePath` through a temporary sibling renamed into place.
 */
export function writeJsonFile(filePath: string, data: unknown): void {
    const tmpPath = join(dirname(filePath), `.${basename(filePath)}.tmp`);
    writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    renameSync(tmpPath, filePath);
}
