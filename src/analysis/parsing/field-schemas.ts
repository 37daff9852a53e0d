/**
 * @fileoverview Lenient field schemas
 *
 * Zod building blocks that never fail: each falls back to a default with `.catch()`.
 */

import { z } from 'zod';
import { UNKNOWN } from '../interfaces';

export function clampProbability(value: number): number {
    return Math.min(100, Math.max(0, Math.round(value)));
}

/** Non-blank, trimmed string. Fails otherwise; callers decide the fallback. */
export const nonBlankText = z.string().trim().min(1);

/**
 * Integer percentage in [0, 100]. Accepts numbers and numeric strings such as "85" or "85%".
 * Out-of-range values clamp, including the infinities `JSON.parse` yields for overflowing literals.
 */
export const probabilitySchema = z
    .union([
        z.number(),
        z
            .string()
            .trim()
            .regex(/^-?\d+(\.\d+)?%?$/)
            .transform((value) => Number.parseFloat(value)),
    ])
    .transform(clampProbability)
    .catch(0);

/** Free-text estimate; numbers are kept as their string form. */
export const estimateSchema = z
    .union([z.string(), z.number().finite().transform(String)])
    .pipe(nonBlankText)
    .catch(UNKNOWN);

/** Optional detail such as a concentration: blank or missing becomes ''. */
export const optionalTextSchema = z
    .union([z.string(), z.number().finite().transform(String)])
    .transform((value) => value.trim())
    .catch('');

/**
 * Array whose malformed entries are dropped one by one. A missing or non-array value
 * becomes an empty list.
 */
export function lenientList<S extends z.ZodTypeAny>(entry: S) {
    return z
        .array(z.unknown())
        .catch([])
        .transform((items) =>
            items.flatMap((item): z.infer<S>[] => {
                const parsed = entry.safeParse(item);
                return parsed.success ? [parsed.data] : [];
            }),
        );
}
