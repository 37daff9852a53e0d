/**
 * @fileoverview JSON Extraction
 *
 * Model output is untrusted text. Each strategy tries one way of finding a JSON
 * object in it and returns `undefined` to hand over to the next one.
 */

export type JsonObject = Record<string, unknown>;

export type DecodeStrategy = (raw: string) => JsonObject | undefined;

const FENCED_BLOCK = /```[A-Za-z]*\s*([\s\S]*?)```/;

function isJsonObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses `text` and accepts only a JSON object; arrays and scalars count as failures.
 */
export function tryDecodeObject(text: string): JsonObject | undefined {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch {
        return undefined;
    }
    return isJsonObject(value) ? value : undefined;
}

/** The whole output is JSON. */
export const decodeWhole: DecodeStrategy = (raw) => tryDecodeObject(raw.trim());

/** JSON inside the first markdown code fence, with or without a language tag. */
export const decodeFencedBlock: DecodeStrategy = (raw) => {
    const match = FENCED_BLOCK.exec(raw);
    return match ? tryDecodeObject(match[1].trim()) : undefined;
};

/** Commentary before or after the object: take the first `{` through the last `}`. */
export const decodeOutermostBraces: DecodeStrategy = (raw) => {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end <= start) {
        return undefined;
    }
    return tryDecodeObject(raw.slice(start, end + 1));
};

export const DECODE_PIPELINE: readonly DecodeStrategy[] = [
    decodeWhole,
    decodeFencedBlock,
    decodeOutermostBraces,
];

/**
 * Runs the strategies in order; the first object found wins.
 */
export function decodeJsonObject(
    raw: string,
    pipeline: readonly DecodeStrategy[] = DECODE_PIPELINE,
): JsonObject | undefined {
    for (const strategy of pipeline) {
        const decoded = strategy(raw);
        if (decoded) {
            return decoded;
        }
    }
    return undefined;
}
