import { z } from 'zod';
import { ImprovedProtocol } from '../interfaces';
import { lenientList, nonBlankText, probabilitySchema } from './field-schemas';
import { decodeJsonObject } from './json-extraction';

/**
 * Falls back to the unchanged original protocol when the model output is unusable.
 */
export function parseImproveResponse(rawText: string, originalProtocol: string): ImprovedProtocol {
    const schema = z.object({
        improved_protocol: z.string().refine((value) => value.trim().length > 0).catch(originalProtocol),
        changes_made: lenientList(nonBlankText),
        new_success_probability: probabilitySchema,
    });

    const decoded = decodeJsonObject(rawText);
    const parsed = decoded ? schema.safeParse(decoded) : undefined;

    if (!parsed?.success) {
        return {
            improvedProtocol: originalProtocol,
            changesMade: [],
            newSuccessProbability: 0,
        };
    }

    return {
        improvedProtocol: parsed.data.improved_protocol,
        changesMade: parsed.data.changes_made,
        newSuccessProbability: parsed.data.new_success_probability,
    };
}
