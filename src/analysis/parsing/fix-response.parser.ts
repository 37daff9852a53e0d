import { z } from 'zod';
import { FixSuggestion, UNKNOWN } from '../interfaces';
import { lenientList, nonBlankText } from './field-schemas';
import { decodeJsonObject } from './json-extraction';

const fixSchema = z.object({
    fix_suggestion: nonBlankText.catch(UNKNOWN),
    implementation_steps: lenientList(nonBlankText),
});

/**
 * Without a JSON object the model's prose is the best suggestion available.
 */
export function parseFixResponse(rawText: string): FixSuggestion {
    const decoded = decodeJsonObject(rawText);
    const parsed = decoded ? fixSchema.safeParse(decoded) : undefined;

    if (!parsed?.success) {
        return {
            fixSuggestion: rawText.trim() || UNKNOWN,
            implementationSteps: [],
        };
    }

    return {
        fixSuggestion: parsed.data.fix_suggestion,
        implementationSteps: parsed.data.implementation_steps,
    };
}
