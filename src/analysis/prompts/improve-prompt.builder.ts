import { FixToApply } from '../interfaces';
import { truncateChars } from './truncate';

export const MAX_IMPROVE_PROTOCOL_CHARS = 6000;

export const IMPROVE_SYSTEM_PROMPT = 'You are an expert protocol editor who makes precise, targeted improvements.';

/**
 * One block per fix, steps numbered from 1.
 */
export function summarizeFixes(fixes: FixToApply[]): string {
    return fixes
        .map((fix) => {
            const steps = (fix.implementationSteps ?? []).map((step, i) => `  ${i + 1}. ${step}`);
            return [
                `ISSUE: ${fix.issue}`,
                `DESCRIPTION: ${fix.description ?? ''}`,
                `FIX: ${fix.fixSuggestion}`,
                'IMPLEMENTATION:',
                ...steps,
            ].join('\n');
        })
        .join('\n\n');
}

export function buildImprovePrompt(originalProtocol: string, fixes: FixToApply[]): string {
    return `You are an expert protocol editor. Apply the following fixes to the protocol.

ORIGINAL PROTOCOL:
${truncateChars(originalProtocol, MAX_IMPROVE_PROTOCOL_CHARS)}

FIXES TO APPLY:
${summarizeFixes(fixes)}

INSTRUCTIONS:
1. Copy the original protocol text
2. For each fix listed above, find the relevant section and make the specific change
3. Add missing information where specified (temperatures, concentrations, controls, etc.)
4. If a fix introduces NEW materials/reagents/controls/information, apply it EVERYWHERE it's relevant:
   - Add to Materials section at the top
   - Add to the specific protocol step where it's used
   - Add to any other sections that reference it
5. Ensure consistency throughout - if you add something, it should be mentioned in all relevant places
6. If a fix requires adding a new section (e.g., control group), add it in the appropriate place
7. Keep other parts of the protocol unchanged
8. The improved protocol MUST be different from the original - the fixes MUST be visible

CONSISTENCY RULE:
- Any material/reagent/control added by a fix must be referenced consistently throughout the protocol
- Materials section must list everything mentioned anywhere in the protocol
- Each mention should be complete with specifications (concentration, quantity, timing, etc.)

Estimate the new success probability based on:
- Original score + (5-10% per critical issue fixed) + (2-3% per warning fixed)
- Don't go above 85-90% unless ALL major issues are fixed

Return your response as a JSON object:
{
    "improved_protocol": "<the complete protocol with fixes applied - MUST be different from original>",
    "changes_made": [
        "<what was added/changed for fix 1>",
        "<what was added/changed for fix 2>"
    ],
    "new_success_probability": <integer 0-100>
}`;
}
