/**
 * @fileoverview Analysis Prompt Builder
 *
 * Renders the fixed review instructions around a truncated protocol excerpt.
 * Role framing is sent separately as the system instruction.
 */

import { truncateChars } from './truncate';

/** Protocol characters sent to the model; downstream token budgets assume this count. */
export const MAX_PROTOCOL_CHARS = 8000;

export const ANALYSIS_SYSTEM_PROMPT =
    'You are an expert scientific protocol reviewer with deep knowledge of experimental design, ' +
    'safety protocols, and common experimental pitfalls. Analyze protocols critically but constructively.';

export const ANALYSIS_PREAMBLE =
    'Analyze the following experimental protocol for potential issues and success probability.';

export const ANALYSIS_INSTRUCTIONS = `Evaluate the protocol on these criteria:

**CRITICAL ISSUES** (Red flags - likely to cause failure):
- Missing negative control
- Missing positive control
- No replication stated
- Unsafe temperatures or conditions
- Contamination risks
- Incompatible reagents
- Vague or missing concentrations for key reagents

**WARNINGS** (Yellow flags - should improve):
- Unclear sample size
- Vague incubation times
- Missing buffer compositions
- No mention of controls (but could be implied)
- Statistical analysis not specified

**GOOD PRACTICES** (Green checks):
- Appropriate controls present
- Clear replication (n= specified)
- Safety protocols mentioned
- Detailed methodology
- Proper concentrations stated

Based on your analysis, estimate:
1. Success probability (0-100%)
2. Rough cost estimate if possible
3. Time estimate if possible
4. Concrete suggestions for improvement

Return your analysis as a JSON object with this exact structure:
{
    "success_probability": <integer 0-100>,
    "critical_issues": [
        {"issue": "<short title>", "description": "<detailed explanation>"}
    ],
    "warnings": [
        {"issue": "<short title>", "description": "<detailed explanation>"}
    ],
    "passed_checks": [
        {"check": "<what passed>", "description": "<why it's good>"}
    ],
    "estimated_cost": "<rough USD estimate or 'Unknown'>",
    "estimated_time": "<rough time estimate or 'Unknown'>",
    "suggestions": ["<concrete actionable suggestion>"]
}

Be specific and reference actual details from the protocol. If information is missing, flag it.`;

/**
 * Builds the user prompt for a protocol review. Pure; empty text still yields a valid prompt.
 */
export function buildAnalysisPrompt(protocolText: string): string {
    return `${ANALYSIS_PREAMBLE}

PROTOCOL TEXT:
${truncateChars(protocolText, MAX_PROTOCOL_CHARS)}

${ANALYSIS_INSTRUCTIONS}`;
}
