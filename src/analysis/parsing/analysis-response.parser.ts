/**
 * @fileoverview Analysis Response Parser
 *
 * Turns raw model output into an {@link AnalysisResult}. Never throws: output that
 * holds no JSON object degrades to a sentinel result that keeps the raw text.
 */

import { z } from 'zod';
import { AnalysisResult, Finding, UNKNOWN } from '../interfaces';
import { estimateSchema, lenientList, nonBlankText, probabilitySchema } from './field-schemas';
import { decodeJsonObject } from './json-extraction';

export const PARSE_FAILURE_SUGGESTION =
    'Automated parsing of the model response failed. Review the raw model output or run the analysis again.';

const issueSchema = z
    .object({ issue: nonBlankText, description: nonBlankText })
    .transform(({ issue, description }): Finding => ({ title: issue, description }));

const checkSchema = z
    .object({ check: nonBlankText, description: nonBlankText })
    .transform(({ check, description }): Finding => ({ title: check, description }));

// Unknown keys are stripped by z.object
const analysisSchema = z.object({
    success_probability: probabilitySchema,
    critical_issues: lenientList(issueSchema),
    warnings: lenientList(issueSchema),
    passed_checks: lenientList(checkSchema),
    estimated_cost: estimateSchema,
    estimated_time: estimateSchema,
    suggestions: lenientList(nonBlankText),
});

export function degradedAnalysis(rawModelOutput: string): AnalysisResult {
    return {
        successProbability: 0,
        criticalIssues: [],
        warnings: [],
        passedChecks: [],
        estimatedCost: UNKNOWN,
        estimatedTime: UNKNOWN,
        suggestions: [PARSE_FAILURE_SUGGESTION],
        rawModelOutput,
    };
}

export function isDegradedAnalysis(result: AnalysisResult): boolean {
    return result.suggestions.length === 1 && result.suggestions[0] === PARSE_FAILURE_SUGGESTION;
}

export function parseAnalysisResponse(rawText: string): AnalysisResult {
    const decoded = decodeJsonObject(rawText);
    if (!decoded) {
        return degradedAnalysis(rawText);
    }

    const parsed = analysisSchema.safeParse(decoded);
    if (!parsed.success) {
        return degradedAnalysis(rawText);
    }

    const data = parsed.data;
    return {
        successProbability: data.success_probability,
        criticalIssues: data.critical_issues,
        warnings: data.warnings,
        passedChecks: data.passed_checks,
        estimatedCost: data.estimated_cost,
        estimatedTime: data.estimated_time,
        suggestions: data.suggestions,
        rawModelOutput: rawText,
    };
}
