/**
 * @fileoverview Analysis Result Types
 *
 * Canonical shapes produced by the response parsers. Field names are camelCase here;
 * the wire names live in the serializers.
 */

/** Sentinel for estimates the model did not (or could not) provide. */
export const UNKNOWN = 'unknown';

/**
 * A titled observation: a critical issue, a warning, or a passed check.
 */
export interface Finding {
    title: string;
    description: string;
}

export interface AnalysisResult {
    /** Integer in [0, 100] */
    successProbability: number;
    criticalIssues: Finding[];
    warnings: Finding[];
    passedChecks: Finding[];
    estimatedCost: string;
    estimatedTime: string;
    suggestions: string[];
    /** Full model output, kept even when parsing degraded */
    rawModelOutput: string;
}

export interface FixSuggestion {
    fixSuggestion: string;
    implementationSteps: string[];
}

/**
 * A fix the caller has accepted and wants applied to the protocol.
 */
export interface FixToApply {
    issue: string;
    description?: string;
    fixSuggestion: string;
    implementationSteps?: string[];
}

export interface ImprovedProtocol {
    improvedProtocol: string;
    changesMade: string[];
    newSuccessProbability: number;
}

export interface ReagentItem {
    name: string;
    concentration: string;
    quantity: string;
    estimatedPrice: number;
    checked: boolean;
}

export interface ReagentCategory {
    name: string;
    items: ReagentItem[];
}

export interface ShoppingList {
    categories: ReagentCategory[];
    /** Sum of item prices, computed locally */
    totalCost: number;
}
