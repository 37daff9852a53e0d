/**
 * @fileoverview Response serializers
 *
 * Wire format for the HTTP API. Key names (including `issue` vs `check` for findings)
 * are part of the public contract with existing clients.
 */

import {
    AnalysisResult,
    Finding,
    FixSuggestion,
    ImprovedProtocol,
    ShoppingList,
} from '../interfaces';

export interface IssueResponse {
    issue: string;
    description: string;
}

export interface CheckResponse {
    check: string;
    description: string;
}

export interface AnalysisResponse {
    success_probability: number;
    critical_issues: IssueResponse[];
    warnings: IssueResponse[];
    passed_checks: CheckResponse[];
    estimated_cost: string;
    estimated_time: string;
    suggestions: string[];
}

export interface FixSuggestionResponse {
    fix_suggestion: string;
    implementation_steps: string[];
}

export interface ImprovedProtocolResponse {
    improved_protocol: string;
    changes_made: string[];
    new_success_probability: number;
}

export interface ShoppingListResponse {
    categories: {
        name: string;
        items: {
            name: string;
            concentration: string;
            quantity: string;
            estimated_price: number;
            checked: boolean;
        }[];
    }[];
    total_cost: number;
}

const toIssue = ({ title, description }: Finding): IssueResponse => ({ issue: title, description });
const toCheck = ({ title, description }: Finding): CheckResponse => ({ check: title, description });

/**
 * Raw model output is not part of the wire format.
 */
export function toAnalysisResponse(result: AnalysisResult): AnalysisResponse {
    return {
        success_probability: result.successProbability,
        critical_issues: result.criticalIssues.map(toIssue),
        warnings: result.warnings.map(toIssue),
        passed_checks: result.passedChecks.map(toCheck),
        estimated_cost: result.estimatedCost,
        estimated_time: result.estimatedTime,
        suggestions: result.suggestions,
    };
}

export function toFixSuggestionResponse(fix: FixSuggestion): FixSuggestionResponse {
    return {
        fix_suggestion: fix.fixSuggestion,
        implementation_steps: fix.implementationSteps,
    };
}

export function toImprovedProtocolResponse(improved: ImprovedProtocol): ImprovedProtocolResponse {
    return {
        improved_protocol: improved.improvedProtocol,
        changes_made: improved.changesMade,
        new_success_probability: improved.newSuccessProbability,
    };
}

export function toShoppingListResponse(list: ShoppingList): ShoppingListResponse {
    return {
        categories: list.categories.map((category) => ({
            name: category.name,
            items: category.items.map((item) => ({
                name: item.name,
                concentration: item.concentration,
                quantity: item.quantity,
                estimated_price: item.estimatedPrice,
                checked: item.checked,
            })),
        })),
        total_cost: list.totalCost,
    };
}
