import { truncateChars } from './truncate';

export const MAX_FIX_CONTEXT_CHARS = 4000;

export const FIX_SYSTEM_PROMPT = 'You are an expert protocol designer who provides clear, actionable solutions.';

export function buildFixPrompt(issue: string, description: string, protocolContext: string): string {
    return `You are an expert protocol designer. A specific issue has been identified in an experimental protocol.

ISSUE: ${issue}
DESCRIPTION: ${description}

PROTOCOL CONTEXT:
${truncateChars(protocolContext, MAX_FIX_CONTEXT_CHARS)}

Generate a concrete, actionable fix for this issue. Provide:
1. A clear fix suggestion (2-3 sentences explaining what to add/change)
2. Step-by-step implementation instructions

Return your response as a JSON object with this exact structure:
{
    "fix_suggestion": "<clear explanation of the fix>",
    "implementation_steps": [
        "<step 1>",
        "<step 2>",
        "<step 3>"
    ]
}

Be specific and actionable. Reference actual protocol details when possible.`;
}
