import { truncateChars } from './truncate';

export const MAX_REAGENT_PROTOCOL_CHARS = 4000;

export const REAGENTS_SYSTEM_PROMPT =
    'You are a laboratory procurement specialist who extracts reagent lists from protocols.';

/**
 * Materials-only extraction. The model prices items; the total is recomputed locally.
 */
export function buildReagentsPrompt(protocolText: string): string {
    return `You are a text extraction specialist. Extract ONLY materials that are EXPLICITLY written word-for-word in the Materials section below.

PROTOCOL TEXT:
${truncateChars(protocolText, MAX_REAGENT_PROTOCOL_CHARS)}

RULES:
- Read ONLY the section labeled "Materials". Ignore Procedure, Methods, Notes and Quality Control.
- Copy every item name EXACTLY as written. Do not expand abbreviations.
- Do not add materials from your own knowledge, related items, or common lab consumables
  (tubes, pipette tips, gloves) unless they are written in the Materials section.
- If the Materials section lists N items, return exactly N items.
- Keep concentration and quantity exactly as written, or leave them empty.

For PRICING ONLY:
- Use reasonable market prices in USD: Antibodies $150-400, Enzymes $80-250, Buffers $30-90

Return JSON:
{
    "categories": [
        {
            "name": "Antibodies & Proteins",
            "items": [{"name": "...", "concentration": "...", "quantity": "...", "estimated_price": 0, "checked": false}]
        },
        {"name": "Reagents & Substrates", "items": [...]},
        {"name": "Consumables", "items": [...]},
        {"name": "Buffers & Solutions", "items": [...]}
    ],
    "total_cost": 0
}`;
}
