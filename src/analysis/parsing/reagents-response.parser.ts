import { z } from 'zod';
import { ReagentCategory, ReagentItem, ShoppingList } from '../interfaces';
import { lenientList, nonBlankText, optionalTextSchema } from './field-schemas';
import { decodeJsonObject } from './json-extraction';

const priceSchema = z
    .union([z.number(), z.string().trim().regex(/^\$?\d+(\.\d+)?$/).transform((v) => Number.parseFloat(v.replace('$', '')))])
    .pipe(z.number().finite().nonnegative())
    .catch(0);

const itemSchema = z
    .object({
        name: nonBlankText,
        concentration: optionalTextSchema,
        quantity: optionalTextSchema,
        estimated_price: priceSchema,
        checked: z.boolean().catch(false),
    })
    .transform(
        (item): ReagentItem => ({
            name: item.name,
            concentration: item.concentration,
            quantity: item.quantity,
            estimatedPrice: item.estimated_price,
            checked: item.checked,
        }),
    );

const categorySchema = z
    .object({ name: nonBlankText, items: lenientList(itemSchema) })
    .transform((category): ReagentCategory => ({ name: category.name, items: category.items }));

const shoppingListSchema = z.object({ categories: lenientList(categorySchema) });

/** Rounded to cents to keep float noise out of the response. */
export function totalCost(categories: ReagentCategory[]): number {
    const cents = categories
        .flatMap((category) => category.items)
        .reduce((sum, item) => sum + Math.round(item.estimatedPrice * 100), 0);
    return cents / 100;
}

/**
 * The model's own `total_cost` is ignored and recomputed from the item prices.
 */
export function parseReagentsResponse(rawText: string): ShoppingList {
    const decoded = decodeJsonObject(rawText);
    const parsed = decoded ? shoppingListSchema.safeParse(decoded) : undefined;
    const categories = parsed?.success ? parsed.data.categories : [];

    return { categories, totalCost: totalCost(categories) };
}
