import type { CostBreakdown, PricedIngredient } from "../types";

/**
 * Sums the regular price of each quote's first product item. Ingredients
 * with no product are left out of both the total and the breakdown.
 */
export function aggregateCosts(priced: PricedIngredient[]): CostBreakdown {
  const itemCosts: Record<string, number> = {};

  for (const { name, quote } of priced) {
    const item = quote.data[0]?.items[0];
    if (!item) continue;

    const price = item.price?.regular ?? 0;
    itemCosts[name] = (itemCosts[name] ?? 0) + price;
  }

  // Derived from the breakdown: totalCost == sum(itemCosts)
  const totalCost = Object.values(itemCosts).reduce((sum, cost) => sum + cost, 0);

  return { totalCost, itemCosts };
}
