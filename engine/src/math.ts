/**
 * Floorline Decision Engine - Math Utilities
 * Pure functions for common calculations
 */

/**
 * Minimum of an array, 0 when empty
 */
export function minOf(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => (b < a ? b : a));
}

/**
 * Maximum of an array, 0 when empty
 */
export function maxOf(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => (b > a ? b : a));
}

/**
 * American odds with an explicit sign for positive prices (+120, -200)
 */
export function formatAmericanOdds(price: number): string {
    return price > 0 ? `+${price}` : String(price);
}
