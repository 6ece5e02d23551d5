import type { ShoppingList } from '@foodgram/shared';

export const EMPTY_SHOPPING_LIST_MESSAGE = 'Shopping list is empty.';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/** Upper-cases the first character and lower-cases the rest. */
export function capitalize(value: string): string {
  if (value.length === 0) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export function shoppingListFilename(date: Date): string {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `Shopping_cart_${stamp}.txt`;
}

/**
 * Plain-text report: a timestamped header, one numbered line per
 * ingredient total, then the recipes it was built from.
 */
export function renderShoppingList(list: ShoppingList, now: Date): string {
  if (list.items.length === 0) {
    return EMPTY_SHOPPING_LIST_MESSAGE;
  }

  return [
    `Shopping list (generated: ${formatTimestamp(now)}):`,
    ...list.items.map(
      (item, index) => `${index + 1}. ${capitalize(item.name)} - ${item.amount} ${item.measurement_unit}`
    ),
    'For the following recipes:',
    ...list.recipes.map((name) => `- ${name}`),
  ].join('\n');
}
