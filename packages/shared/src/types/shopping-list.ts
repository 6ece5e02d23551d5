export interface ShoppingListItem {
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface ShoppingList {
  items: ShoppingListItem[];
  /** Names of the recipes in the cart, in the order they were added. */
  recipes: string[];
}
