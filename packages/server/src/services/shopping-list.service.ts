import type { Database } from 'better-sqlite3';
import type { ShoppingList } from '@foodgram/shared';
import type { Repositories, UserRecord } from '../repositories/index.js';
import { renderShoppingList, shoppingListFilename } from './shopping-list.renderer.js';

export interface ShoppingListFile {
  filename: string;
  content: string;
}

export class ShoppingListService {
  constructor(
    private readonly db: Database,
    private readonly repos: Repositories
  ) {}

  /**
   * Ingredient totals and recipe names of the user's cart, read in one
   * transaction so a concurrent cart change can not split them.
   */
  build(user: UserRecord): ShoppingList {
    return this.db.transaction((): ShoppingList => ({
      items: this.repos.shoppingCart.sumIngredients(user.id),
      recipes: this.repos.shoppingCart.findRecipeNames(user.id),
    }))();
  }

  export(user: UserRecord, now: Date = new Date()): ShoppingListFile {
    return {
      filename: shoppingListFilename(now),
      content: renderShoppingList(this.build(user), now),
    };
  }
}
