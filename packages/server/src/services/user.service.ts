import type { Paginated, RecipeSummary, UserProfile, UserWithRecipes } from '@foodgram/shared';
import type { RecipeRecord, Repositories, UserRecord } from '../repositories/index.js';
import { NotFoundError } from '../types/errors.js';

export function toRecipeSummary(recipe: RecipeRecord): RecipeSummary {
  return {
    id: recipe.id,
    name: recipe.name,
    image: recipe.image,
    cooking_time: recipe.cooking_time,
  };
}

export class UserService {
  constructor(private readonly repos: Repositories) {}

  /**
   * Public profiles of `users`. `is_subscribed` is relative to `viewerId`
   * and always false for anonymous viewers.
   */
  toProfiles(users: UserRecord[], viewerId: number | null): UserProfile[] {
    const followed =
      viewerId === null
        ? new Set<number>()
        : this.repos.subscriptions.findFollowedAmong(
            viewerId,
            users.map((user) => user.id)
          );

    return users.map((user) => ({
      id: user.id,
      email: user.email,
      username: user.username,
      first_name: user.first_name,
      last_name: user.last_name,
      avatar: user.avatar,
      is_subscribed: followed.has(user.id),
    }));
  }

  toProfile(user: UserRecord, viewerId: number | null): UserProfile {
    const [profile] = this.toProfiles([user], viewerId);
    if (profile === undefined) {
      throw new Error(`Failed to build profile for user ${user.id}`);
    }
    return profile;
  }

  list(viewerId: number | null, limit: number, offset: number): Paginated<UserProfile> {
    const users = this.repos.users.findAll(limit, offset);
    return {
      count: this.repos.users.count(),
      results: this.toProfiles(users, viewerId),
    };
  }

  getProfile(id: number, viewerId: number | null): UserProfile {
    const user = this.repos.users.findById(id);
    if (user === null) {
      throw new NotFoundError('User', id);
    }
    return this.toProfile(user, viewerId);
  }

  /**
   * Profiles with each author's recipes, newest first. `recipesLimit`
   * truncates the list but not `recipes_count`.
   */
  withRecipes(
    authors: UserRecord[],
    viewerId: number | null,
    recipesLimit?: number
  ): UserWithRecipes[] {
    return this.toProfiles(authors, viewerId).map((profile) => ({
      ...profile,
      recipes: this.repos.recipes.findByAuthor(profile.id, recipesLimit).map(toRecipeSummary),
      recipes_count: this.repos.recipes.countByAuthor(profile.id),
    }));
  }

  setAvatar(user: UserRecord, avatar: string): string {
    this.repos.users.updateAvatar(user.id, avatar);
    return avatar;
  }

  removeAvatar(user: UserRecord): void {
    this.repos.users.updateAvatar(user.id, null);
  }
}
