import type { Paginated, UserWithRecipes } from '@foodgram/shared';
import { info } from 'firebase-functions/logger';
import type { Repositories, UserRecord } from '../repositories/index.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import type { UserService } from './user.service.js';

export class SubscriptionService {
  constructor(
    private readonly repos: Repositories,
    private readonly users: UserService
  ) {}

  subscribe(user: UserRecord, authorId: number, recipesLimit?: number): UserWithRecipes {
    const author = this.repos.users.findById(authorId);
    if (author === null) {
      throw new NotFoundError('User', authorId);
    }
    if (author.id === user.id) {
      throw ValidationError.forField('author', 'You cannot subscribe to yourself');
    }
    if (!this.repos.subscriptions.add(user.id, author.id)) {
      throw ValidationError.forField('author', `You are already subscribed to ${author.username}`);
    }

    info('Subscription created', { userId: user.id, authorId: author.id });
    const [result] = this.users.withRecipes([author], user.id, recipesLimit);
    if (result === undefined) {
      throw new Error(`Failed to load author ${author.id}`);
    }
    return result;
  }

  unsubscribe(user: UserRecord, authorId: number): void {
    if (this.repos.users.findById(authorId) === null) {
      throw new NotFoundError('User', authorId);
    }
    if (!this.repos.subscriptions.remove(user.id, authorId)) {
      throw new NotFoundError('Subscription', authorId);
    }
  }

  list(
    user: UserRecord,
    limit: number,
    offset: number,
    recipesLimit?: number
  ): Paginated<UserWithRecipes> {
    const authorIds = this.repos.subscriptions.findAuthorIds(user.id, limit, offset);
    const byId = new Map(this.repos.users.findByIds(authorIds).map((author) => [author.id, author]));
    const authors = authorIds
      .map((id) => byId.get(id))
      .filter((author): author is UserRecord => author !== undefined);

    return {
      count: this.repos.subscriptions.countAuthors(user.id),
      results: this.users.withRecipes(authors, user.id, recipesLimit),
    };
  }
}
