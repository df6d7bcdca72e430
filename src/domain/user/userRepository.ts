import { User } from './user.js';

export type UserOrderField = 'id' | 'email' | 'username' | 'createdAt' | 'updatedAt';

export interface UserListFilters {
  isActive?: boolean;
  offset?: number;
  limit?: number;
  orderBy?: UserOrderField;
  order?: 'asc' | 'desc';
}

/**
 * Persistence contract for users. The service depends on this and nothing
 * else, so the store can be swapped without touching business logic.
 *
 * Lookups resolve to null on a miss. `create` and `update` reject with
 * UniquenessViolationError on an email/username clash; `update` rejects with
 * UserNotFoundError when the user has no id or no row matches it.
 */
export interface UserRepository {
  create(user: User): Promise<User>;
  findById(id: number): Promise<User | null>;
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  update(user: User): Promise<User>;
  list(filters?: UserListFilters): Promise<User[]>;
  count(filters?: UserListFilters): Promise<number>;
  /** Returns whether a row was removed. Deleting a missing id is a no-op. */
  delete(id: number): Promise<boolean>;
}
