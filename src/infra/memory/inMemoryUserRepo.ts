import { PersistedUserState, User } from '../../domain/user/user.js';
import { UserListFilters, UserRepository } from '../../domain/user/userRepository.js';
import { UniquenessViolationError, UserNotFoundError } from '../../domain/user/errors.js';

/**
 * In-process UserRepository. Enforces the same uniqueness rules as the
 * users table and never reuses an id, even after a delete.
 */
export class InMemoryUserRepo implements UserRepository {
  private rows = new Map<number, PersistedUserState>();
  private nextId = 1;

  async create(user: User): Promise<User> {
    const state = user.getState();
    this.assertUnique(state.email, state.username);

    const row: PersistedUserState = { ...state, id: this.nextId++ };
    this.rows.set(row.id, row);

    return User.fromPersistence(row);
  }

  async findById(id: number): Promise<User | null> {
    const row = this.rows.get(id);
    return row ? User.fromPersistence(row) : null;
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne((row) => row.email === email);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne((row) => row.username === username);
  }

  async update(user: User): Promise<User> {
    const state = user.getState();
    if (state.id === undefined) {
      throw new Error('Cannot update a user that has not been persisted');
    }

    const existing = this.rows.get(state.id);
    if (!existing) {
      throw new UserNotFoundError('id', state.id);
    }

    this.assertUnique(state.email, state.username, state.id);

    const row: PersistedUserState = {
      ...state,
      id: state.id,
      createdAt: existing.createdAt,
    };
    this.rows.set(row.id, row);

    return User.fromPersistence(row);
  }

  async list(filters: UserListFilters = {}): Promise<User[]> {
    let rows = this.matching(filters);

    if (filters.orderBy) {
      const field = filters.orderBy;
      const direction = filters.order === 'desc' ? -1 : 1;
      rows = [...rows].sort((a, b) => compare(a[field], b[field]) * direction);
    }

    const offset = filters.offset ?? 0;
    const end = filters.limit === undefined ? undefined : offset + filters.limit;

    return rows.slice(offset, end).map((row) => User.fromPersistence(row));
  }

  async count(filters: UserListFilters = {}): Promise<number> {
    return this.matching(filters).length;
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  private matching(filters: UserListFilters): PersistedUserState[] {
    return [...this.rows.values()].filter(
      (row) => filters.isActive === undefined || row.isActive === filters.isActive
    );
  }

  private findOne(predicate: (row: PersistedUserState) => boolean): User | null {
    for (const row of this.rows.values()) {
      if (predicate(row)) {
        return User.fromPersistence(row);
      }
    }
    return null;
  }

  private assertUnique(email: string, username: string, exceptId?: number): void {
    for (const row of this.rows.values()) {
      if (row.id === exceptId) continue;
      if (row.email === email) throw new UniquenessViolationError('email');
      if (row.username === username) throw new UniquenessViolationError('username');
    }
  }
}

function compare(a: number | string | Date, b: number | string | Date): number {
  const left = a instanceof Date ? a.getTime() : a;
  const right = b instanceof Date ? b.getTime() : b;
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  const l = String(left);
  const r = String(right);
  if (l < r) return -1;
  if (l > r) return 1;
  return 0;
}
