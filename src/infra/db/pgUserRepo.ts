import { User } from '../../domain/user/user.js';
import {
  UserListFilters,
  UserOrderField,
  UserRepository,
} from '../../domain/user/userRepository.js';
import {
  UniqueUserField,
  UniquenessViolationError,
  UserNotFoundError,
} from '../../domain/user/errors.js';
import { ConnectionPool, Queryable, withTransaction } from './transaction.js';

export interface UserRow {
  id: number;
  email: string;
  username: string;
  full_name: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, email, username, full_name, is_active, created_at, updated_at';

const ORDER_COLUMNS: Record<UserOrderField, string> = {
  id: 'id',
  email: 'email',
  username: 'username',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
};

/**
 * PostgreSQL-backed UserRepository over the `users` table.
 *
 * Uniqueness of email and username is left to the table's unique
 * constraints; a 23505 from Postgres becomes UniquenessViolationError.
 */
export class PgUserRepo implements UserRepository {
  constructor(private pool: ConnectionPool) {}

  async create(user: User): Promise<User> {
    const state = user.getState();

    const row = await this.write(async (client) => {
      const result = await client.query<UserRow>(
        `INSERT INTO users (email, username, full_name, is_active, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6)
         RETURNING ${USER_COLUMNS}`,
        [
          state.email,
          state.username,
          state.fullName,
          state.isActive,
          state.createdAt,
          state.updatedAt,
        ]
      );
      return result.rows[0];
    });

    return toUser(row);
  }

  async findById(id: number): Promise<User | null> {
    return this.findOne('id', id);
  }

  async findByEmail(email: string): Promise<User | null> {
    return this.findOne('email', email);
  }

  async findByUsername(username: string): Promise<User | null> {
    return this.findOne('username', username);
  }

  async update(user: User): Promise<User> {
    const state = user.getState();
    const id = state.id;
    if (id === undefined) {
      throw new Error('Cannot update a user that has not been persisted');
    }

    const row = await this.write(async (client) => {
      const result = await client.query<UserRow>(
        `UPDATE users
         SET email = $2, username = $3, full_name = $4, is_active = $5, updated_at = $6
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [id, state.email, state.username, state.fullName, state.isActive, state.updatedAt]
      );

      if (result.rows.length === 0) {
        throw new UserNotFoundError('id', id);
      }
      return result.rows[0];
    });

    return toUser(row);
  }

  async list(filters: UserListFilters = {}): Promise<User[]> {
    const { where, values } = buildWhere(filters);
    let sql = `SELECT ${USER_COLUMNS} FROM users${where}`;

    // Pages need a total order or rows can repeat or vanish between them.
    const paged = filters.offset !== undefined || filters.limit !== undefined;
    const orderBy = filters.orderBy ?? (paged ? 'id' : undefined);
    if (orderBy) {
      const direction = filters.order === 'desc' ? 'DESC' : 'ASC';
      sql += ` ORDER BY ${ORDER_COLUMNS[orderBy]} ${direction}`;
      if (orderBy !== 'id') {
        sql += ', id ASC';
      }
    }
    if (filters.offset !== undefined && filters.offset > 0) {
      values.push(filters.offset);
      sql += ` OFFSET $${values.length}`;
    }
    if (filters.limit !== undefined) {
      values.push(filters.limit);
      sql += ` LIMIT $${values.length}`;
    }

    const result = await this.pool.query<UserRow>(sql, values);
    return result.rows.map(toUser);
  }

  async count(filters: UserListFilters = {}): Promise<number> {
    const { where, values } = buildWhere(filters);
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count FROM users${where}`,
      values
    );
    return result.rows[0]?.count ?? 0;
  }

  async delete(id: number): Promise<boolean> {
    return this.write(async (client) => {
      const result = await client.query('DELETE FROM users WHERE id = $1', [id]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  private async findOne(column: 'id' | 'email' | 'username', value: number | string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE ${column} = $1`,
      [value]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toUser(result.rows[0]);
  }

  /**
   * Run a write in its own transaction, translating unique-constraint
   * failures into UniquenessViolationError.
   */
  private async write<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    try {
      return await withTransaction(this.pool, fn);
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new UniquenessViolationError(violatedField(error));
      }
      throw error;
    }
  }
}

export function toUser(row: UserRow): User {
  return User.fromPersistence({
    id: row.id,
    email: row.email,
    username: row.username,
    fullName: row.full_name,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  });
}

function buildWhere(filters: UserListFilters): { where: string; values: unknown[] } {
  if (filters.isActive === undefined) {
    return { where: '', values: [] };
  }
  return { where: ' WHERE is_active = $1', values: [filters.isActive] };
}

interface PgUniqueViolation {
  code: '23505';
  constraint?: string;
  detail?: string;
}

function isUniqueViolation(error: unknown): error is PgUniqueViolation {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === '23505'
  );
}

/**
 * Work out which column clashed, from the constraint name (users_email_key)
 * or failing that the detail ("Key (email)=(...) already exists.").
 */
function violatedField(error: PgUniqueViolation): UniqueUserField | undefined {
  const column = error.constraint?.match(/^users_(email|username)_key$/)?.[1]
    ?? error.detail?.match(/^Key \((email|username)\)=/)?.[1];

  if (column === 'email' || column === 'username') {
    return column;
  }
  return undefined;
}
