import { nanoid } from 'nanoid';
import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from 'pino';
import { NotFoundError, type Result, fail, ok, toConflict } from '../errors.js';
import { type UserRow, mapRowToUser } from '../mappers.js';
import { COLUMNS } from '../queries.js';
import { UserCreateSchema, validate } from '../schemas.js';
import type { RawAttrs, User } from '../types.js';
import { type BaseRepository, ID_LENGTH, now } from './base.js';

/**
 * Users Repository - the slice of user accounts the board queries join on
 */
export class UsersRepository implements BaseRepository {
  constructor(
    public readonly db: BetterSqlite3.Database,
    public readonly log: Logger
  ) {}

  createUser(attrs: RawAttrs): Result<User> {
    const parsed = validate(UserCreateSchema, attrs);
    if (!parsed.ok) return parsed;

    const user: User = { id: nanoid(ID_LENGTH), ...parsed.data, createdAt: now() };
    try {
      this.db
        .prepare('INSERT INTO users (id, name, email, created_at) VALUES (?, ?, ?, ?)')
        .run(user.id, user.name, user.email, user.createdAt);
    } catch (err) {
      const conflict = toConflict(err, 'User');
      if (!conflict) throw err;
      return fail(conflict);
    }

    this.log.info({ userId: user.id }, 'user.created');
    return ok(user);
  }

  getUser(id: string): User | null {
    const row = this.db
      .prepare<[string], UserRow>(`SELECT ${COLUMNS.USER} FROM users WHERE id = ?`)
      .get(id);
    return row ? mapRowToUser(row) : null;
  }

  requireUser(id: string): User {
    const user = this.getUser(id);
    if (!user) throw new NotFoundError('User', id);
    return user;
  }
}
