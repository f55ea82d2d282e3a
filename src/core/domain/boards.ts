import { nanoid } from 'nanoid';
import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from 'pino';
import { NotFoundError, type Result, fail, ok, toConflict } from '../errors.js';
import { BOARDS_TOPIC, type BoardEventBus, type BoardEventName } from '../events.js';
import {
  type BoardRow,
  type CountRow,
  type JoinRequestRow,
  type UserRow,
  mapRowToBoard,
  mapRowToJoinRequest,
  mapRowToUser,
  toRole
} from '../mappers.js';
import { COLUMNS, qualified } from '../queries.js';
import { BoardCreateSchema, BoardUpdateSchema, validate } from '../schemas.js';
import { type Board, type BoardAttrs, type JoinRequest, MemberRole, type RawAttrs, type User } from '../types.js';
import { type BaseRepository, ID_LENGTH, now } from './base.js';
import { insertMember } from './members.js';

type BoardRef = Pick<Board, 'id'>;
type UserRef = Pick<User, 'id'>;

const BOARD_FIELD_COLUMNS: ReadonlyArray<readonly [keyof BoardAttrs, string]> = [
  ['description', 'description'],
  ['fact', 'fact'],
  ['phase', 'phase'],
  ['rules', 'rules'],
  ['verdictFalsy', 'verdict_falsy'],
  ['verdictTruthy', 'verdict_truthy']
];

/**
 * Boards Repository - board lifecycle, membership queries and board notifications.
 *
 * Every successful create, update and delete publishes exactly one message on
 * the `boards` topic after the write has committed.
 */
export class BoardsRepository implements BaseRepository {
  constructor(
    public readonly db: BetterSqlite3.Database,
    public readonly log: Logger,
    private readonly bus: BoardEventBus
  ) {}

  private notify(board: Board, event: BoardEventName): void {
    this.bus.publish(BOARDS_TOPIC, { source: BOARDS_TOPIC, event, board, ts: now() });
  }

  // ==================== BOARD CRUD ====================

  listBoards(): Board[] {
    return this.db
      .prepare<[], BoardRow>(`SELECT ${COLUMNS.BOARD} FROM boards ORDER BY created_at ASC, rowid ASC`)
      .all()
      .map(mapRowToBoard);
  }

  getBoard(id: string): Board | null {
    const row = this.db.prepare<[string], BoardRow>(`SELECT ${COLUMNS.BOARD} FROM boards WHERE id = ?`).get(id);
    return row ? mapRowToBoard(row) : null;
  }

  /** Like {@link getBoard}, but throws {@link NotFoundError} when the board is missing. */
  requireBoard(id: string): Board {
    const board = this.getBoard(id);
    if (!board) throw new NotFoundError('Board', id);
    return board;
  }

  createBoard(attrs: RawAttrs): Result<Board> {
    const parsed = validate(BoardCreateSchema, attrs);
    if (!parsed.ok) return parsed;

    const board = this.insertBoard(parsed.data);
    this.log.info({ boardId: board.id }, 'board.created');
    this.notify(board, 'board_created');
    return ok(board);
  }

  /**
   * Create a board and make `owner` its judge in one transaction.
   * If either insert fails, neither row is kept and the error is thrown.
   */
  createBoardWithOwner(attrs: RawAttrs, owner: UserRef): Result<Board> {
    const parsed = validate(BoardCreateSchema, attrs);
    if (!parsed.ok) return parsed;

    const fields = parsed.data;
    const tx = this.db.transaction(() => {
      const created = this.insertBoard(fields);
      try {
        insertMember(this.db, { role: MemberRole.Judge, userId: owner.id, boardId: created.id });
      } catch (err) {
        throw toConflict(err, 'Board member') ?? err;
      }
      return created;
    });

    let board: Board;
    try {
      board = tx();
    } catch (err) {
      this.log.warn({ err, ownerId: owner.id }, 'board.create_failed');
      throw err;
    }

    this.log.info({ boardId: board.id, ownerId: owner.id }, 'board.created');
    this.notify(board, 'board_created');
    return ok(board);
  }

  /** Merge `attrs` into `board` and validate, without writing. */
  changeBoard(board: Board, attrs: RawAttrs): Result<Board> {
    const parsed = validate(BoardUpdateSchema, attrs);
    if (!parsed.ok) return parsed;
    const patch = parsed.data;
    return ok({
      ...board,
      description: patch.description ?? board.description,
      fact: patch.fact ?? board.fact,
      phase: patch.phase ?? board.phase,
      rules: patch.rules ?? board.rules,
      verdictFalsy: patch.verdictFalsy ?? board.verdictFalsy,
      verdictTruthy: patch.verdictTruthy ?? board.verdictTruthy
    });
  }

  /**
   * Write the fields present in `attrs` and nothing else, then return the
   * stored row. Columns changed since `board` was read are left as they are.
   */
  updateBoard(board: Board, attrs: RawAttrs): Result<Board> {
    const parsed = validate(BoardUpdateSchema, attrs);
    if (!parsed.ok) return parsed;
    const patch = parsed.data;

    const setClauses: string[] = [];
    const params: (string | number)[] = [];
    const changedFields: string[] = [];
    for (const [field, column] of BOARD_FIELD_COLUMNS) {
      const value = patch[field];
      if (value === undefined) continue;
      setClauses.push(`${column} = ?`);
      params.push(value);
      changedFields.push(field);
    }
    setClauses.push('updated_at = ?');
    params.push(now());

    const tx = this.db.transaction((): Board | null => {
      const info = this.db.prepare(`UPDATE boards SET ${setClauses.join(', ')} WHERE id = ?`).run(...params, board.id);
      return info.changes === 0 ? null : this.getBoard(board.id);
    });
    const next = tx();
    if (!next) return fail(new NotFoundError('Board', board.id));

    this.log.info({ boardId: board.id, fields: changedFields }, 'board.updated');
    this.notify(next, 'board_updated');
    return ok(next);
  }

  /** Delete a board. Its members and join requests go with it. */
  deleteBoard(board: Board): Result<Board> {
    const info = this.db.prepare('DELETE FROM boards WHERE id = ?').run(board.id);
    if (info.changes === 0) return fail(new NotFoundError('Board', board.id));

    this.log.info({ boardId: board.id }, 'board.deleted');
    this.notify(board, 'board_deleted');
    return ok(board);
  }

  // ==================== MEMBERSHIP QUERIES ====================

  membersCount(board: BoardRef): number {
    const row = this.db
      .prepare<[string], CountRow>('SELECT COUNT(1) AS n FROM board_members WHERE board_id = ?')
      .get(board.id);
    return row?.n ?? 0;
  }

  /** The user holding the judge membership on the board, if any. */
  judge(board: BoardRef): User | null {
    const row = this.db
      .prepare<[string, number], UserRow>(
        `SELECT ${qualified(COLUMNS.USER, 'u')} FROM users u
         JOIN board_members bm ON bm.user_id = u.id
         WHERE bm.board_id = ? AND bm.role = ?`
      )
      .get(board.id, MemberRole.Judge);
    return row ? mapRowToUser(row) : null;
  }

  isMember(board: BoardRef, user: UserRef): boolean {
    const row = this.db
      .prepare<[string, string], CountRow>('SELECT COUNT(1) AS n FROM board_members WHERE board_id = ? AND user_id = ?')
      .get(board.id, user.id);
    return (row?.n ?? 0) > 0;
  }

  role(board: BoardRef, user: UserRef): MemberRole | null {
    const row = this.db
      .prepare<[string, string], { role: number }>('SELECT role FROM board_members WHERE board_id = ? AND user_id = ?')
      .get(board.id, user.id);
    return row ? toRole(row.role) : null;
  }

  isJudge(board: BoardRef, user: UserRef): boolean {
    return this.role(board, user) === MemberRole.Judge;
  }

  // ==================== BOARD EVENTS ====================

  /**
   * Activity on the board, most recent first. Join requests are the only
   * kind of activity for now.
   */
  boardEvents(board: BoardRef): JoinRequest[] {
    return this.db
      .prepare<[string], JoinRequestRow>(
        `SELECT ${COLUMNS.JOIN_REQUEST} FROM join_requests WHERE board_id = ? ORDER BY created_at DESC, rowid DESC`
      )
      .all(board.id)
      .map(mapRowToJoinRequest);
  }

  // ==================== PRIVATE HELPERS ====================

  private insertBoard(attrs: Omit<Board, 'id' | 'createdAt' | 'updatedAt'>): Board {
    const t = now();
    const board: Board = { id: nanoid(ID_LENGTH), ...attrs, createdAt: t, updatedAt: t };
    this.db
      .prepare(
        `INSERT INTO boards (id, description, fact, phase, rules, verdict_falsy, verdict_truthy, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        board.id,
        board.description,
        board.fact,
        board.phase,
        board.rules,
        board.verdictFalsy,
        board.verdictTruthy,
        board.createdAt,
        board.updatedAt
      );
    return board;
  }
}
