import { nanoid } from 'nanoid';
import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from 'pino';
import { NotFoundError, type Result, fail, ok, toConflict } from '../errors.js';
import { type BoardMemberRow, mapRowToBoardMember } from '../mappers.js';
import { COLUMNS } from '../queries.js';
import { BoardMemberCreateSchema, BoardMemberUpdateSchema, validate } from '../schemas.js';
import type { Board, BoardMember, BoardMemberAttrs, RawAttrs } from '../types.js';
import { type BaseRepository, ID_LENGTH, now } from './base.js';

/**
 * Insert a membership row from already-validated attributes.
 * Throws on constraint violations, so it can run inside a transaction.
 */
export function insertMember(db: BetterSqlite3.Database, attrs: BoardMemberAttrs): BoardMember {
  const t = now();
  const member: BoardMember = {
    id: nanoid(ID_LENGTH),
    role: attrs.role,
    userId: attrs.userId,
    boardId: attrs.boardId,
    createdAt: t,
    updatedAt: t
  };
  db.prepare(
    'INSERT INTO board_members (id, role, user_id, board_id, created_at, updated_at) VALUES (?, ?, ?, ?, ?, ?)'
  ).run(member.id, member.role, member.userId ?? null, member.boardId ?? null, member.createdAt, member.updatedAt);
  return member;
}

/**
 * Members Repository - plain CRUD over board memberships. No notifications.
 */
export class MembersRepository implements BaseRepository {
  constructor(
    public readonly db: BetterSqlite3.Database,
    public readonly log: Logger
  ) {}

  listMembers(): BoardMember[] {
    return this.db
      .prepare<[], BoardMemberRow>(`SELECT ${COLUMNS.BOARD_MEMBER} FROM board_members ORDER BY created_at ASC, rowid ASC`)
      .all()
      .map(mapRowToBoardMember);
  }

  listBoardMembers(board: Pick<Board, 'id'>): BoardMember[] {
    return this.db
      .prepare<[string], BoardMemberRow>(
        `SELECT ${COLUMNS.BOARD_MEMBER} FROM board_members WHERE board_id = ? ORDER BY role ASC, created_at ASC, rowid ASC`
      )
      .all(board.id)
      .map(mapRowToBoardMember);
  }

  getMember(id: string): BoardMember | null {
    const row = this.db
      .prepare<[string], BoardMemberRow>(`SELECT ${COLUMNS.BOARD_MEMBER} FROM board_members WHERE id = ?`)
      .get(id);
    return row ? mapRowToBoardMember(row) : null;
  }

  requireMember(id: string): BoardMember {
    const member = this.getMember(id);
    if (!member) throw new NotFoundError('BoardMember', id);
    return member;
  }

  createMember(attrs: RawAttrs): Result<BoardMember> {
    const parsed = validate(BoardMemberCreateSchema, attrs);
    if (!parsed.ok) return parsed;

    let member: BoardMember;
    try {
      member = insertMember(this.db, parsed.data);
    } catch (err) {
      const conflict = toConflict(err, 'Board member');
      if (!conflict) throw err;
      return fail(conflict);
    }

    this.log.info({ memberId: member.id, boardId: member.boardId, role: member.role }, 'board_member.created');
    return ok(member);
  }

  /** Validate a change without writing it. */
  changeMember(member: BoardMember, attrs: RawAttrs): Result<BoardMember> {
    const parsed = validate(BoardMemberUpdateSchema, attrs);
    if (!parsed.ok) return parsed;
    return ok({ ...member, role: parsed.data.role ?? member.role });
  }

  updateMember(member: BoardMember, attrs: RawAttrs): Result<BoardMember> {
    const changed = this.changeMember(member, attrs);
    if (!changed.ok) return changed;

    const updatedAt = now();
    let changes: number;
    try {
      changes = this.db
        .prepare('UPDATE board_members SET role = ?, updated_at = ? WHERE id = ?')
        .run(changed.data.role, updatedAt, member.id).changes;
    } catch (err) {
      const conflict = toConflict(err, 'Board member');
      if (!conflict) throw err;
      return fail(conflict);
    }
    if (changes === 0) return fail(new NotFoundError('BoardMember', member.id));

    this.log.info({ memberId: member.id, role: changed.data.role }, 'board_member.updated');
    return ok({ ...changed.data, updatedAt });
  }

  deleteMember(member: BoardMember): Result<BoardMember> {
    const info = this.db.prepare('DELETE FROM board_members WHERE id = ?').run(member.id);
    if (info.changes === 0) return fail(new NotFoundError('BoardMember', member.id));

    this.log.info({ memberId: member.id, boardId: member.boardId }, 'board_member.deleted');
    return ok(member);
  }
}
