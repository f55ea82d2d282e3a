import { nanoid } from 'nanoid';
import type BetterSqlite3 from 'better-sqlite3';
import type { Logger } from 'pino';
import { ConflictError, NotFoundError, type Result, fail, ok, toConflict } from '../errors.js';
import { type CountRow, type JoinRequestRow, mapRowToJoinRequest } from '../mappers.js';
import { COLUMNS } from '../queries.js';
import { ApprovalSchema, JoinRequestCreateSchema, JoinRequestUpdateSchema, validate } from '../schemas.js';
import type { Approval, Board, BoardMember, JoinRequest, RawAttrs, User } from '../types.js';
import { type BaseRepository, ID_LENGTH, now } from './base.js';
import { insertMember } from './members.js';

/**
 * Join Requests Repository - pending requests to join a board.
 *
 * A request is either approved ({@link approveJoinRequest}: the row is deleted
 * and a membership inserted) or withdrawn ({@link deleteJoinRequest}). Both
 * remove the row; nothing records which of the two happened.
 */
export class JoinRequestsRepository implements BaseRepository {
  constructor(
    public readonly db: BetterSqlite3.Database,
    public readonly log: Logger
  ) {}

  listJoinRequests(): JoinRequest[] {
    return this.db
      .prepare<[], JoinRequestRow>(`SELECT ${COLUMNS.JOIN_REQUEST} FROM join_requests ORDER BY created_at ASC, rowid ASC`)
      .all()
      .map(mapRowToJoinRequest);
  }

  listForBoard(board: Pick<Board, 'id'>): JoinRequest[] {
    return this.db
      .prepare<[string], JoinRequestRow>(
        `SELECT ${COLUMNS.JOIN_REQUEST} FROM join_requests WHERE board_id = ? ORDER BY created_at ASC, rowid ASC`
      )
      .all(board.id)
      .map(mapRowToJoinRequest);
  }

  getJoinRequest(id: string): JoinRequest | null {
    const row = this.db
      .prepare<[string], JoinRequestRow>(`SELECT ${COLUMNS.JOIN_REQUEST} FROM join_requests WHERE id = ?`)
      .get(id);
    return row ? mapRowToJoinRequest(row) : null;
  }

  requireJoinRequest(id: string): JoinRequest {
    const request = this.getJoinRequest(id);
    if (!request) throw new NotFoundError('JoinRequest', id);
    return request;
  }

  alreadyRequested(user: Pick<User, 'id'>, board: Pick<Board, 'id'>): boolean {
    const row = this.db
      .prepare<[string, string], CountRow>('SELECT COUNT(1) AS n FROM join_requests WHERE user_id = ? AND board_id = ?')
      .get(user.id, board.id);
    return (row?.n ?? 0) > 0;
  }

  createJoinRequest(attrs: RawAttrs): Result<JoinRequest> {
    const parsed = validate(JoinRequestCreateSchema, attrs);
    if (!parsed.ok) return parsed;

    const t = now();
    const request: JoinRequest = { id: nanoid(ID_LENGTH), ...parsed.data, createdAt: t, updatedAt: t };
    try {
      this.db
        .prepare(
          `INSERT INTO join_requests (id, motivation, preferred_role, user_id, board_id, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          request.id,
          request.motivation,
          request.preferredRole,
          request.userId ?? null,
          request.boardId ?? null,
          request.createdAt,
          request.updatedAt
        );
    } catch (err) {
      const conflict = toConflict(err, 'Join request');
      if (!conflict) throw err;
      return fail(conflict);
    }

    this.log.info({ joinRequestId: request.id, boardId: request.boardId, userId: request.userId }, 'join_request.created');
    return ok(request);
  }

  /** Validate a change without writing it. */
  changeJoinRequest(request: JoinRequest, attrs: RawAttrs): Result<JoinRequest> {
    const parsed = validate(JoinRequestUpdateSchema, attrs);
    if (!parsed.ok) return parsed;
    return ok({
      ...request,
      motivation: parsed.data.motivation ?? request.motivation,
      preferredRole: parsed.data.preferredRole ?? request.preferredRole
    });
  }

  /** Write the fields present in `attrs` and return the stored row. */
  updateJoinRequest(request: JoinRequest, attrs: RawAttrs): Result<JoinRequest> {
    const parsed = validate(JoinRequestUpdateSchema, attrs);
    if (!parsed.ok) return parsed;
    const patch = parsed.data;

    const setClauses: string[] = [];
    const params: (string | number)[] = [];
    if (patch.motivation !== undefined) {
      setClauses.push('motivation = ?');
      params.push(patch.motivation);
    }
    if (patch.preferredRole !== undefined) {
      setClauses.push('preferred_role = ?');
      params.push(patch.preferredRole);
    }
    setClauses.push('updated_at = ?');
    params.push(now());

    const tx = this.db.transaction((): JoinRequest | null => {
      const info = this.db
        .prepare(`UPDATE join_requests SET ${setClauses.join(', ')} WHERE id = ?`)
        .run(...params, request.id);
      return info.changes === 0 ? null : this.getJoinRequest(request.id);
    });
    const next = tx();
    if (!next) return fail(new NotFoundError('JoinRequest', request.id));

    this.log.info({ joinRequestId: request.id }, 'join_request.updated');
    return ok(next);
  }

  /** Withdraw a request. No membership is created. */
  deleteJoinRequest(request: JoinRequest): Result<JoinRequest> {
    const info = this.db.prepare('DELETE FROM join_requests WHERE id = ?').run(request.id);
    if (info.changes === 0) return fail(new NotFoundError('JoinRequest', request.id));

    this.log.info({ joinRequestId: request.id, boardId: request.boardId }, 'join_request.withdrawn');
    return ok(request);
  }

  // ==================== APPROVAL ====================

  /**
   * Turn the pending request of `attrs.userId` on `attrs.boardId` into a
   * membership with `attrs.role`.
   *
   * Runs in one transaction: find the request, insert the member, delete the
   * request. Exactly one request must be removed, otherwise everything rolls
   * back and the error is thrown: {@link NotFoundError} when there is no
   * request (checked first, so a missing board reports this too),
   * {@link ConflictError} when the membership cannot be inserted.
   *
   * Invalid attributes are returned as a {@link ValidationError} result.
   */
  approveJoinRequest(attrs: RawAttrs): Result<Approval> {
    const parsed = validate(ApprovalSchema, attrs);
    if (!parsed.ok) return parsed;
    const { userId, boardId, role } = parsed.data;

    const tx = this.db.transaction((): Approval => {
      const rows = this.db
        .prepare<[string, string], JoinRequestRow>(
          `SELECT ${COLUMNS.JOIN_REQUEST} FROM join_requests WHERE board_id = ? AND user_id = ?`
        )
        .all(boardId, userId);
      if (rows.length === 0) throw new NotFoundError('JoinRequest', `user ${userId} on board ${boardId}`);
      if (rows.length > 1) throw new ConflictError(`Ambiguous join requests for user ${userId} on board ${boardId}`);
      const joinRequest = mapRowToJoinRequest(rows[0]);

      let member: BoardMember;
      try {
        member = insertMember(this.db, { role, userId, boardId });
      } catch (err) {
        throw toConflict(err, 'Board member') ?? err;
      }

      const info = this.db.prepare('DELETE FROM join_requests WHERE id = ?').run(joinRequest.id);
      if (info.changes !== 1) throw new ConflictError(`Join request ${joinRequest.id} was already consumed`);

      return { member, joinRequest };
    });

    let approval: Approval;
    try {
      approval = tx();
    } catch (err) {
      this.log.warn({ err, userId, boardId }, 'join_request.approve_failed');
      throw err;
    }

    this.log.info(
      { joinRequestId: approval.joinRequest.id, memberId: approval.member.id, boardId, role },
      'join_request.approved'
    );
    return ok(approval);
  }
}
