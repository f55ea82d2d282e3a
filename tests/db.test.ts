import { describe, it, expect } from 'vitest';
import { openDb, migrate } from '../src/infra/db.js';
import { createBoardroom } from '../src/index.js';
import { MemberRole } from '../src/core/types.js';
import { unwrap, validBoardAttrs } from './helpers.js';

describe('openDb', () => {
  it('creates the schema with foreign keys enforced', () => {
    const db = openDb({ BOARDROOM_DB_PATH: ':memory:', BOARDROOM_LOG_LEVEL: 'silent' });

    const tables = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((r) => r.name);
    expect(tables).toEqual(['board_members', 'boards', 'join_requests', 'users']);
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);

    expect(() => migrate(db)).not.toThrow();
    db.close();
  });
});

describe('createBoardroom', () => {
  it('wires the repositories to one database and bus', () => {
    const room = createBoardroom({ BOARDROOM_DB_PATH: ':memory:', BOARDROOM_LOG_LEVEL: 'silent' });
    const seen: string[] = [];
    room.subscribe((evt) => seen.push(`${evt.event}:${evt.board.id}`));

    const judge = unwrap(room.users.createUser({ name: 'Ursula', email: 'ursula@example.com' }));
    const board = unwrap(room.boards.createBoardWithOwner(validBoardAttrs, judge));

    expect(room.boards.role(board, judge)).toBe(MemberRole.Judge);
    expect(seen).toEqual([`board_created:${board.id}`]);
    room.close();
  });
});
