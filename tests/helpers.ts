import Database from 'better-sqlite3';
import { type Logger, pino } from 'pino';
import type { Result } from '../src/core/errors.js';
import type { BoardEvent } from '../src/core/events.js';
import { BoardroomState } from '../src/core/state.js';
import type { Board, User } from '../src/core/types.js';
import { migrate } from '../src/infra/db.js';

export const validBoardAttrs = {
  description: 'some description',
  fact: 'some fact',
  phase: 42,
  rules: 'some rules',
  verdictFalsy: 42,
  verdictTruthy: 42
};

export function makeState(log: Logger = pino({ level: 'silent' })): BoardroomState {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  migrate(db);
  return new BoardroomState(db, log);
}

/** A logger that keeps every line it writes, parsed. */
export function captureLog(): { log: Logger; lines: Record<string, unknown>[] } {
  const lines: Record<string, unknown>[] = [];
  const log = pino({ level: 'info' }, { write: (line: string) => lines.push(JSON.parse(line)) });
  return { log, lines };
}

/** Collect every board notification published after the call. */
export function recordEvents(state: BoardroomState): BoardEvent[] {
  const events: BoardEvent[] = [];
  state.subscribe((evt) => events.push(evt));
  return events;
}

export function unwrap<T>(res: Result<T>): T {
  if (!res.ok) throw res.error;
  return res.data;
}

export function makeUser(state: BoardroomState, name: string): User {
  return unwrap(state.users.createUser({ name, email: `${name.toLowerCase()}@example.com` }));
}

export function makeBoard(state: BoardroomState, owner?: User): Board {
  return owner
    ? unwrap(state.boards.createBoardWithOwner(validBoardAttrs, owner))
    : unwrap(state.boards.createBoard(validBoardAttrs));
}
