import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { BoardroomState } from './core/state.js';
import { openDb } from './infra/db.js';

export { loadConfig, type BoardroomConfig } from './core/config.js';
export { createLogger } from './core/logger.js';
export * from './core/errors.js';
export * from './core/events.js';
export * from './core/types.js';
export * from './core/domain/index.js';
export { BoardroomState } from './core/state.js';
export { openDb, migrate, type BoardroomDb } from './infra/db.js';

/**
 * Open the database named by the environment and wire up the repositories.
 *
 * ```typescript
 * const room = createBoardroom();
 * room.subscribe((evt) => console.log(evt.event, evt.board.id));
 * const res = room.boards.createBoardWithOwner(attrs, user);
 * ```
 */
export function createBoardroom(env: NodeJS.ProcessEnv = process.env): BoardroomState {
  const cfg = loadConfig(env);
  const log = createLogger(cfg);
  const db = openDb(cfg);
  log.debug({ dbPath: cfg.BOARDROOM_DB_PATH }, 'boardroom opened');
  return new BoardroomState(db, log);
}
