/**
 * Domain module exports - all repositories.
 *
 * @module domain
 *
 * @example
 * ```typescript
 * import { BoardsRepository, JoinRequestsRepository } from './domain/index.js';
 *
 * const boards = new BoardsRepository(db, logger, bus);
 * const joinRequests = new JoinRequestsRepository(db, logger);
 * ```
 */

export { type BaseRepository, now, ID_LENGTH } from './base.js';

/**
 * Board lifecycle, membership queries (judge, role, isMember) and board notifications.
 * @see {@link BoardsRepository}
 */
export { BoardsRepository } from './boards.js';

/**
 * CRUD over board memberships.
 * @see {@link MembersRepository}
 */
export { MembersRepository, insertMember } from './members.js';

/**
 * Pending join requests and their approval into memberships.
 * @see {@link JoinRequestsRepository}
 */
export { JoinRequestsRepository } from './join-requests.js';

export { UsersRepository } from './users.js';
