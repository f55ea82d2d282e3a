import type { Logger } from 'pino';
import type { BoardroomDb } from '../infra/db.js';
import { BoardsRepository, JoinRequestsRepository, MembersRepository, UsersRepository } from './domain/index.js';
import { BOARDS_TOPIC, type BoardEventBus, InProcessEventBus, type BoardroomTopics, type Listener, type BoardEvent } from './events.js';

/**
 * Facade over the boardroom repositories.
 *
 * All repositories share one database handle, one logger and one event bus.
 * Pass a bus to share it with other parts of the application; by default a
 * private in-process bus is created.
 */
export class BoardroomState {
  readonly users: UsersRepository;
  readonly boards: BoardsRepository;
  readonly members: MembersRepository;
  readonly joinRequests: JoinRequestsRepository;
  readonly bus: BoardEventBus;

  constructor(
    readonly db: BoardroomDb,
    readonly log: Logger,
    bus?: BoardEventBus
  ) {
    this.bus = bus ?? new InProcessEventBus<BoardroomTopics>(log);
    this.users = new UsersRepository(db, log);
    this.boards = new BoardsRepository(db, log, this.bus);
    this.members = new MembersRepository(db, log);
    this.joinRequests = new JoinRequestsRepository(db, log);
  }

  /** Receive every board notification published from now on. */
  subscribe(listener: Listener<BoardEvent>): () => void {
    return this.bus.subscribe(BOARDS_TOPIC, listener);
  }

  close(): void {
    this.db.close();
  }
}
