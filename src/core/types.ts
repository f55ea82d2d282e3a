// ==================== ROLES ====================

/**
 * Role a member holds on a board, stored as an integer.
 * Only `Judge` carries behaviour: the judge owns the board and approves join requests.
 */
export const MemberRole = {
  Judge: 0,
  TruthyAdvocate: 1,
  FalsyAdvocate: 2,
  Juror: 3
} as const;

export type MemberRole = (typeof MemberRole)[keyof typeof MemberRole];

const ROLE_VALUES: ReadonlySet<number> = new Set(Object.values(MemberRole));

export function isMemberRole(value: number): value is MemberRole {
  return ROLE_VALUES.has(value);
}

// ==================== ENTITIES ====================

/** Owned by the accounts side of the application; kept here for joins. */
export interface User {
  id: string;
  name: string;
  email: string;
  createdAt: number;
}

export interface Board {
  id: string;
  description: string;
  fact: string;
  phase: number;
  rules: string;
  verdictFalsy: number;
  verdictTruthy: number;
  createdAt: number;
  updatedAt: number;
}

export interface BoardMember {
  id: string;
  role: MemberRole;
  userId?: string;
  boardId?: string;
  createdAt: number;
  updatedAt: number;
}

export interface JoinRequest {
  id: string;
  motivation: string;
  preferredRole: MemberRole;
  userId?: string;
  boardId?: string;
  createdAt: number;
  updatedAt: number;
}

/** Outcome of approving a join request: the new membership and the consumed request. */
export interface Approval {
  member: BoardMember;
  joinRequest: JoinRequest;
}

// ==================== ATTRIBUTES ====================

export interface UserAttrs {
  name: string;
  email: string;
}

export interface BoardAttrs {
  description: string;
  fact: string;
  phase: number;
  rules: string;
  verdictFalsy: number;
  verdictTruthy: number;
}

export interface BoardMemberAttrs {
  role: MemberRole;
  userId?: string;
  boardId?: string;
}

export interface JoinRequestAttrs {
  motivation: string;
  preferredRole: MemberRole;
  userId?: string;
  boardId?: string;
}

export interface ApprovalAttrs {
  userId: string;
  boardId: string;
  role: MemberRole;
}

/**
 * Untrusted attribute input, as it arrives from a form or a request body.
 * Repositories validate it before anything reaches the database.
 */
export type RawAttrs = Record<string, unknown>;
