/**
 * Row-to-type mappers between SQLite rows (snake_case) and domain types (camelCase).
 *
 * - Accept a strongly-typed row interface
 * - Return the corresponding domain type
 * - Convert `null` columns to `undefined`
 * - Check integer role columns against {@link MemberRole}
 *
 * @module mappers
 */
import { type Board, type BoardMember, type JoinRequest, type MemberRole, type User, isMemberRole } from './types.js';

// ==================== DATABASE ROW TYPES ====================

export interface UserRow {
  id: string;
  name: string;
  email: string;
  created_at: number;
}

export interface BoardRow {
  id: string;
  description: string;
  fact: string;
  phase: number;
  rules: string;
  verdict_falsy: number;
  verdict_truthy: number;
  created_at: number;
  updated_at: number;
}

export interface BoardMemberRow {
  id: string;
  role: number;
  user_id: string | null;
  board_id: string | null;
  created_at: number;
  updated_at: number;
}

export interface JoinRequestRow {
  id: string;
  motivation: string;
  preferred_role: number;
  user_id: string | null;
  board_id: string | null;
  created_at: number;
  updated_at: number;
}

export interface CountRow {
  n: number;
}

// ==================== MAPPERS ====================

export function toRole(value: number): MemberRole {
  if (!isMemberRole(value)) throw new Error(`Unknown member role in database: ${value}`);
  return value;
}

export function mapRowToUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at
  };
}

export function mapRowToBoard(row: BoardRow): Board {
  return {
    id: row.id,
    description: row.description,
    fact: row.fact,
    phase: row.phase,
    rules: row.rules,
    verdictFalsy: row.verdict_falsy,
    verdictTruthy: row.verdict_truthy,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapRowToBoardMember(row: BoardMemberRow): BoardMember {
  return {
    id: row.id,
    role: toRole(row.role),
    userId: row.user_id ?? undefined,
    boardId: row.board_id ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

export function mapRowToJoinRequest(row: JoinRequestRow): JoinRequest {
  return {
    id: row.id,
    motivation: row.motivation,
    preferredRole: toRole(row.preferred_role),
    userId: row.user_id ?? undefined,
    boardId: row.board_id ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}
