/**
 * Column lists shared by the repositories, so every SELECT returns rows that
 * match the row interfaces in mappers.ts.
 *
 * ```typescript
 * db.prepare<[string], BoardRow>(`SELECT ${COLUMNS.BOARD} FROM boards WHERE id = ?`).get(id);
 * ```
 */
export const COLUMNS = {
  USER: `id, name, email, created_at`,

  BOARD: `id, description, fact, phase, rules, verdict_falsy, verdict_truthy, created_at, updated_at`,

  BOARD_MEMBER: `id, role, user_id, board_id, created_at, updated_at`,

  JOIN_REQUEST: `id, motivation, preferred_role, user_id, board_id, created_at, updated_at`
} as const;

/** Same columns, qualified with a table alias for joins. */
export function qualified(columns: string, alias: string): string {
  return columns
    .split(',')
    .map((c) => `${alias}.${c.trim()}`)
    .join(', ');
}
