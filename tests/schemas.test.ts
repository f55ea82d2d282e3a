import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/core/errors.js';
import { BoardMemberCreateSchema, JoinRequestCreateSchema, validate } from '../src/core/schemas.js';

describe('validate', () => {
  it('drops keys the schema does not know', () => {
    const res = validate(BoardMemberCreateSchema, { role: 2, boardId: 'b1', admin: true });

    expect(res).toEqual({ ok: true, data: { role: 2, boardId: 'b1' } });
  });

  it('summarises every failing field in the message', () => {
    const res = validate(JoinRequestCreateSchema, {});

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toBeInstanceOf(ValidationError);
    expect(res.error.message).toBe("Validation failed: motivation can't be blank; preferredRole can't be blank");
    expect(res.error.statusCode).toBe(400);
  });

  it('files issues on a non-object input under base', () => {
    const res = validate(JoinRequestCreateSchema, 'nope');

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toMatchObject({ fields: { base: ['is invalid'] } });
  });
});
