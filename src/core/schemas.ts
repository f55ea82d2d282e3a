import { z } from 'zod';
import { type FieldErrors, type Result, ValidationError, fail, ok } from './errors.js';
import {
  type ApprovalAttrs,
  type BoardAttrs,
  type BoardMemberAttrs,
  type JoinRequestAttrs,
  MemberRole,
  type UserAttrs
} from './types.js';

const BLANK = "can't be blank";

// Whitespace-only strings count as missing
const requiredText = z.string().refine((s) => s.trim().length > 0, { message: BLANK });
const role = z.nativeEnum(MemberRole);
const id = z.string().min(1);

export const UserCreateSchema = z.object({
  name: requiredText,
  email: z.string().email({ message: 'has invalid format' })
}) satisfies z.ZodType<UserAttrs>;

export const BoardCreateSchema = z.object({
  description: requiredText,
  fact: requiredText,
  phase: z.number().int(),
  rules: requiredText,
  verdictFalsy: z.number().int(),
  verdictTruthy: z.number().int()
}) satisfies z.ZodType<BoardAttrs>;

export const BoardUpdateSchema = BoardCreateSchema.partial();

export const BoardMemberCreateSchema = z.object({
  role,
  userId: id.optional(),
  boardId: id.optional()
}) satisfies z.ZodType<BoardMemberAttrs>;

export const BoardMemberUpdateSchema = z.object({
  role: role.optional()
});

export const JoinRequestCreateSchema = z.object({
  motivation: requiredText,
  preferredRole: role,
  userId: id.optional(),
  boardId: id.optional()
}) satisfies z.ZodType<JoinRequestAttrs>;

export const JoinRequestUpdateSchema = z.object({
  motivation: requiredText.optional(),
  preferredRole: role.optional()
});

export const ApprovalSchema = z.object({
  userId: id,
  boardId: id,
  role
}) satisfies z.ZodType<ApprovalAttrs>;

function issueMessage(issue: z.ZodIssue): string {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined' || issue.received === 'null' ? BLANK : 'is invalid';
  }
  if (issue.code === 'invalid_enum_value') return 'is invalid';
  return issue.message;
}

/** Collect zod issues into per-field messages, first path segment as the key. */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? String(issue.path[0]) : 'base';
    (fields[key] ??= []).push(issueMessage(issue));
  }
  return fields;
}

/**
 * Parse untrusted attributes against a schema. Unknown keys are dropped.
 */
export function validate<S extends z.ZodTypeAny>(schema: S, attrs: unknown): Result<z.output<S>> {
  const parsed = schema.safeParse(attrs);
  if (!parsed.success) return fail(ValidationError.fromFields(toFieldErrors(parsed.error)));
  return ok(parsed.data);
}
