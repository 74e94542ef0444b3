import { z } from 'zod';
import { InvalidInputError } from '../errors';
import { StaffInput } from '../types';

const text = z
  .string({ required_error: 'is required', invalid_type_error: 'must be text' })
  .trim()
  .min(1, 'is required');

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function toAmount(raw: unknown): number {
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && DECIMAL.test(raw)) return Number(raw);
  return NaN;
}

// Form posts carry amounts as text; JSON callers may send numbers.
const amount = z.unknown().transform((value, ctx) => {
  const raw = typeof value === 'string' ? value.trim() : value;
  if (raw === undefined || raw === null || raw === '') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
    return z.NEVER;
  }
  const parsed = toAmount(raw);
  if (!Number.isFinite(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a number' });
    return z.NEVER;
  }
  if (parsed < 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be negative' });
    return z.NEVER;
  }
  // -0 passes the sign check above
  return parsed === 0 ? 0 : parsed;
});

export const staffSubmissionSchema = z.object({
  name: text,
  role: text,
  basic: amount,
  housing: amount,
  transport: amount,
  feeding: amount,
});

export function parseStaffSubmission(raw: unknown): StaffInput {
  const result = staffSubmissionSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      result.error.issues.map((issue) => ({
        field: issue.path.length > 0 ? String(issue.path[0]) : 'submission',
        message: issue.message,
      }))
    );
  }
  return Object.freeze({ ...result.data });
}
