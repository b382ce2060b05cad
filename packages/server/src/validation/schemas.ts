import { z } from 'zod';
import { MAX_PAGE_SIZE, PAYMENT_ROLES, PAYMENT_STATUSES } from '@agent-credit/ledger';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: z.ZodError };

/**
 * Query strings carry integers as text; anything but an optionally signed
 * run of digits is rejected before the range checks run.
 */
const integerParam = (name: string) =>
  z
    .string({ invalid_type_error: `${name} must be a single value` })
    .regex(/^-?\d+$/, `${name} must be an integer`)
    .transform(Number);

export const historyQuerySchema = z.object({
  page: integerParam('page').pipe(z.number().min(1, 'Page must be >= 1')).optional(),
  page_size: integerParam('page_size')
    .pipe(
      z
        .number()
        .min(1, `Page size must be between 1 and ${MAX_PAGE_SIZE}`)
        .max(MAX_PAGE_SIZE, `Page size must be between 1 and ${MAX_PAGE_SIZE}`),
    )
    .optional(),
  role: z
    .enum(PAYMENT_ROLES, { errorMap: () => ({ message: `Role must be one of: ${PAYMENT_ROLES.join(', ')}` }) })
    .optional(),
  status: z
    .enum(PAYMENT_STATUSES, {
      errorMap: () => ({ message: `Status must be one of: ${PAYMENT_STATUSES.join(', ')}` }),
    })
    .optional(),
});

/**
 * Shape of a payment report body. Semantic rules (wallet format, amounts,
 * status/date consistency) belong to the ledger and run after this.
 */
export const reportPaymentSchema = z.object({
  payer_wallet: z.string(),
  payee_wallet: z.string(),
  amount: z.union([z.string(), z.number()]),
  currency: z.string().min(1).max(8).optional(),
  due_date: z.string(),
  payment_date: z.string().nullable().optional(),
  status: z.string(),
});

export function validateData<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(data);
  return result.success ? { success: true, data: result.data } : { success: false, errors: result.error };
}

/**
 * First issue as a (field, message, code) triple for problem details.
 */
export function firstIssue(error: z.ZodError): { field: string; message: string; code: string } {
  const issue = error.issues[0];
  if (!issue) {
    return { field: 'root', message: 'Invalid input', code: 'custom' };
  }
  return {
    field: issue.path.length > 0 ? issue.path.join('.') : 'root',
    message: issue.message,
    code: issue.code,
  };
}
