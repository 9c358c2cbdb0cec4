/**
 * Zod schemas for ledger-api request validation.
 * Amounts travel as decimal strings and are parsed by the core.
 */

import { z } from 'zod';

const ExternalIdSchema = z.string().trim().min(1).max(64);
const AmountSchema = z.string().min(1).max(32);
const NoteSchema = z.string().max(255);
const LimitSchema = z.coerce.number().int().min(1).max(100);

export const CreateAccountBodySchema = z.object({
  externalId: ExternalIdSchema,
  handle: z.string().trim().max(64).nullable().optional(),
});

export const RegistrationBodySchema = z.object({
  displayName: z.string().trim().min(1).max(64),
  gameId: z.string().trim().min(1).max(64),
  handle: z.string().trim().max(64).nullable().optional(),
});

export const LookupQuerySchema = z
  .object({
    handle: z.string().min(1).max(64).optional(),
    displayName: z.string().min(1).max(64).optional(),
    gameId: z.string().min(1).max(64).optional(),
  })
  .refine(
    (q) => [q.handle, q.displayName, q.gameId].filter((v) => v !== undefined).length === 1,
    { message: 'Exactly one of handle, displayName or gameId is required' }
  );

export const HistoryQuerySchema = z.object({
  limit: LimitSchema.optional(),
});

export const TransferBodySchema = z.object({
  from: ExternalIdSchema,
  to: ExternalIdSchema,
  amount: AmountSchema,
  note: NoteSchema.optional(),
});

export const AdjustmentBodySchema = z.object({
  adminId: ExternalIdSchema,
  targetId: ExternalIdSchema,
  amount: AmountSchema,
  direction: z.enum(['credit', 'debit']),
  note: NoteSchema.optional(),
});

export const DeleteAccountBodySchema = z.object({
  adminId: ExternalIdSchema,
});

export const AdminListQuerySchema = z.object({
  adminId: ExternalIdSchema,
  limit: LimitSchema.optional(),
});

export const CreatePaymentRequestBodySchema = z.object({
  requesterId: ExternalIdSchema,
  amount: AmountSchema.optional(),
});

export const RedeemBodySchema = z.object({
  payerId: ExternalIdSchema,
  amount: AmountSchema.optional(),
});

/**
 * Format zod errors into a structured error response.
 */
export function formatZodError(error: z.ZodError): { error: string; details: z.ZodIssue[] } {
  return {
    error: 'VALIDATION_ERROR',
    details: error.issues,
  };
}
