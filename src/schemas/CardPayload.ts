import { z } from 'zod';
import { isRecognizedBits } from '../types/Permissions.js';

export const CARD_ID_MAX = 0xffff;

/**
 * Wire shape of a card: exactly `id` and `permissions`.
 */
export const CardPayloadSchema = z
  .object({
    id: z.number().int().min(0).max(CARD_ID_MAX),
    permissions: z
      .number()
      .int()
      .refine(isRecognizedBits, { message: 'Unrecognized permission bits' }),
  })
  .strict();

export type CardPayload = z.infer<typeof CardPayloadSchema>;

export function validateCardPayload(data: unknown): CardPayload {
  return CardPayloadSchema.parse(data);
}

export function isValidCardPayload(data: unknown): data is CardPayload {
  return CardPayloadSchema.safeParse(data).success;
}
