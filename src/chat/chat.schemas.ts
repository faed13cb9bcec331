import { z } from 'zod';

export const CreateConversationSchema = z.object({
  customerName: z.string().trim().min(1, 'customerName is required'),
  ticketId: z.string().trim().min(1).nullable().optional(),
});

export const SendMessageSchema = z.object({
  message: z.string().trim().min(1, 'message is required'),
  timeoutMs: z.number().int().positive().max(600_000).optional(),
});
