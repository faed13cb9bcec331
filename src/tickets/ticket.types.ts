import { z } from 'zod';

export const TicketStatusSchema = z.enum([
  'open',
  'in_progress',
  'resolved',
  'closed',
]);

export const TicketPrioritySchema = z.enum(['low', 'medium', 'high', 'urgent']);

export const TicketRecordSchema = z.object({
  id: z.string().min(1),
  customerName: z.string().min(1),
  title: z.string(),
  description: z.string(),
  status: TicketStatusSchema,
  priority: TicketPrioritySchema,
  category: z.string(),
  createdAt: z.string(),
  assignedTo: z.string().nullable().optional(),
});

export type TicketStatus = z.infer<typeof TicketStatusSchema>;
export type TicketPriority = z.infer<typeof TicketPrioritySchema>;
export type TicketRecord = z.infer<typeof TicketRecordSchema>;

export type TicketFilter = {
  status?: TicketStatus;
  customerName?: string;
};
