import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

import { NotFoundError } from '../common/errors';
import type { TicketProvider } from './ticket-provider';
import {
  TicketRecordSchema,
  type TicketFilter,
  type TicketRecord,
} from './ticket.types';

export const DEFAULT_TICKETS_FILE = join(
  __dirname,
  '..',
  '..',
  'data',
  'tickets.json',
);

export function loadTicketsFile(path = DEFAULT_TICKETS_FILE): TicketRecord[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return z.array(TicketRecordSchema).parse(raw);
}

/**
 * Ticket store held in a Map. Seeded from `data/tickets.json` in the app;
 * tests pass their own records.
 */
export class InMemoryTicketProvider implements TicketProvider {
  private readonly tickets = new Map<string, TicketRecord>();

  constructor(seed: readonly TicketRecord[] = []) {
    for (const t of seed) this.tickets.set(t.id, { ...t });
  }

  async getTicket(id: string): Promise<TicketRecord> {
    const ticket = this.tickets.get(id);
    if (!ticket) throw new NotFoundError('ticket', id);
    return { ...ticket };
  }

  async listTickets(filter: TicketFilter = {}): Promise<TicketRecord[]> {
    const customer = filter.customerName?.trim().toLowerCase();
    return [...this.tickets.values()]
      .filter((t) => !filter.status || t.status === filter.status)
      .filter((t) => !customer || t.customerName.toLowerCase() === customer)
      .map((t) => ({ ...t }));
  }

  async searchTickets(query: string): Promise<TicketRecord[]> {
    const q = query.trim().toLowerCase();
    if (!q) return [];
    return [...this.tickets.values()]
      .filter(
        (t) =>
          t.title.toLowerCase().includes(q) ||
          t.description.toLowerCase().includes(q),
      )
      .map((t) => ({ ...t }));
  }
}
