import type { TicketFilter, TicketRecord } from './ticket.types';

export const TICKET_PROVIDER = Symbol('TICKET_PROVIDER');

/**
 * Read-only view of the ticket system. `getTicket` throws NotFoundError for an
 * unknown id; the other calls return empty lists instead.
 */
export interface TicketProvider {
  getTicket(id: string): Promise<TicketRecord>;
  listTickets(filter?: TicketFilter): Promise<TicketRecord[]>;
  searchTickets(query: string): Promise<TicketRecord[]>;
}
