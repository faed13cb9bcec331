import type { TicketRecord } from './ticket.types';

export function ticketSummary(t: TicketRecord): string {
  return [
    `Ticket ID: ${t.id}`,
    `Title: ${t.title}`,
    `Status: ${t.status}`,
    `Priority: ${t.priority}`,
    `Category: ${t.category}`,
    `Customer: ${t.customerName}`,
    `Created: ${t.createdAt}`,
    `Description: ${t.description}`,
    `Assigned To: ${t.assignedTo ?? 'Unassigned'}`,
  ].join('\n');
}
