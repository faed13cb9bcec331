import { Controller, Get, Inject, Param, Query } from '@nestjs/common';
import { z } from 'zod';

import { parseBody } from '../common/validation';
import { TICKET_PROVIDER, type TicketProvider } from './ticket-provider';
import { TicketStatusSchema } from './ticket.types';

const ListQuerySchema = z.object({
  status: TicketStatusSchema.optional(),
  customer: z.string().trim().min(1).optional(),
});

const SearchQuerySchema = z.object({
  q: z.string().trim().min(1, 'q is required'),
});

@Controller('tickets')
export class TicketsController {
  constructor(
    @Inject(TICKET_PROVIDER) private readonly tickets: TicketProvider,
  ) {}

  @Get()
  async list(@Query() query: unknown) {
    const { status, customer } = parseBody(ListQuerySchema, query);
    const tickets = await this.tickets.listTickets({
      status,
      customerName: customer,
    });
    return { count: tickets.length, tickets };
  }

  // declared before :id so "search" is not taken for a ticket id
  @Get('search')
  async search(@Query() query: unknown) {
    const { q } = parseBody(SearchQuerySchema, query);
    const tickets = await this.tickets.searchTickets(q);
    return { query: q, count: tickets.length, tickets };
  }

  @Get(':id')
  get(@Param('id') id: string) {
    return this.tickets.getTicket(id);
  }
}
