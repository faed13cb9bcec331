import { NotFoundError } from '../common/errors';
import { safeIdent } from '../common/sql-guard';
import type { SqlService } from '../sql/sql.service';
import type { TicketProvider } from './ticket-provider';
import {
  TicketRecordSchema,
  type TicketFilter,
  type TicketRecord,
} from './ticket.types';

type TicketRow = {
  id: string;
  customer_name: string;
  title: string;
  description: string | null;
  status: string;
  priority: string;
  category: string | null;
  created_at: Date | string;
  assigned_to: string | null;
};

const COLUMNS =
  'id, customer_name, title, description, status, priority, category, created_at, assigned_to';

/**
 * Tickets read from a PostgreSQL table. Expected columns are listed in
 * COLUMNS; rows that do not fit TicketRecord are skipped in lists and
 * treated as missing for single lookups.
 */
export class PgTicketProvider implements TicketProvider {
  private readonly table: string;

  constructor(
    private readonly sql: SqlService,
    table: string,
  ) {
    this.table = safeIdent(table);
  }

  async getTicket(id: string): Promise<TicketRecord> {
    const res = await this.sql.query<TicketRow>(
      `select ${COLUMNS} from ${this.table} where id = $1 limit 1`,
      [id],
    );
    const ticket = res.rows.length ? toTicket(res.rows[0]) : null;
    if (!ticket) throw new NotFoundError('ticket', id);
    return ticket;
  }

  async listTickets(filter: TicketFilter = {}): Promise<TicketRecord[]> {
    const res = await this.sql.query<TicketRow>(
      `
      select ${COLUMNS}
      from ${this.table}
      where ($1::text is null or status = $1)
        and ($2::text is null or lower(customer_name) = lower($2))
      order by created_at desc, id
      `,
      [filter.status ?? null, filter.customerName?.trim() || null],
    );
    return collect(res.rows);
  }

  async searchTickets(query: string): Promise<TicketRecord[]> {
    const q = query.trim();
    if (!q) return [];
    const res = await this.sql.query<TicketRow>(
      `
      select ${COLUMNS}
      from ${this.table}
      where title ilike '%' || $1 || '%'
         or description ilike '%' || $1 || '%'
      order by created_at desc, id
      limit 50
      `,
      [q],
    );
    return collect(res.rows);
  }
}

function collect(rows: TicketRow[]): TicketRecord[] {
  const out: TicketRecord[] = [];
  for (const row of rows) {
    const t = toTicket(row);
    if (t) out.push(t);
  }
  return out;
}

export function toTicket(row: TicketRow): TicketRecord | null {
  const parsed = TicketRecordSchema.safeParse({
    id: String(row.id),
    customerName: row.customer_name,
    title: row.title ?? '',
    description: row.description ?? '',
    status: row.status,
    priority: row.priority,
    category: row.category ?? 'general',
    createdAt:
      row.created_at instanceof Date
        ? row.created_at.toISOString().slice(0, 10)
        : String(row.created_at),
    assignedTo: row.assigned_to,
  });
  return parsed.success ? parsed.data : null;
}
