import { InvalidArgumentError } from './errors';
import { assertReadOnlySql, safeIdent } from './sql-guard';

describe('assertReadOnlySql', () => {
  it.each([
    'select * from support_tickets',
    'SELECT id FROM t WHERE created_at > now();',
    'with recent as (select 1) select * from recent',
    'select * from "call" where id = $1',
    'select id from "execute"."copy" order by created_at desc',
  ])('accepts %p', (sql) => {
    expect(() => assertReadOnlySql(sql)).not.toThrow();
  });

  it.each([
    ['', 'is empty'],
    ['select 1; select 2', 'multiple statements are not allowed'],
    ['delete from t', 'only SELECT/WITH queries are allowed'],
    ['update t set a = 1', 'only SELECT/WITH queries are allowed'],
  ])('rejects %p', (sql, message) => {
    expect(() => assertReadOnlySql(sql)).toThrow(
      new InvalidArgumentError('sql', message),
    );
  });
});

describe('safeIdent', () => {
  it('quotes plain and schema-qualified names', () => {
    expect(safeIdent('support_tickets')).toBe('"support_tickets"');
    expect(safeIdent('crm.tickets')).toBe('"crm"."tickets"');
  });

  it.each(['tickets; drop table x', 'a.b.c', '1abc', ''])(
    'rejects %p',
    (name) => {
      expect(() => safeIdent(name)).toThrow(InvalidArgumentError);
    },
  );
});
