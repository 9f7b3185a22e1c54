import { describe, expect, it } from 'vitest';
import { jqlAnd, jqlList, jqlOr, quoteJql } from '../src/jira/jql.js';

describe('jql helpers', () => {
  it('quotes and escapes string literals', () => {
    expect(quoteJql('Listo para Prod')).toBe('"Listo para Prod"');
    expect(quoteJql('say "hi"')).toBe('"say \\"hi\\""');
  });

  it('renders value lists', () => {
    expect(jqlList(['Test', 'In Progress C'])).toBe('("Test", "In Progress C")');
  });

  it('joins clauses, skipping empty ones', () => {
    expect(jqlAnd('project = "GRV"', undefined, false, '', 'status = "Test"')).toBe(
      'project = "GRV" AND status = "Test"'
    );
  });

  it('parenthesises OR groups only when needed', () => {
    expect(jqlOr(['a'])).toBe('a');
    expect(jqlOr(['a', 'b'])).toBe('(a OR b)');
  });
});
