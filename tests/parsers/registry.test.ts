import { describe, it, expect } from 'vitest';
import {
  GenericStatementParser,
  HSBC_BANK,
  HsbcStatementParser,
  ParserRegistry,
  createDefaultRegistry,
  type BankStatementParser,
} from '@bankstmt/statement-parser';

const stubParser = (name: string): BankStatementParser => ({ name, parse: () => [] });

describe('ParserRegistry', () => {
  it('should resolve registered banks', () => {
    const alpha = stubParser('alpha');
    const registry = new ParserRegistry().register('Alpha Bank', alpha);

    expect(registry.resolve('Alpha Bank')).toBe(alpha);
    expect(registry.has('Alpha Bank')).toBe(true);
  });

  it('should return undefined for unknown banks without a fallback', () => {
    expect(new ParserRegistry().resolve('Alpha Bank')).toBeUndefined();
  });

  it('should use the fallback for unknown banks', () => {
    const fallback = stubParser('fallback');
    const registry = new ParserRegistry().setFallback(fallback);

    expect(registry.resolve('unknown')).toBe(fallback);
    expect(registry.has('unknown')).toBe(false);
  });

  it('should list banks in registration order', () => {
    const registry = new ParserRegistry()
      .register('Zeta Bank', stubParser('z'))
      .register('Alpha Bank', stubParser('a'));

    expect(registry.banks()).toEqual(['Zeta Bank', 'Alpha Bank']);
  });
});

describe('createDefaultRegistry', () => {
  it('should register the HSBC parser with a generic fallback', () => {
    const registry = createDefaultRegistry();

    expect(registry.banks()).toEqual([HSBC_BANK]);
    expect(registry.resolve('HSBC')).toBeInstanceOf(HsbcStatementParser);
    expect(registry.resolve('Hang Seng Bank')).toBeInstanceOf(GenericStatementParser);
  });
});
