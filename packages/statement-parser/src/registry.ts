import type { BankStatementParser } from './parser.js';
import { GenericStatementParser } from './parsers/generic-parser.js';
import { HSBC_BANK, HsbcStatementParser } from './parsers/hsbc-parser.js';

/**
 * A registered parser. Plugins are checked for a callable `parse` when a
 * document is dispatched to them, not at registration.
 */
export type RegisteredParser = BankStatementParser | object;

/**
 * Bank name to parser lookup, with an optional fallback for banks that
 * were identified but have no dedicated parser.
 */
export class ParserRegistry {
  private readonly parsers = new Map<string, RegisteredParser>();
  private fallback: RegisteredParser | undefined;

  register(bank: string, parser: RegisteredParser): this {
    this.parsers.set(bank, parser);
    return this;
  }

  setFallback(parser: RegisteredParser | undefined): this {
    this.fallback = parser;
    return this;
  }

  has(bank: string): boolean {
    return this.parsers.has(bank);
  }

  resolve(bank: string): RegisteredParser | undefined {
    return this.parsers.get(bank) ?? this.fallback;
  }

  /** Registered bank names, in registration order. */
  banks(): string[] {
    return [...this.parsers.keys()];
  }
}

export function createDefaultRegistry(): ParserRegistry {
  return new ParserRegistry()
    .register(HSBC_BANK, new HsbcStatementParser())
    .setFallback(new GenericStatementParser());
}
