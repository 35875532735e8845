import type { LanguageModelClient } from '../src/services/llm.js';
import type { DatabaseConnection } from '../src/services/database.js';
import type { Row } from '../src/types/utils.js';

/**
 * Model stand-in that replays scripted replies and records prompts.
 */
export class ScriptedModel implements LanguageModelClient {
  readonly prompts: string[] = [];

  constructor(private readonly replies: Array<string | Error>) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error('no scripted reply left');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

/**
 * Connection stand-in that records statements and close calls.
 */
export class FakeConnection implements DatabaseConnection {
  readonly statements: string[] = [];
  closeCalls = 0;

  constructor(private readonly respond: (sql: string) => Row[] | Error) {}

  get closed(): boolean {
    return this.closeCalls > 0;
  }

  async query(sql: string): Promise<Row[]> {
    this.statements.push(sql);
    const result = this.respond(sql);
    if (result instanceof Error) {
      throw result;
    }
    return result;
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export const nikeRow: Row = {
  brand: 'Nike',
  product_name: 'Tee',
  size: 'L',
  color: 'Black',
  price_per_item: 19.5,
  stock_quantity: 3,
};
