/**
 * Composable query objects.
 *
 * Build queries from trusted SQL text, quoted identifiers and literals; each
 * object renders itself to bytes through the transformer of the query it is
 * converted for. Composed text keeps its placeholders: `%s` in a `SQL`
 * fragment is still bound by `convert()`.
 * @module sql
 */

import { Composable, Transformer } from '../types/index.js';
import { encode } from '../encoding/index.js';
import { ConversionError } from '../errors/index.js';

const NULL_LITERAL = Buffer.from('NULL', 'latin1');

function encodingOf(tx: Transformer): string {
  return tx.encoding ?? 'utf8';
}

/**
 * Trusted SQL text, included verbatim.
 */
export class SQL implements Composable {
  constructor(readonly text: string) {}

  asBytes(tx: Transformer): Buffer {
    return encode(this.text, encodingOf(tx));
  }

  /**
   * Joins composables with this text as separator.
   */
  join(items: readonly Composable[]): Composed {
    const joined: Composable[] = [];
    items.forEach((item, index) => {
      if (index > 0) joined.push(this);
      joined.push(item);
    });
    return new Composed(joined);
  }
}

/**
 * A double-quoted identifier, optionally qualified (`schema.table`).
 */
export class Identifier implements Composable {
  readonly names: readonly string[];

  constructor(...names: string[]) {
    if (names.length === 0) {
      throw new ConversionError('Identifier requires at least one name');
    }
    this.names = names;
  }

  asBytes(tx: Transformer): Buffer {
    const quoted = this.names.map(name => {
      if (name.includes('\u0000')) {
        throw new ConversionError('identifiers cannot contain NUL characters');
      }
      return `"${name.replace(/"/g, '""')}"`;
    });
    return encode(quoted.join('.'), encodingOf(tx));
  }
}

/**
 * A value rendered as a SQL literal by the transformer.
 */
export class Literal implements Composable {
  constructor(readonly value: unknown) {}

  asBytes(tx: Transformer): Buffer {
    if (this.value === null || this.value === undefined) {
      return NULL_LITERAL;
    }
    return tx.asLiteral(this.value);
  }
}

/**
 * A sequence of composables rendered one after the other.
 */
export class Composed implements Composable {
  constructor(readonly items: readonly Composable[]) {}

  asBytes(tx: Transformer): Buffer {
    return Buffer.concat(this.items.map(item => item.asBytes(tx)));
  }
}
