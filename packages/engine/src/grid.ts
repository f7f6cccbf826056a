/**
 * Materialized schematic: every row's components, indexed by line
 */

import { areAdjacent } from './adjacency.js';
import { toComponents, type PositionalComponent } from './component.js';
import { LineLexer, splitRows } from './lexer/index.js';

export class SchematicGrid {
  private constructor(readonly rows: readonly (readonly PositionalComponent[])[]) {}

  /**
   * Parse the whole input into per-row component lists
   *
   * @throws {ParseError} If a digit run exceeds the safe integer range
   */
  static parse(input: string): SchematicGrid {
    const lexer = new LineLexer();
    const rows = splitRows(input).map((row, line) => toComponents(lexer.tokenize(row), line));
    return new SchematicGrid(rows);
  }

  get lineCount(): number {
    return this.rows.length;
  }

  /**
   * All components in scan order: by line, then by column
   */
  *components(): Generator<PositionalComponent> {
    for (const row of this.rows) {
      yield* row;
    }
  }

  /**
   * Components adjacent to the given one, from the line above, the same
   * line and the line below, in scan order
   */
  neighbours(component: PositionalComponent): PositionalComponent[] {
    const result: PositionalComponent[] = [];
    const first = Math.max(0, component.line - 1);
    const last = Math.min(this.rows.length - 1, component.line + 1);

    for (let line = first; line <= last; line++) {
      for (const candidate of this.rows[line]) {
        if (areAdjacent(component, candidate)) {
          result.push(candidate);
        }
      }
    }

    return result;
  }
}
