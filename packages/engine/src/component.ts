/**
 * Positional components: the numbers and symbols a schematic row is made of
 */

import { ParseError, StructuralAssumptionViolation, type SourcePosition } from './errors.js';
import { SegmentKind, type Segment } from './lexer/index.js';

export interface NumberToken {
  readonly kind: 'number';
  readonly value: number;
}

export interface SymbolToken {
  readonly kind: 'symbol';
  readonly char: string;
}

export type Token = NumberToken | SymbolToken;

export interface PositionalComponent<T extends Token = Token> {
  readonly token: T;
  /** 0-based line index */
  readonly line: number;
  /** 0-based start column */
  readonly column: number;
  /** Printed width in characters; always 1 for symbols */
  readonly length: number;
}

export type NumberComponent = PositionalComponent<NumberToken>;
export type SymbolComponent = PositionalComponent<SymbolToken>;

export function isNumberComponent(component: PositionalComponent): component is NumberComponent {
  return component.token.kind === 'number';
}

export function isSymbolComponent(component: PositionalComponent): component is SymbolComponent {
  return component.token.kind === 'symbol';
}

/**
 * Identity key of a component. Equal values at different positions are distinct.
 */
export function componentKey(component: Pick<PositionalComponent, 'line' | 'column'>): string {
  return `${component.line}:${component.column}`;
}

/**
 * Position of a component as shown in error messages (1-based line)
 */
export function sourcePosition(
  component: Pick<PositionalComponent, 'line' | 'column'>,
): SourcePosition {
  return { line: component.line + 1, column: component.column };
}

/**
 * Convert lexer segments of one line into components, dropping dot runs
 *
 * @throws {ParseError} If a digit run exceeds the safe integer range
 * @throws {StructuralAssumptionViolation} If a symbol segment is not one character wide
 */
export function toComponents(segments: readonly Segment[], line: number): PositionalComponent[] {
  const components: PositionalComponent[] = [];

  for (const segment of segments) {
    const position = sourcePosition({ line, column: segment.column });

    switch (segment.kind) {
      case SegmentKind.DOTS:
        break;

      case SegmentKind.DIGITS: {
        const value = Number(segment.text);
        if (!/^[0-9]+$/.test(segment.text) || !Number.isSafeInteger(value)) {
          throw new ParseError(
            `Digit run '${segment.text}' is not a valid part number`,
            segment.text,
            position,
          );
        }
        const component: NumberComponent = {
          token: { kind: 'number', value },
          line,
          column: segment.column,
          length: segment.length,
        };
        components.push(component);
        break;
      }

      case SegmentKind.SYMBOL: {
        if (segment.length !== 1) {
          throw new StructuralAssumptionViolation(
            `Symbol segment '${segment.text}' spans ${segment.length} characters`,
            position,
          );
        }
        const component: SymbolComponent = {
          token: { kind: 'symbol', char: segment.text },
          line,
          column: segment.column,
          length: 1,
        };
        components.push(component);
        break;
      }
    }
  }

  return components;
}
