/**
 * Adjacency math over positional components
 *
 * Two components are adjacent when one lies in the other's footprint: the
 * rectangle one cell wider than the component on every side. That covers
 * all eight directions along the full span of a number, not only its ends.
 */

import type { PositionalComponent } from './component.js';

type Placement = Pick<PositionalComponent, 'line' | 'column' | 'length'>;

/**
 * Inclusive rectangle of lines and columns
 */
export interface Footprint {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

/**
 * Footprint of a component. Bounds are clamped at 0 so that a component at
 * line 0 or column 0 never produces a negative index.
 */
export function footprint(component: Placement): Footprint {
  return {
    top: Math.max(0, component.line - 1),
    bottom: component.line + 1,
    left: Math.max(0, component.column - 1),
    right: component.column + component.length,
  };
}

export function lastColumn(component: Placement): number {
  return component.column + component.length - 1;
}

/**
 * True when any cell of the component falls inside the area
 */
export function intersects(area: Footprint, component: Placement): boolean {
  return (
    component.line >= area.top &&
    component.line <= area.bottom &&
    component.column <= area.right &&
    lastColumn(component) >= area.left
  );
}

export function isSamePosition(a: Placement, b: Placement): boolean {
  return a.line === b.line && a.column === b.column;
}

/**
 * 8-directional adjacency. Symmetric; a component is never adjacent to itself.
 */
export function areAdjacent(a: Placement, b: Placement): boolean {
  return !isSamePosition(a, b) && intersects(footprint(a), b);
}

/**
 * Same-line contact checked by column arithmetic, so a dot run that was
 * dropped between two components still counts as a gap.
 */
export function touchesOnLine(a: Placement, b: Placement): boolean {
  if (a.line !== b.line) return false;
  return a.column + a.length === b.column || b.column + b.length === a.column;
}
