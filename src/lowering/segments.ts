import type { Segment } from '../frontend/ast.js';

/**
 * How a segment's cells are reached.
 *
 * - `register`: the base address lives in a pointer register (double dereference).
 * - `fixed`: the segment occupies `size` cells starting at `base` (direct dereference).
 * - `static`: a per-unit block starting at `base`; cells are named `<unit>.<index>` and the
 *   assembler hands out addresses in first-use order.
 * - `constant`: no memory behind it; push-only.
 */
export type SegmentBase =
  | { kind: 'register'; register: 'LCL' | 'ARG' | 'THIS' | 'THAT' }
  | { kind: 'fixed'; base: number; size: number }
  | { kind: 'static'; base: number }
  | { kind: 'constant' };

export const SEGMENT_TABLE = {
  local: { kind: 'register', register: 'LCL' },
  argument: { kind: 'register', register: 'ARG' },
  this: { kind: 'register', register: 'THIS' },
  that: { kind: 'register', register: 'THAT' },
  temp: { kind: 'fixed', base: 5, size: 8 },
  pointer: { kind: 'fixed', base: 3, size: 2 },
  static: { kind: 'static', base: 16 },
  constant: { kind: 'constant' },
} as const satisfies Record<Segment, SegmentBase>;

/** `pointer 0` aliases THIS, `pointer 1` aliases THAT. */
export const POINTER_ALIASES = ['THIS', 'THAT'] as const;

/**
 * First address of the stack; also the boundary static allocation must stay below.
 */
export const STACK_BASE = 256;

/**
 * Scratch registers used by generated code.
 */
export const SCRATCH = {
  /** Computed pop destination; frame base during `return`. */
  address: 'R13',
  /** Return address during `return`. */
  returnAddress: 'R14',
} as const;

export function isSegmentName(segment: string): segment is Segment {
  return Object.hasOwn(SEGMENT_TABLE, segment);
}

export function lookupSegment(segment: string): SegmentBase | undefined {
  return isSegmentName(segment) ? SEGMENT_TABLE[segment] : undefined;
}
