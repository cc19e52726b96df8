/**
 * Moves command: list the move catalog in tie-break order.
 */

import type { OutputFormat } from '../../core/models/index.js';
import { moves } from '../../core/tour/index.js';
import { list, print, section } from '../../shared/ui/index.js';

const SIGNED = new Intl.NumberFormat('en-US', { signDisplay: 'exceptZero' });

/** `+dx, +dy` with explicit signs */
export function formatOffset(dx: number, dy: number): string {
  return `${SIGNED.format(dx)}, ${SIGNED.format(dy)}`;
}

export function showMoves(format: OutputFormat = 'text'): void {
  const catalog = moves();
  if (format === 'json') {
    print(JSON.stringify(catalog, null, 2));
    return;
  }
  section(`Move catalog (${catalog.length} moves, tie-break order)`);
  list(catalog.map((offset, index) => `${index + 1}. (${formatOffset(offset.dx, offset.dy)})`), ' ');
}
