import stringWidth from 'string-width';
import { INDENT } from '../constants';
import type { Beacon } from './beacon';

/**
 * Render the supervision tree below `root`, one line per node in pre-order:
 * the label indented by depth, padded to a common width, then the state.
 *
 * ```text
 * worker          started
 *   orchestrator  started
 *     producer    started
 *     consumer    started
 * ```
 */
export function describeTree(root: Beacon | { beacon: Beacon }): string[] {
  const rootBeacon = 'beacon' in root ? root.beacon : root;
  const baseDepth = rootBeacon.depth;

  const rows = [...rootBeacon.walk()].map((beacon) => ({
    label: INDENT.repeat(beacon.depth - baseDepth) + beacon.node.label,
    state: beacon.node.state,
  }));

  const width = Math.max(...rows.map(({ label }) => stringWidth(label)));

  return rows.map(
    ({ label, state }) =>
      label + ' '.repeat(width - stringWidth(label)) + INDENT + state,
  );
}
