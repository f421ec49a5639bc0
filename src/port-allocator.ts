/**
 * @fileoverview Lowest-free port allocation.
 *
 * Ports are derived from the live records on every call, so a port is free
 * again as soon as the session holding it is removed from the store.
 *
 * @module port-allocator
 */

import { DEFAULT_PORT_BASE } from './config/lifecycle-timing.js';
import type { SessionRecord } from './types.js';

const MAX_PORT = 65535;

/** Ports held by sessions that are not dead. */
export function heldPorts(records: Iterable<Pick<SessionRecord, 'port' | 'status'>>): Set<number> {
  const held = new Set<number>();
  for (const record of records) {
    if (record.status !== 'dead') held.add(record.port);
  }
  return held;
}

/**
 * Returns the lowest port >= base not held by a live session and not reserved.
 * @throws RangeError when every port above base is taken
 */
export function allocatePort(
  records: Iterable<Pick<SessionRecord, 'port' | 'status'>>,
  base: number = DEFAULT_PORT_BASE,
  reserved: ReadonlySet<number> = new Set(),
): number {
  const held = heldPorts(records);
  for (let port = base; port <= MAX_PORT; port++) {
    if (!held.has(port) && !reserved.has(port)) return port;
  }
  throw new RangeError(`No free port at or above ${base}`);
}
