// Flow arithmetic helpers shared by the device transfer laws

import type { Stream } from "../domain/nodes/Stream";

/**
 * Sums the current mass flow of every stream. An empty list sums to 0.
 */
export function sumFlows(streams: readonly Stream[]): number {
  return streams.reduce((sum, stream) => sum + stream.getMassFlow(), 0);
}

/**
 * Writes an even share of `total` into every target stream.
 * Floating-point division: 10 split over 2 streams gives 5 each.
 */
export function splitEvenly(total: number, targets: readonly Stream[]): void {
  if (targets.length === 0) return;
  const share = total * (1 / targets.length);
  for (const target of targets) {
    target.setMassFlow(share);
  }
}

// Intent: Compare flow totals with an absolute tolerance
export function flowsEqual(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}
