import type { SpeechInterval } from "@turnlab/types";

/**
 * Total time both speakers are active, summed over every interval pair.
 */
export function computeOverlap(
  segmentsA: readonly SpeechInterval[],
  segmentsB: readonly SpeechInterval[],
): number {
  let total = 0;

  for (const a of segmentsA) {
    for (const b of segmentsB) {
      const overlapStart = Math.max(a.start, b.start);
      const overlapEnd = Math.min(a.end, b.end);
      if (overlapEnd > overlapStart) {
        total += overlapEnd - overlapStart;
      }
    }
  }

  return total;
}
