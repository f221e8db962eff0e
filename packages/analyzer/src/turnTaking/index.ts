/**
 * Turn-Taking Module
 *
 * Turns, interruptions, handoff latency, overlap and pauses derived from
 * two speakers' speech intervals.
 */

export { buildTurns, createTurn, turnDuration } from "./turnBuilder";

export {
  type InterruptionInit,
  type YieldingFilter,
  createInterruption,
  detectInterruptions,
  filterYieldingEvents,
} from "./interruptionDetector";

export {
  type ResponseTimeSamples,
  computeResponseTimes,
  listResponseTransitions,
} from "./responseTimes";

export { computeOverlap } from "./overlap";

export { computeSilence, mergeActivity } from "./silence";
