/**
 * Turnlab Analyzer
 * Speech segmentation and turn-taking statistics for two-channel recordings
 */

// ============================================================================
// Errors
// ============================================================================
export {
  AnalysisContractError,
  ModelLoadError,
  assertSampleRate,
  assertDuration,
} from "./errors";

// ============================================================================
// Audio Utilities
// ============================================================================
export * from "./audio";

// ============================================================================
// Speech Segmentation (VAD)
// ============================================================================
export * from "./vad";

// ============================================================================
// Turn-Taking Analysis
// ============================================================================
export * from "./turnTaking";

// ============================================================================
// Statistics
// ============================================================================
export * from "./stats";

// ============================================================================
// Reporting Series
// ============================================================================
export * from "./reporting";

// ============================================================================
// Pipeline
// ============================================================================
export {
  type ConversationInput,
  type ConversationAnalysis,
  analyzeConversation,
} from "./pipeline";
