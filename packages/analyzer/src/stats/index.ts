export {
  EMPTY_DISTRIBUTION,
  mean,
  median,
  standardDeviation,
  summarize,
} from "./distribution";

export {
  DEFAULT_SPEAKER_LABELS,
  buildSpeakerStats,
  computeConversationStats,
} from "./conversationStats";
