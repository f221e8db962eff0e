export {
  type DirectionalGaps,
  splitTransitionsByDirection,
  cumulativeTalkSeries,
  speakerShares,
} from "./series";
