export { priorityOf, isCriticalOrHigh, quadrantOf } from './priority.js';
export { deriveRow, deriveRows } from './derive.js';
export { aggregateByDomain, overallScore, priorityBreakdown, type OverallScore } from './aggregate.js';
export { topGapItems, compareByGap, sortByGapDescending } from './top-gaps.js';
