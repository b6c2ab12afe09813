export * from './commonTypes';
export * from './errors';
export { logger } from './logger';
export { StackAggregator } from './stackcollapse/aggregator';
export { ArraySampleSource } from './stackcollapse/arraySampleSource';
export { collapseStacks, defaultCollapseOptions, identityModeOf, validateCollapseOptions } from './stackcollapse/collapse';
export type { CollapseOptions, CollapseResult } from './stackcollapse/collapse';
export { formatFoldedStacks, writeFoldedStacks } from './stackcollapse/emitter';
export { selectEventType } from './stackcollapse/eventSelector';
export type { EventSelection } from './stackcollapse/eventSelector';
export { normalizeFrame } from './stackcollapse/frameNormalizer';
export type { FrameAnnotationOptions } from './stackcollapse/frameNormalizer';
export { buildStackKey, identityPrefix } from './stackcollapse/stackKey';
export { ReportSampleReader } from './report-sample/reportSampleReader';
export { openSession, detectSessionFormat } from './session';
export { convertRecordFile, getHostSimpleperf } from './simpleperf';
export type { ReportSampleOptions } from './simpleperf';
