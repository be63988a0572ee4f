/**
 * Field Extraction Module
 *
 * Each record field owns an ordered chain of strategies. The first candidate
 * that validates wins; exhausted fields keep their empty default.
 */

// Core types
export { ResolvedFields } from './types';
export type {
  ExtractionContext,
  Strategy,
  StrategyResult,
  Candidate,
  Verdict,
  FieldSpec,
  FieldEntry,
} from './types';

// Chain runner
export { extractCandidate, defineField, type Resolution } from './chain';

// Strategies
export {
  matchPattern,
  matchFirst,
  sourceDocument,
  scopeText,
  LabelValueStrategy,
  KeyValueStrategy,
  TableCellStrategy,
  SectionTextStrategy,
  ContainerScanStrategy,
  TextPatternStrategy,
  LiveRegionStrategy,
  LiveTextStrategy,
  InferenceStrategy,
} from './strategies';
export type { DocumentSource, TextScope } from './strategies';

// Section locating
export {
  CONTAINER_SELECTOR,
  closestContainer,
  locateSection,
  widenUntilLength,
  widenUntilMatch,
  type LocateOptions,
} from './locators';

// FAQ
export { FaqSectionStrategy, extractFaqs, looksLikeQuestion, answerFor } from './faq';

// Live rendering
export { LivePage, LIVE_SCRIPTS } from './live';
export type { LiveHandle, LiveElement } from './live';

// Validation and normalization
export {
  ACCEPT,
  reject,
  parseAmount,
  checkRange,
  checkInteger,
  checkText,
  checkRiskLevel,
  formatNav,
  formatRupee,
  formatCrore,
  formatPercent,
  formatRiskLevel,
  cleanText,
} from './validation';

// Field table
export {
  buildFieldTable,
  formatExitLoad,
  formatWeight,
  holdingFromRow,
  holdingsFromTables,
  formatLockIn,
  inferFundType,
  inferRiskLevel,
} from './fields';

// Record assembly
export {
  FundRecordBuilder,
  assembleRecord,
  createExtractionContext,
  type FundRecordBuilderOptions,
  type BuildOptions,
} from './record-builder';
