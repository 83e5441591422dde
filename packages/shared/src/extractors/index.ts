/**
 * Field Extraction Module
 *
 * Text Normalizer -> Field Extractor Rules -> Record Assembler, wrapped by
 * the contract extractor.
 */

export type {
  MatchStrategy,
  FieldValue,
  Transform,
  LabelMatcherSpec,
  FormatMatcherSpec,
  MatcherSpec,
  SectionSpec,
  RuleOptions,
  ExtractionRuleSpec,
  ExtractionRule,
  RuleSet,
  FieldResult,
  NotFoundReason,
  DocumentText,
  DocumentExtractor,
  ExtractionContext,
  ExtractorResult,
  ExtractorMetadata,
  FieldProvenance,
} from './types';

export {
  normalizeText,
  buildDocumentText,
  pageAt,
  isLabelLine,
  isSectionHeader,
} from './normalizer';

export {
  cleanText,
  digitsOnly,
  digitRange,
  phoneDigits,
  parseMoney,
  parseDate,
  orderNumber,
  planName,
  isCanonicalDate,
} from './transforms';

export { compileLabel, defineRule, createRuleSet, runRule } from './rules';

export { assembleRecord, runRules, matchedFields, type AssembledRecord } from './assembler';

export {
  ContractExtractor,
  contractExtractor,
  ALGORITHM_VERSION,
  CONTRACT_RULES,
  buildContractRules,
  contractRuleSpecs,
  type ContractRuleOptions,
} from './contract';
