/**
 * Field Extraction Types
 *
 * A rule maps one record field to an ordered list of matchers. Matchers are
 * tagged variants: 'label' looks for a known cue such as "IMEI:" and reads the
 * value beside it, 'format' looks for a value of the right shape anywhere.
 * Rules are compiled once into frozen structures and never mutated, so one
 * rule set can serve concurrent requests.
 */

import type { DocumentInfo, ExtractionRecord, FieldName, PageText } from '../types';

export type MatchStrategy = 'label' | 'format';

/**
 * Value a transform may produce. The assembler checks it against the
 * field's own type before it reaches the record.
 */
export type FieldValue = string | number;

/**
 * Post-processing applied to the raw matched text.
 * Returning null means the match is rejected and the next candidate is tried.
 */
export type Transform = (raw: string) => FieldValue | null;

// ============================================================================
// Rule definitions (authoring form)
// ============================================================================

/**
 * Part of the document a matcher searches: from a heading line such as
 * "YOUR INFORMATION:" up to the earliest of the end headings. When the heading
 * is missing the whole text is searched.
 */
export interface SectionSpec {
  start: string;
  end?: readonly string[];
}

export interface LabelMatcherSpec {
  strategy: 'label';
  /** Label alternatives, highest priority first. Case-insensitive. */
  labels: readonly string[];
  /**
   * Pattern searched within the text after the label. Capture group 1 is the
   * value when present, otherwise the whole match. Omitted: the rest of the line.
   */
  value?: RegExp;
  /** Keep reading following lines until the next label or section header */
  block?: boolean;
  /** Words that must not directly precede the label ("Store" for "Store Phone") */
  notAfter?: readonly string[];
  /** Phrases that end the value even without a colon */
  stopLabels?: readonly string[];
  /** Cut the value where another known "Label:" starts on the same line. Default true. */
  cutAtNextLabel?: boolean;
  section?: SectionSpec;
}

export interface FormatMatcherSpec {
  strategy: 'format';
  /** Capture group 1 is the value when present, otherwise the whole match. */
  pattern: RegExp;
  section?: SectionSpec;
}

export type MatcherSpec = LabelMatcherSpec | FormatMatcherSpec;

export interface RuleOptions {
  /**
   * Label phrases that may follow a value on the same line when OCR merges two
   * fields, in addition to the labels of the rules themselves.
   */
  mergedLabels?: readonly string[];
}

export interface ExtractionRuleSpec {
  field: FieldName;
  description: string;
  matchers: readonly MatcherSpec[];
  transform?: Transform;
}

// ============================================================================
// Compiled rules
// ============================================================================

export interface CompiledLabel {
  readonly label: string;
  readonly pattern: RegExp;
}

export interface CompiledSection {
  readonly start: RegExp;
  readonly end: RegExp | null;
}

export interface LabelMatcher {
  readonly strategy: 'label';
  readonly labels: readonly CompiledLabel[];
  readonly value: RegExp | null;
  readonly block: boolean;
  readonly stop: RegExp | null;
  /** Start of a known label merged onto the value's line */
  readonly cut: RegExp | null;
  readonly section: CompiledSection | null;
}

export interface FormatMatcher {
  readonly strategy: 'format';
  readonly pattern: RegExp;
  readonly section: CompiledSection | null;
}

export type Matcher = LabelMatcher | FormatMatcher;

export interface ExtractionRule {
  readonly field: FieldName;
  readonly description: string;
  readonly matchers: readonly Matcher[];
  readonly transform: Transform;
}

export type RuleSet = readonly ExtractionRule[];

// ============================================================================
// Results
// ============================================================================

export type NotFoundReason = 'no_match' | 'invalid_value' | 'no_rule';

export type FieldResult =
  | {
      found: true;
      value: FieldValue;
      strategy: MatchStrategy;
      /** Label that anchored the match; null for format matches */
      label: string | null;
      /** Offset of the match in the normalized text */
      index: number;
      raw: string;
    }
  | {
      found: false;
      reason: NotFoundReason;
    };

/**
 * Normalized text of a whole document plus where each page starts and ends.
 */
export interface DocumentText {
  text: string;
  pages: Array<{ pageNumber: number; start: number; end: number }>;
}

// ============================================================================
// Document extractor
// ============================================================================

export interface ExtractionContext {
  /** Correlation ID for tracing */
  correlationId: string;
}

export interface FieldProvenance {
  field: FieldName;
  strategy: MatchStrategy;
  label: string | null;
  pageNumber: number | null;
}

export interface ExtractorMetadata {
  algorithmVersion: string;
  durationMs: number;
  pageCount: number;
  textLength: number;
}

export interface ExtractorResult {
  record: Readonly<ExtractionRecord>;
  provenance: FieldProvenance[];
  warnings: string[];
  metadata: ExtractorMetadata;
}

/**
 * A document extractor turns recognized page text into a record.
 */
export interface DocumentExtractor {
  /** The document type this extractor handles */
  readonly documentType: string;

  /** Human-readable description of what this extractor does */
  readonly description: string;

  /**
   * Extract the record from document pages.
   *
   * @throws UnrecoverableInputError when no page carries any text
   */
  extract(pages: PageText[], docInfo: DocumentInfo, ctx: ExtractionContext): ExtractorResult;
}
