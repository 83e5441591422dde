/**
 * Field Extractor Rules
 *
 * Compiles rule definitions into frozen matchers and runs one rule against
 * normalized text. Matchers are tried in order and the first candidate that
 * survives the rule's transform wins. A matcher scoped to a section searches
 * only that section, or the whole text when the document has no such heading.
 * Running a rule has no side effects: patterns are only ever used through
 * matchAll/exec on non-global copies, so no RegExp lastIndex state is shared
 * between calls.
 */

import { cleanText } from './transforms';
import { isLabelLine, isSectionHeader } from './normalizer';
import type {
  CompiledLabel,
  CompiledSection,
  ExtractionRule,
  ExtractionRuleSpec,
  FieldResult,
  FormatMatcher,
  LabelMatcher,
  LabelMatcherSpec,
  Matcher,
  MatcherSpec,
  RuleOptions,
  RuleSet,
  SectionSpec,
} from './types';

type FoundField = Extract<FieldResult, { found: true }>;

/** Continuation lines read by a block matcher */
const MAX_BLOCK_LINES = 4;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function phrasePattern(phrase: string): string {
  return phrase.trim().split(/\s+/).map(escapeRegExp).join('\\s*');
}

/**
 * Pattern for "Label:" as a whole word, case-insensitive, tolerant of OCR
 * spacing between words. Labels ending in "#" ("Order #") take the colon as
 * optional.
 */
export function compileLabel(label: string, notAfter: readonly string[] = []): CompiledLabel {
  const body = phrasePattern(label);
  const terminator = label.trim().endsWith('#') ? '\\s*:?' : '\\.?\\s*:';
  const guard =
    notAfter.length > 0 ? `(?<!(?:${notAfter.map(phrasePattern).join('|')})\\s+)` : '';

  return Object.freeze({
    label,
    pattern: new RegExp(`(?<![A-Za-z0-9])${guard}${body}${terminator}[ \\t]*`, 'gi'),
  });
}

function withoutGlobal(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

function withGlobal(pattern: RegExp): RegExp {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  return new RegExp(pattern.source, flags);
}

/**
 * Whitespace before any of the phrases used as "Label:", e.g. the
 * " Default Voicemail Password" in "(780) 617-4431 Default Voicemail Password: 1234".
 * Only known phrases cut, so capitalised words of the value itself survive.
 */
function compileLabelCut(phrases: readonly string[]): RegExp | null {
  const unique = new Map<string, string>();
  for (const phrase of phrases) {
    const trimmed = phrase.trim();
    if (trimmed) unique.set(trimmed.toLowerCase(), trimmed);
  }
  if (unique.size === 0) return null;

  const alternatives = Array.from(unique.values())
    .sort((a, b) => b.length - a.length)
    .map(phrasePattern)
    .join('|');
  return new RegExp(`\\s+(?=(?:${alternatives})(?:\\(s\\))?\\s*#?\\s*:)`, 'i');
}

function headingPattern(headings: readonly string[]): RegExp {
  return new RegExp(`^[ \\t]*(?:${headings.map(phrasePattern).join('|')})(?![A-Za-z0-9])`, 'im');
}

function compileSection(spec: SectionSpec | undefined): CompiledSection | null {
  if (!spec) return null;
  const end = spec.end ?? [];
  return Object.freeze({
    start: headingPattern([spec.start]),
    end: end.length > 0 ? headingPattern(end) : null,
  });
}

function compileLabelMatcher(spec: LabelMatcherSpec, cut: RegExp | null): LabelMatcher {
  const stopLabels = spec.stopLabels ?? [];

  return Object.freeze({
    strategy: 'label' as const,
    labels: Object.freeze(spec.labels.map((label) => compileLabel(label, spec.notAfter))),
    value: spec.value ? withoutGlobal(spec.value) : null,
    block: spec.block ?? false,
    stop:
      stopLabels.length > 0
        ? new RegExp(`\\s*\\b(?:${stopLabels.map(phrasePattern).join('|')})\\b`, 'i')
        : null,
    cut: spec.cutAtNextLabel === false ? null : cut,
    section: compileSection(spec.section),
  });
}

function compileMatcher(spec: MatcherSpec, cut: RegExp | null): Matcher {
  if (spec.strategy === 'label') {
    return compileLabelMatcher(spec, cut);
  }
  const matcher: FormatMatcher = {
    strategy: 'format',
    pattern: withGlobal(spec.pattern),
    section: compileSection(spec.section),
  };
  return Object.freeze(matcher);
}

/** Every phrase a rule uses as a label: its labels and its stop phrases */
function labelPhrases(spec: ExtractionRuleSpec): string[] {
  return spec.matchers.flatMap((m) =>
    m.strategy === 'label' ? [...m.labels, ...(m.stopLabels ?? [])] : []
  );
}

/**
 * Compile one rule definition. Label matchers must come before format
 * matchers: a labelled value is the higher-precision reading.
 */
export function defineRule(spec: ExtractionRuleSpec, options: RuleOptions = {}): ExtractionRule {
  const firstFormat = spec.matchers.findIndex((m) => m.strategy === 'format');
  const lastLabel = spec.matchers.map((m) => m.strategy).lastIndexOf('label');
  if (firstFormat !== -1 && lastLabel > firstFormat) {
    throw new Error(`Rule for ${spec.field}: label matchers must precede format matchers`);
  }

  const cut = compileLabelCut([...labelPhrases(spec), ...(options.mergedLabels ?? [])]);

  return Object.freeze({
    field: spec.field,
    description: spec.description,
    matchers: Object.freeze(spec.matchers.map((m) => compileMatcher(m, cut))),
    transform: spec.transform ?? cleanText,
  });
}

/**
 * Build an immutable rule set. At most one rule per field. A value is cut
 * where any rule's label in the set starts on its line.
 */
export function createRuleSet(
  specs: readonly ExtractionRuleSpec[],
  options: RuleOptions = {}
): RuleSet {
  const seen = new Set<string>();
  for (const spec of specs) {
    if (seen.has(spec.field)) {
      throw new Error(`Duplicate extraction rule for field: ${spec.field}`);
    }
    seen.add(spec.field);
  }

  const mergedLabels = [...specs.flatMap(labelPhrases), ...(options.mergedLabels ?? [])];
  return Object.freeze(specs.map((spec) => defineRule(spec, { mergedLabels })));
}

// ============================================================================
// Matching
// ============================================================================

function lineEndAt(text: string, from: number): number {
  const end = text.indexOf('\n', from);
  return end === -1 ? text.length : end;
}

/**
 * Text belonging to the label that ends at `start`: the rest of its line,
 * or the next line when the label stands alone; for block matchers, the
 * continuation lines up to the next label or heading.
 */
function labelSegment(text: string, start: number, block: boolean): string {
  let end = lineEndAt(text, start);
  let segment = text.slice(start, end);

  if (segment.trim() === '' && end < text.length) {
    const nextEnd = lineEndAt(text, end + 1);
    const nextLine = text.slice(end + 1, nextEnd);
    if (isLabelLine(nextLine)) return '';
    segment = nextLine;
    end = nextEnd;
  }

  if (block) {
    for (let i = 0; i < MAX_BLOCK_LINES && end < text.length; i++) {
      const nextEnd = lineEndAt(text, end + 1);
      const nextLine = text.slice(end + 1, nextEnd);
      if (!nextLine.trim() || isLabelLine(nextLine) || isSectionHeader(nextLine)) break;
      segment = `${segment} ${nextLine}`;
      end = nextEnd;
    }
  }

  return segment;
}

function cut(segment: string, at: RegExp | null): string {
  if (!at) return segment;
  const match = at.exec(segment);
  return match ? segment.slice(0, match.index) : segment;
}

function runLabelMatcher(
  matcher: LabelMatcher,
  rule: ExtractionRule,
  text: string
): FoundField | null {
  for (const { label, pattern } of matcher.labels) {
    for (const match of text.matchAll(pattern)) {
      const index = match.index ?? 0;
      let segment = labelSegment(text, index + match[0].length, matcher.block);
      segment = cut(segment, matcher.cut);
      segment = cut(segment, matcher.stop);

      let raw = segment;
      if (matcher.value) {
        const valueMatch = matcher.value.exec(segment);
        if (!valueMatch) continue;
        raw = valueMatch[1] ?? valueMatch[0];
      }

      raw = raw.trim();
      if (!raw) continue;

      const value = rule.transform(raw);
      if (value !== null) {
        return { found: true, value, strategy: 'label', label, index, raw };
      }
    }
  }
  return null;
}

function runFormatMatcher(
  matcher: FormatMatcher,
  rule: ExtractionRule,
  text: string
): FoundField | null {
  for (const match of text.matchAll(matcher.pattern)) {
    const raw = (match[1] ?? match[0]).trim();
    if (!raw) continue;

    const value = rule.transform(raw);
    if (value !== null) {
      return { found: true, value, strategy: 'format', label: null, index: match.index ?? 0, raw };
    }
  }
  return null;
}

function runMatcher(matcher: Matcher, rule: ExtractionRule, text: string): FoundField | null {
  return matcher.strategy === 'label'
    ? runLabelMatcher(matcher, rule, text)
    : runFormatMatcher(matcher, rule, text);
}

/**
 * Text between a section's heading and the earliest of its end headings,
 * with the offset where it starts. Null when the heading is missing.
 */
function sectionOf(
  section: CompiledSection,
  text: string
): { text: string; offset: number } | null {
  const start = section.start.exec(text);
  if (!start) return null;

  const offset = start.index + start[0].length;
  const rest = text.slice(offset);
  const end = section.end ? section.end.exec(rest) : null;
  return { text: end ? rest.slice(0, end.index) : rest, offset };
}

function runScopedMatcher(
  matcher: Matcher,
  rule: ExtractionRule,
  text: string
): FoundField | null {
  const scope = matcher.section ? sectionOf(matcher.section, text) : null;
  if (!scope) return runMatcher(matcher, rule, text);

  const result = runMatcher(matcher, rule, scope.text);
  return result ? { ...result, index: result.index + scope.offset } : null;
}

/**
 * Run one rule against normalized text. Never throws; absence of a usable
 * match is `{ found: false }`.
 */
export function runRule(rule: ExtractionRule, text: string): FieldResult {
  if (!text) return { found: false, reason: 'no_match' };

  for (const matcher of rule.matchers) {
    const result = runScopedMatcher(matcher, rule, text);
    if (result) return result;
  }

  return { found: false, reason: 'no_match' };
}
