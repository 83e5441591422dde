/**
 * Contract Extractor
 *
 * Rule-based extractor for wireless service contracts: normalizes page text,
 * runs the contract rule table, and assembles the record.
 */

import type { DocumentInfo, PageText } from '../../types';
import { logger } from '../../logger';
import { UnrecoverableInputError } from '../../errors';
import { extractionDurationHistogram, fieldMatchesCounter } from '../../metrics';
import { assembleRecord, matchedFields } from '../assembler';
import { buildDocumentText, pageAt } from '../normalizer';
import type {
  DocumentExtractor,
  ExtractionContext,
  ExtractorResult,
  FieldProvenance,
  RuleSet,
} from '../types';
import { CONTRACT_RULES } from './patterns';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

export class ContractExtractor implements DocumentExtractor {
  readonly documentType = 'contract';
  readonly description = 'Wireless service contract: customer, device, rate plan and order fields';

  private readonly rules: RuleSet;

  constructor(rules: RuleSet = CONTRACT_RULES) {
    this.rules = rules;
  }

  extract(pages: PageText[], docInfo: DocumentInfo, ctx: ExtractionContext): ExtractorResult {
    const startTime = Date.now();

    logger.info('Starting extraction', {
      document_type: this.documentType,
      document_id: docInfo.document_id,
      correlation_id: ctx.correlationId,
      page_count: pages.length,
      rule_count: this.rules.length,
    });

    const doc = buildDocumentText(pages);
    if (!doc.text) {
      logger.warn('No text to extract from', {
        document_id: docInfo.document_id,
        page_count: pages.length,
      });
      throw new UnrecoverableInputError();
    }

    const { record, fields, warnings } = assembleRecord(doc.text, this.rules);

    const provenance: FieldProvenance[] = [];
    for (const [field, result] of fields) {
      if (result.found) {
        provenance.push({
          field,
          strategy: result.strategy,
          label: result.label,
          pageNumber: pageAt(doc, result.index),
        });
        fieldMatchesCounter.inc({ field, strategy: result.strategy });
      } else {
        fieldMatchesCounter.inc({ field, strategy: result.reason });
      }
    }

    for (const warning of warnings) {
      logger.warn('Field value downgraded', { document_id: docInfo.document_id, warning });
    }

    const durationMs = Date.now() - startTime;
    extractionDurationHistogram.observe({ document_type: this.documentType }, durationMs / 1000);

    logger.info('Extraction complete', {
      document_type: this.documentType,
      document_id: docInfo.document_id,
      matched_fields: matchedFields(record),
      duration_ms: durationMs,
    });
    logger.debug('Field provenance', { document_id: docInfo.document_id, provenance });

    return {
      record,
      provenance,
      warnings,
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
        durationMs,
        pageCount: doc.pages.length,
        textLength: doc.text.length,
      },
    };
  }
}

export const contractExtractor = new ContractExtractor();

export {
  CONTRACT_RULES,
  buildContractRules,
  contractRuleSpecs,
  type ContractRuleOptions,
} from './patterns';
