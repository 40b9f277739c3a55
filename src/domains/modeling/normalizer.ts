// ──────────────────────────────────────────
// Modeling: Schema normalizer
// ──────────────────────────────────────────

import { ModelingContract } from '../../shared/contracts';
import {
  NormalizationOutcome,
  NormalizedBusinessRecord,
  NormalizedMarketingRecord,
  RawTable,
} from '../../shared/types';
import { MarketingTransformer } from './transformers/marketing.transformer';
import { BusinessTransformer } from './transformers/business.transformer';

export class SchemaNormalizer implements ModelingContract {
  private marketingTransformer = new MarketingTransformer();
  private businessTransformer = new BusinessTransformer();

  normalizeMarketing(table: RawTable, channel: string): NormalizationOutcome<NormalizedMarketingRecord> {
    return this.marketingTransformer.transform(table, channel);
  }

  normalizeBusiness(table: RawTable): NormalizationOutcome<NormalizedBusinessRecord> {
    return this.businessTransformer.transform(table);
  }
}
