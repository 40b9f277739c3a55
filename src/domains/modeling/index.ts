// ──────────────────────────────────────────
// Modeling domain — barrel export
// ──────────────────────────────────────────

export { SchemaNormalizer } from './normalizer';
export { MarketingTransformer, MARKETING_COLUMNS } from './transformers/marketing.transformer';
export { BusinessTransformer, BUSINESS_COLUMNS } from './transformers/business.transformer';
export { canonicalizeHeader, canonicalColumnName, SYNONYM_TABLE_VERSION } from './schema/columns';
export { parseCalendarDate, parseDecimal } from './coerce';
