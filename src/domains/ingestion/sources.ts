// ──────────────────────────────────────────
// Ingestion: Source registry
// ──────────────────────────────────────────

import { SourceDefinition, SourceName } from '../../shared/types';

export const SOURCES: readonly SourceDefinition[] = [
  { name: 'facebook', category: 'marketing', tag: 'Facebook', candidates: ['Facebook.csv', 'facebook.csv'] },
  { name: 'google', category: 'marketing', tag: 'Google', candidates: ['Google.csv', 'data/Google.csv', 'google.csv'] },
  { name: 'tiktok', category: 'marketing', tag: 'TikTok', candidates: ['TikTok.csv', 'tiktok.csv'] },
  { name: 'business', category: 'business', tag: 'business', candidates: ['Business.csv', 'business.csv'] },
];

export function findSource(name: string): SourceDefinition | undefined {
  return SOURCES.find((s) => s.name === name);
}

export function isSourceName(value: string): value is SourceName {
  return findSource(value) !== undefined;
}
