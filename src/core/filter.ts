import type { XrefConfig } from './config';

export type RejectionReason = 'prefix' | 'substring';

export interface FilterVerdict {
  accepted: boolean;
  reason?: RejectionReason;
  /** The configured entry that matched. */
  match?: string;
}

export interface NameFilter {
  isApplicationCode(name: string): boolean;
  explain(name: string): FilterVerdict;
}

/**
 * Application-code filter over canonical names. A name is rejected when it
 * starts with an excluded namespace prefix or contains an excluded marker.
 */
export function createNameFilter(config: Pick<XrefConfig, 'excludedPrefixes' | 'excludedSubstrings'>): NameFilter {
  const prefixes = [...config.excludedPrefixes];
  const substrings = [...config.excludedSubstrings];

  const explain = (name: string): FilterVerdict => {
    const prefix = prefixes.find((p) => name.startsWith(p));
    if (prefix !== undefined) return { accepted: false, reason: 'prefix', match: prefix };
    const marker = substrings.find((s) => name.includes(s));
    if (marker !== undefined) return { accepted: false, reason: 'substring', match: marker };
    return { accepted: true };
  };

  return {
    isApplicationCode: (name) => explain(name).accepted,
    explain,
  };
}
