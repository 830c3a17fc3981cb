/**
 * Decides whether a publication counts as team output
 */

import type {
  ClassificationResult,
  ExclusionRules,
  FilterRules,
  PublicationRecord,
} from '../types.js';

export const NO_TEAM_AUTHOR = 'no known team author';
export const NO_KEYWORD = 'no matching keyword — manual review';

function containsAny(haystacks: string[], needles: readonly string[]): boolean {
  return needles.some((needle) => haystacks.some((text) => text.includes(needle)));
}

function lowerTerms(terms: readonly string[]): string[] {
  return terms.map((term) => term.trim().toLowerCase()).filter((term) => term.length > 0);
}

/**
 * Classify one record.
 *
 * 1. No provenance: exclude.
 * 2. A member's exclusion topic in title or abstract: exclude, unless title
 *    or abstract also carry a keyword, then continue.
 * 3. No keyword in title, abstract or journal: flag for review.
 * 4. Include.
 *
 * Depends only on the record and the rules passed in.
 */
export function classify(
  record: PublicationRecord,
  exclusions: ExclusionRules,
  keywords: readonly string[]
): ClassificationResult {
  if (record.provenance.size === 0) {
    return { decision: 'exclude', reason: NO_TEAM_AUTHOR };
  }

  const title = record.title.toLowerCase();
  const abstract = (record.abstract ?? '').toLowerCase();
  const journal = (record.journal ?? '').toLowerCase();
  const lowerKeywords = lowerTerms(keywords);

  for (const member of record.provenance) {
    const topics = Object.hasOwn(exclusions, member) ? exclusions[member] : [];
    const topic = topics.find((t) => {
      const needle = t.trim().toLowerCase();
      return needle.length > 0 && (title.includes(needle) || abstract.includes(needle));
    });
    if (topic === undefined) {
      continue;
    }
    if (containsAny([title, abstract], lowerKeywords)) {
      // a keyword in title or abstract overrides every exclusion
      break;
    }
    return { decision: 'exclude', reason: `${member}: ${topic}`, member, topic };
  }

  if (!containsAny([title, abstract, journal], lowerKeywords)) {
    return { decision: 'flag', reason: NO_KEYWORD };
  }

  return { decision: 'include' };
}

export interface ClassifiedRecord {
  record: PublicationRecord;
  result: ClassificationResult;
}

export interface FilterOutcome {
  included: ClassifiedRecord[];
  excluded: ClassifiedRecord[];
  flagged: ClassifiedRecord[];
}

/**
 * Classify every record and partition by decision, keeping input order.
 */
export function filterRecords(records: readonly PublicationRecord[], rules: FilterRules): FilterOutcome {
  const outcome: FilterOutcome = { included: [], excluded: [], flagged: [] };

  for (const record of records) {
    const result = classify(record, rules.exclusions, rules.keywords);
    const entry = { record, result };
    switch (result.decision) {
      case 'include':
        outcome.included.push(entry);
        break;
      case 'exclude':
        outcome.excluded.push(entry);
        break;
      case 'flag':
        outcome.flagged.push(entry);
        break;
    }
  }

  return outcome;
}
