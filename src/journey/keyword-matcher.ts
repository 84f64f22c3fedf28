import type { CheckpointDefinition } from './milestone-model.js';

interface Mention {
  value: string;
  start: number;
  end: number;
}

export interface MentionScan {
  /** Distinct values mentioned affirmatively, in order of first mention. */
  values: string[];
  /** Distinct values that only appear under a negation ("not rustic"). */
  negated: string[];
}

const NEGATORS = new Set([
  'not',
  'no',
  'nothing',
  'never',
  'without',
  'neither',
  'nor',
  'none',
  'dont',
  'cant',
]);
// Words before a mention that a negator may sit in
const NEGATION_WINDOW = 5;
const CLAUSE_BREAK = /[.,;:!?]|\b(?:but|however|instead|rather)\b/;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function termPattern(term: string): RegExp {
  const body = term
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'g');
}

function findMentions(checkpoint: CheckpointDefinition, text: string): Mention[] {
  const haystack = text.toLowerCase();
  const mentions: Mention[] = [];
  for (const value of checkpoint.values) {
    const terms = [value, ...(checkpoint.synonyms[value] ?? [])];
    for (const term of terms) {
      for (const match of haystack.matchAll(termPattern(term))) {
        const start = match.index ?? 0;
        mentions.push({ value, start, end: start + match[0].length });
      }
    }
  }
  // "master bedroom" swallows "bedroom", "not urgent" swallows "urgent"
  return mentions.filter(
    (m) =>
      !mentions.some(
        (o) =>
          o !== m &&
          o.start <= m.start &&
          o.end >= m.end &&
          o.end - o.start > m.end - m.start,
      ),
  );
}

function isNegated(haystack: string, mention: Mention): boolean {
  const clause = haystack.slice(0, mention.start).split(CLAUSE_BREAK).pop() ?? '';
  return clause
    .split(/\s+/)
    .filter(Boolean)
    .slice(-NEGATION_WINDOW)
    .map((w) => w.replace(/[^a-z'’]/g, ''))
    .some((w) => NEGATORS.has(w) || /n['’]t$/.test(w));
}

/** Canonical values mentioned in `text`, split by whether a negation governs them. */
export function scanCanonicalValues(
  checkpoint: CheckpointDefinition,
  text: string,
): MentionScan {
  const haystack = text.toLowerCase();
  const ordered = findMentions(checkpoint, haystack).sort((a, b) => a.start - b.start);
  const values = new Set<string>();
  const negated = new Set<string>();
  for (const m of ordered) {
    if (isNegated(haystack, m)) negated.add(m.value);
    else values.add(m.value);
  }
  return {
    values: [...values],
    negated: [...negated].filter((v) => !values.has(v)),
  };
}

/** Distinct canonical values mentioned affirmatively in `text`, in order of first mention. */
export function matchCanonicalValues(
  checkpoint: CheckpointDefinition,
  text: string,
): string[] {
  return scanCanonicalValues(checkpoint, text).values;
}

/**
 * Degraded extraction used when the extraction model is unavailable.
 * Returns a value only when exactly one canonical value is mentioned, and
 * not under a negation.
 */
export function keywordMatch(
  checkpoint: CheckpointDefinition,
  text: string,
): string | null {
  const values = matchCanonicalValues(checkpoint, text);
  return values.length === 1 ? values[0] : null;
}
