/**
 * Sequence contract: the integer discriminator (version or part) that tells
 * otherwise-identical logical files apart.
 */

export type SequenceName = 'version' | 'part';

export interface SequenceDiscipline {
  readonly name: SequenceName;
  /** Value a freshly constructed handler carries; means "any" to the finder. */
  readonly unset: number;
  /** Value given to the first file of an identity on ingest. */
  readonly start: number;
}

export const VERSION_DISCIPLINE: SequenceDiscipline = { name: 'version', unset: 0, start: 1 };
export const PART_DISCIPLINE: SequenceDiscipline = { name: 'part', unset: 1, start: 1 };

/**
 * Matches every physical file sharing a logical identity, whatever its
 * discriminator. `regex` is anchored and captures the discriminator in a named
 * group; `sqlLike` is the store-query form.
 */
export interface UnsequencedPattern {
  readonly sequenceName: SequenceName;
  readonly regex: RegExp;
  readonly sqlLike: string;
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, '\\$&');
}

/** Pattern for names of the form `{prefix}{digits}{suffix}`. */
export function patternAround(prefix: string, suffix: string, sequenceName: SequenceName): UnsequencedPattern {
  return {
    sequenceName,
    regex: new RegExp(`^${escapeRegExp(prefix)}(?<${sequenceName}>\\d+)${escapeRegExp(suffix)}$`),
    sqlLike: `${escapeLike(prefix)}%${escapeLike(suffix)}`,
  };
}

/** Read the discriminator from a name matched by the pattern. */
export function sequenceOf(pattern: UnsequencedPattern, filename: string): number | undefined {
  const match = pattern.regex.exec(filename);
  const digits = match?.groups?.[pattern.sequenceName];
  return digits === undefined ? undefined : Number.parseInt(digits, 10);
}

export function renderVersion(version: number): string {
  return `v${String(version).padStart(3, '0')}`;
}
