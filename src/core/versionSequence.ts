import { SequenceError } from './errors';

/**
 * Ordered upgrade path. The first entry is the bootstrap version; every later
 * entry is a rolling-update target applied strictly in order.
 *
 * Repeated versions are dropped after their first occurrence: each version
 * tags exactly one record, so a repeat would make the per-version lookup
 * ambiguous.
 */
export class VersionSequence implements Iterable<string> {
  private readonly versions: readonly string[];

  constructor(versions: Iterable<string>) {
    const seen = new Set<string>();
    const ordered: string[] = [];
    for (const raw of versions) {
      const version = raw.trim();
      if (version.length === 0) {
        throw new SequenceError('version sequence contains a blank entry');
      }
      if (seen.has(version)) {
        continue;
      }
      seen.add(version);
      ordered.push(version);
    }
    if (ordered.length === 0) {
      throw new SequenceError('version sequence must be non-empty');
    }
    this.versions = ordered;
  }

  get length(): number {
    return this.versions.length;
  }

  get bootstrap(): string {
    return this.at(0);
  }

  at(index: number): string {
    const version = this.versions[index];
    if (version === undefined) {
      throw new SequenceError(
        `step index ${index} is outside the version sequence (length ${this.versions.length})`,
      );
    }
    return version;
  }

  slice(uptoIndex: number): string[] {
    return this.versions.slice(0, uptoIndex + 1);
  }

  toArray(): string[] {
    return [...this.versions];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.versions[Symbol.iterator]();
  }
}

export function parseVersionList(raw: string | undefined, fallback: readonly string[]): string[] {
  if (!raw || raw.trim().length === 0) {
    return [...fallback];
  }
  return raw.split(',').map((part) => part.trim());
}
