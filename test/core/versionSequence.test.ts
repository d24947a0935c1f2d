import { describe, expect, it } from 'vitest';
import { SequenceError } from '../../src/core/errors';
import { VersionSequence, parseVersionList } from '../../src/core/versionSequence';

describe('VersionSequence', () => {
  it('keeps order and exposes the bootstrap version', () => {
    const versions = new VersionSequence(['1.0', '1.1', '1.2']);
    expect(versions.length).toBe(3);
    expect(versions.bootstrap).toBe('1.0');
    expect(versions.at(2)).toBe('1.2');
    expect([...versions]).toEqual(['1.0', '1.1', '1.2']);
    expect(versions.slice(1)).toEqual(['1.0', '1.1']);
  });

  it('rejects an empty sequence', () => {
    expect(() => new VersionSequence([])).toThrow(SequenceError);
    expect(() => new VersionSequence([])).toThrow('version sequence must be non-empty');
  });

  it('rejects blank entries', () => {
    expect(() => new VersionSequence(['1.0', '  '])).toThrow(/blank entry/);
  });

  it('drops repeated versions after their first occurrence', () => {
    const versions = new VersionSequence(['1.0', '1.1', '1.0', ' 1.2 ', '1.1']);
    expect(versions.toArray()).toEqual(['1.0', '1.1', '1.2']);
  });

  it('fails on an index outside the sequence', () => {
    const versions = new VersionSequence(['1.0']);
    expect(() => versions.at(1)).toThrow(/step index 1 is outside the version sequence \(length 1\)/);
  });
});

describe('parseVersionList', () => {
  it('falls back when unset or blank', () => {
    expect(parseVersionList(undefined, ['1.0'])).toEqual(['1.0']);
    expect(parseVersionList('   ', ['1.0'])).toEqual(['1.0']);
  });

  it('splits and trims comma-separated versions', () => {
    expect(parseVersionList('1.16.0, 1.16.1 ,1.17.0', [])).toEqual(['1.16.0', '1.16.1', '1.17.0']);
  });

  it('keeps blank entries so the sequence rejects them', () => {
    expect(parseVersionList('1.0,,1.1', [])).toEqual(['1.0', '', '1.1']);
    expect(() => new VersionSequence(parseVersionList('1.0,,1.1', []))).toThrow(
      'version sequence contains a blank entry',
    );
  });
});
