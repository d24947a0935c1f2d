import fc from 'fast-check';

export const arbVersion = (): fc.Arbitrary<string> =>
  fc
    .tuple(fc.nat({ max: 3 }), fc.nat({ max: 20 }), fc.nat({ max: 9 }))
    .map(([major, minor, patch]) => `${major}.${minor}.${patch}`);

export const arbVersionPath = (minLength = 1): fc.Arbitrary<string[]> =>
  fc.uniqueArray(arbVersion(), { minLength, maxLength: 6 });

export const arbClusterSize = (): fc.Arbitrary<number> => fc.integer({ min: 1, max: 4 });

/** A path of at least two versions plus a node and a later step at which that node never comes back. */
export const arbRejoinFailure = (): fc.Arbitrary<{
  versions: string[];
  size: number;
  nodeIndex: number;
  stepIndex: number;
}> =>
  fc
    .tuple(arbVersionPath(2), arbClusterSize())
    .chain(([versions, size]) =>
      fc.record({
        versions: fc.constant(versions),
        size: fc.constant(size),
        nodeIndex: fc.nat({ max: size - 1 }),
        stepIndex: fc.integer({ min: 1, max: versions.length - 1 }),
      }),
    );
