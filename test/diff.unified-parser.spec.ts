import {
  hunkTargetLines,
  parseUnifiedDiff,
} from '../src/modules/feedback/diff/lib/unified-diff.parser';

describe('parseUnifiedDiff', () => {
  it('reads patches, new entries and binary notices', () => {
    const diff = [
      'diff -r -U0 base/a.c sub/a.c',
      '--- base/a.c\t2024-01-01 10:00:00.000000000 +0000',
      '+++ sub/a.c\t2024-01-02 10:00:00.000000000 +0000',
      '@@ -5,2 +5,3 @@',
      '-old five',
      '--- removed line that looks like a header',
      '+new five',
      '+new six',
      '+++ added line that looks like a header',
      '@@ -20 +21,0 @@',
      '-removed twenty',
      'Only in sub: extra',
      'Binary files base/img.png and sub/img.png differ',
    ].join('\n');

    expect(parseUnifiedDiff(diff)).toEqual([
      {
        kind: 'patch',
        sourcePath: 'base/a.c',
        targetPath: 'sub/a.c',
        hunks: [
          {
            sourceStart: 5,
            sourceLength: 2,
            targetStart: 5,
            targetLength: 3,
          },
          {
            sourceStart: 20,
            sourceLength: 1,
            targetStart: 21,
            targetLength: 0,
          },
        ],
      },
      { kind: 'only-in', directory: 'sub', name: 'extra' },
      {
        kind: 'binary',
        sourcePath: 'base/img.png',
        targetPath: 'sub/img.png',
      },
    ]);
  });

  it('keeps several patches apart', () => {
    const diff = [
      '--- base/a.c',
      '+++ sub/a.c',
      '@@ -1 +1 @@',
      '-x',
      '+y',
      '--- base/b.c',
      '+++ sub/b.c',
      '@@ -3,0 +4,2 @@',
      '+p',
      '+q',
      '',
    ].join('\n');

    const entries = parseUnifiedDiff(diff);

    expect(entries).toHaveLength(2);
    expect(entries.map((entry) => entry.kind)).toEqual(['patch', 'patch']);
    const [, second] = entries;
    if (second.kind !== 'patch') {
      throw new Error('expected a patch entry');
    }
    expect(second.targetPath).toBe('sub/b.c');
    expect(second.hunks.map(hunkTargetLines)).toEqual([[4, 5]]);
  });

  it('returns nothing for identical trees', () => {
    expect(parseUnifiedDiff('')).toEqual([]);
  });
});

describe('hunkTargetLines', () => {
  it('lists the target-side range and nothing for pure deletions', () => {
    expect(
      hunkTargetLines({
        sourceStart: 5,
        sourceLength: 13,
        targetStart: 5,
        targetLength: 13,
      }),
    ).toEqual([5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17]);
    expect(
      hunkTargetLines({
        sourceStart: 7,
        sourceLength: 2,
        targetStart: 6,
        targetLength: 0,
      }),
    ).toEqual([]);
  });
});
