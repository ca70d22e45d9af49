import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Test } from '@nestjs/testing';
import { PIPELINE_ERROR_CODES } from '../src/common/errors/pipeline.error-codes';
import { PROCESS_RUNNER_TOKEN } from '../src/common/process/process-runner.interface';
import {
  ChangeKind,
  SkipReason,
} from '../src/modules/feedback/diff/interfaces/change-set.interface';
import { DiffAnalyzerService } from '../src/modules/feedback/diff/services/diff-analyzer.service';
import { FakeProcessRunner } from './support/fake-process.runner';
import {
  buildTestSettings,
  createTempRoot,
  removeTempRoot,
  testConfigModule,
} from './support/test-config';

const numberedLines = (count: number, label: string) =>
  Array.from({ length: count }, (_, index) => `${label} ${index + 1};\n`).join(
    '',
  );

const range = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, index) => from + index);

describe('DiffAnalyzerService', () => {
  let root: string;
  let baseline: string;
  let submission: string;
  let runner: FakeProcessRunner;
  let analyzer: DiffAnalyzerService;

  const header = (file: string) => [
    `--- ${path.join(baseline, file)}\t2024-03-01 09:00:00.000000000 +0000`,
    `+++ ${path.join(submission, file)}\t2024-03-02 09:00:00.000000000 +0000`,
  ];

  beforeEach(async () => {
    root = await createTempRoot();
    baseline = path.join(root, 'base');
    submission = path.join(root, 'sub');
    await mkdir(baseline, { recursive: true });
    await mkdir(path.join(submission, 'lib'), { recursive: true });
    await writeFile(path.join(submission, 'a.c'), numberedLines(20, 'a'));
    await writeFile(path.join(submission, 'small.c'), numberedLines(12, 's'));
    await writeFile(path.join(submission, 'exact.c'), numberedLines(10, 'e'));
    await writeFile(path.join(submission, 'lib', 'util.c'), 'int util;\n');
    await writeFile(path.join(submission, 'lib', 'README'), 'notes\n');

    runner = new FakeProcessRunner();
    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule(buildTestSettings(root))],
      providers: [
        DiffAnalyzerService,
        { provide: PROCESS_RUNNER_TOKEN, useValue: runner },
      ],
    }).compile();
    analyzer = moduleRef.get(DiffAnalyzerService);
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('builds the change set from a recursive zero-context diff', async () => {
    const stdout = [
      `diff -r -U0 ${path.join(baseline, 'a.c')} ${path.join(submission, 'a.c')}`,
      ...header('a.c'),
      '@@ -5,13 +5,13 @@',
      ...range(5, 17).map((line) => `-old ${line};`),
      ...range(5, 17).map((line) => `+a ${line};`),
      '@@ -30,0 +21,3 @@',
      '+beyond 21;',
      '+beyond 22;',
      '+beyond 23;',
      ...header('exact.c'),
      '@@ -1,10 +1,10 @@',
      ...range(1, 10).map((line) => `-old ${line};`),
      ...range(1, 10).map((line) => `+e ${line};`),
      ...header('notes.txt'),
      '@@ -0,0 +1,15 @@',
      ...range(1, 15).map((line) => `+note ${line}`),
      ...header('small.c'),
      '@@ -2,9 +2,9 @@',
      ...range(2, 10).map((line) => `-old ${line};`),
      ...range(2, 10).map((line) => `+s ${line};`),
      `Only in ${submission}: lib`,
      `Only in ${baseline}: gone.c`,
      '',
    ].join('\n');
    runner.respond('diff', { exitCode: 1, stdout });

    const result = await analyzer.analyze(baseline, submission);

    expect(runner.invocations).toEqual([
      { command: 'diff', args: ['-r', '-U0', baseline, submission] },
    ]);
    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    const { changeSet, skipped, rawDiff } = result.value;
    expect([...changeSet.keys()]).toEqual(['lib/util.c', 'a.c', 'exact.c']);
    expect(changeSet.get('lib/util.c')).toEqual({ kind: ChangeKind.NewFile });
    expect(changeSet.get('a.c')).toEqual({
      kind: ChangeKind.ModifiedFile,
      lineNumbers: new Set(range(5, 17)),
    });
    expect(changeSet.get('exact.c')).toEqual({
      kind: ChangeKind.ModifiedFile,
      lineNumbers: new Set(range(1, 10)),
    });
    expect(skipped).toEqual([
      { path: 'lib/README', reason: SkipReason.Extension },
      { path: 'notes.txt', reason: SkipReason.Extension },
      { path: 'small.c', reason: SkipReason.BelowThreshold, changedLines: 9 },
    ]);
    expect(rawDiff).toBe(stdout);
  });

  it('returns an empty change set for identical trees', async () => {
    runner.respond('diff', { exitCode: 0 });

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.changeSet.size).toBe(0);
    expect(result.value.skipped).toEqual([]);
  });

  it('fails when the diff utility reports trouble', async () => {
    runner.respond('diff', {
      exitCode: 2,
      stderr: 'diff: /missing: No such file or directory\n',
    });

    const result = await analyzer.analyze(baseline, '/missing');

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe(PIPELINE_ERROR_CODES.DIFF_FAILED);
    expect(result.error.message).toBe(
      'diff exited with code 2: diff: /missing: No such file or directory',
    );
  });

  it('fails when the diff utility cannot start', async () => {
    runner.respond('diff', new Error('spawn diff ENOENT'));

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe(PIPELINE_ERROR_CODES.TOOL_NOT_STARTED);
  });

  it('keeps new files whose names start with two dots', async () => {
    await writeFile(path.join(submission, '..util.c'), 'int dots;\n');
    runner.respond('diff', {
      exitCode: 1,
      stdout: [
        `Only in ${submission}: ..util.c`,
        `Only in ${root}: base`,
        '',
      ].join('\n'),
    });

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect([...result.value.changeSet.entries()]).toEqual([
      ['..util.c', { kind: ChangeKind.NewFile }],
    ]);
  });

  it('leaves binary files out of the change set', async () => {
    runner.respond('diff', {
      exitCode: 1,
      stdout: `Binary files ${path.join(baseline, 'blob.c')} and ${path.join(
        submission,
        'blob.c',
      )} differ\n`,
    });

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.changeSet.size).toBe(0);
    expect(result.value.skipped).toEqual([]);
  });
});
