import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Test } from '@nestjs/testing';
import { PIPELINE_ERROR_CODES } from '../src/common/errors/pipeline.error-codes';
import { ChildProcessRunner } from '../src/common/process/child-process.runner';
import { PROCESS_RUNNER_TOKEN } from '../src/common/process/process-runner.interface';
import { ChangeKind } from '../src/modules/feedback/diff/interfaces/change-set.interface';
import { DiffAnalyzerService } from '../src/modules/feedback/diff/services/diff-analyzer.service';
import {
  buildTestSettings,
  createTempRoot,
  removeTempRoot,
  testConfigModule,
  TestSettingsOverrides,
} from './support/test-config';

const range = (from: number, to: number) =>
  Array.from({ length: to - from + 1 }, (_, index) => from + index);

const lines = (numbers: number[], render: (n: number) => string) =>
  numbers.map((n) => `${render(n)}\n`).join('');

describe('DiffAnalyzerService with the system diff (e2e)', () => {
  let root: string;
  let baseline: string;
  let submission: string;

  const compile = async (overrides: TestSettingsOverrides = {}) => {
    const moduleRef = await Test.createTestingModule({
      imports: [testConfigModule(buildTestSettings(root, overrides))],
      providers: [
        DiffAnalyzerService,
        { provide: PROCESS_RUNNER_TOKEN, useClass: ChildProcessRunner },
      ],
    }).compile();
    return moduleRef.get(DiffAnalyzerService);
  };

  beforeEach(async () => {
    root = await createTempRoot();
    baseline = path.join(root, 'base');
    submission = path.join(root, 'sub');
    await mkdir(path.join(baseline, 'lib'), { recursive: true });
    await mkdir(path.join(submission, 'lib'), { recursive: true });
    await mkdir(path.join(submission, 'newdir'), { recursive: true });

    await writeFile(
      path.join(baseline, 'a.c'),
      lines(range(1, 20), (n) => `int a${n};`),
    );
    await writeFile(
      path.join(submission, 'a.c'),
      lines(range(1, 20), (n) =>
        n >= 5 && n <= 17 ? `long a${n};` : `int a${n};`,
      ),
    );
    await writeFile(
      path.join(baseline, 'lib', 'u.c'),
      lines(range(1, 20), (n) => `int u${n};`),
    );
    await writeFile(
      path.join(submission, 'lib', 'u.c'),
      lines(range(1, 21), (n) => `int u${n};`),
    );
    await writeFile(path.join(submission, 'my file.c'), 'int spaced;\n');
    await writeFile(path.join(submission, '..util.c'), 'int dots;\n');
    await writeFile(path.join(submission, 'newdir', 'n.c'), 'int n;\n');
    await writeFile(path.join(submission, 'newdir', 'notes.md'), '# n\n');
  });

  afterEach(async () => {
    await removeTempRoot(root);
  });

  it('classifies new and modified files from real diff output', async () => {
    const analyzer = await compile({ feedback: { changeThreshold: 1 } });

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect([...result.value.changeSet.entries()]).toEqual([
      ['..util.c', { kind: ChangeKind.NewFile }],
      ['my file.c', { kind: ChangeKind.NewFile }],
      ['newdir/n.c', { kind: ChangeKind.NewFile }],
      [
        'a.c',
        { kind: ChangeKind.ModifiedFile, lineNumbers: new Set(range(5, 17)) },
      ],
      [
        'lib/u.c',
        { kind: ChangeKind.ModifiedFile, lineNumbers: new Set([21]) },
      ],
    ]);
    expect(result.value.skipped.map((file) => file.path)).toEqual([
      'newdir/notes.md',
    ]);
  });

  it('applies the default threshold to a one-line change', async () => {
    const analyzer = await compile();

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(true);
    if (!result.ok) {
      return;
    }
    expect(result.value.changeSet.has('a.c')).toBe(true);
    expect(result.value.changeSet.has('lib/u.c')).toBe(false);
  });

  it('fails when diff cannot read a root', async () => {
    const analyzer = await compile();

    const result = await analyzer.analyze(
      path.join(root, 'missing'),
      submission,
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe(PIPELINE_ERROR_CODES.DIFF_FAILED);
  });

  it('reports a diff command that cannot be started', async () => {
    const analyzer = await compile({
      diff: { command: path.join(root, 'no-such-diff') },
    });

    const result = await analyzer.analyze(baseline, submission);

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error.code).toBe(PIPELINE_ERROR_CODES.TOOL_NOT_STARTED);
  });
});

describe('ChildProcessRunner', () => {
  it('captures the exit code and both output streams', async () => {
    const runner = new ChildProcessRunner();

    const outcome = await runner.run('sh', [
      '-c',
      'printf out; printf err >&2; exit 3',
    ]);

    expect(outcome).toEqual({ exitCode: 3, stdout: 'out', stderr: 'err' });
  });
});
