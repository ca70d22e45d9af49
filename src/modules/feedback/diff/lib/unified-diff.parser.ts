export type DiffHunk = {
  sourceStart: number;
  sourceLength: number;
  targetStart: number;
  targetLength: number;
};

export type UnifiedDiffEntry =
  | {
      kind: 'patch';
      sourcePath: string;
      targetPath: string;
      hunks: DiffHunk[];
    }
  | { kind: 'only-in'; directory: string; name: string }
  | { kind: 'binary'; sourcePath: string; targetPath: string };

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const ONLY_IN = /^Only in (.+?): (.+)$/;
const BINARY = /^Binary files (.+) and (.+) differ$/;

const readHeaderPath = (line: string, marker: '--- ' | '+++ ') => {
  const rest = line.slice(marker.length);
  const tab = rest.indexOf('\t');
  return tab >= 0 ? rest.slice(0, tab) : rest.trimEnd();
};

const parseLength = (raw: string | undefined) =>
  raw === undefined ? 1 : Number.parseInt(raw, 10);

export const hunkTargetLines = (hunk: DiffHunk): number[] =>
  Array.from({ length: hunk.targetLength }, (_, i) => hunk.targetStart + i);

export const parseUnifiedDiff = (text: string): UnifiedDiffEntry[] => {
  const lines = text.split(/\r?\n/);
  const entries: UnifiedDiffEntry[] = [];
  let current: Extract<UnifiedDiffEntry, { kind: 'patch' }> | null = null;
  let remainingSource = 0;
  let remainingTarget = 0;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];

    if (remainingSource > 0 || remainingTarget > 0) {
      const marker = line[0];
      if (marker === ' ') {
        remainingSource -= 1;
        remainingTarget -= 1;
        continue;
      }
      if (marker === '-') {
        remainingSource -= 1;
        continue;
      }
      if (marker === '+') {
        remainingTarget -= 1;
        continue;
      }
      if (marker === '\\') {
        continue;
      }
      remainingSource = 0;
      remainingTarget = 0;
    }

    if (line.startsWith('--- ') && lines[index + 1]?.startsWith('+++ ')) {
      current = {
        kind: 'patch',
        sourcePath: readHeaderPath(line, '--- '),
        targetPath: readHeaderPath(lines[index + 1], '+++ '),
        hunks: [],
      };
      entries.push(current);
      index += 1;
      continue;
    }

    const hunkMatch = HUNK_HEADER.exec(line);
    if (hunkMatch && current) {
      const hunk: DiffHunk = {
        sourceStart: Number.parseInt(hunkMatch[1], 10),
        sourceLength: parseLength(hunkMatch[2]),
        targetStart: Number.parseInt(hunkMatch[3], 10),
        targetLength: parseLength(hunkMatch[4]),
      };
      current.hunks.push(hunk);
      remainingSource = hunk.sourceLength;
      remainingTarget = hunk.targetLength;
      continue;
    }

    const onlyIn = ONLY_IN.exec(line);
    if (onlyIn) {
      current = null;
      entries.push({ kind: 'only-in', directory: onlyIn[1], name: onlyIn[2] });
      continue;
    }

    const binary = BINARY.exec(line);
    if (binary) {
      current = null;
      entries.push({
        kind: 'binary',
        sourcePath: binary[1],
        targetPath: binary[2],
      });
    }
  }

  return entries;
};
