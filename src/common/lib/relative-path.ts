import path from 'node:path';

// True when a path produced by `path.relative` stays below its root.
// Names such as `..util.c` are inside; `..` and `../x` are not.
export const isInsideRoot = (relativePath: string) =>
  relativePath.length > 0 &&
  relativePath !== '..' &&
  !relativePath.startsWith(`..${path.sep}`) &&
  !path.isAbsolute(relativePath);
