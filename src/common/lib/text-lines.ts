const LINE_PATTERN = /[^\n]*\n|[^\n]+$/g;

// Lines keep their terminators so joining them reproduces the input exactly.
export const splitLines = (text: string): string[] =>
  text.match(LINE_PATTERN) ?? [];

export const countLines = (text: string) => splitLines(text).length;
