import { SUMMARY_FIELDS } from '../../annotation/protocol/feedback-bundle.protocol';
import type { FeedbackSummary } from '../../annotation/interfaces/feedback-bundle.interface';

export const ANNOTATION_LABEL = 'REVIEW:';
const HEADER_RULE = '============================';

// Greedy word wrap. Whitespace runs collapse to one space; words wider than
// the column are split across lines.
export const wrapText = (text: string, width: number): string[] => {
  const columns = Math.max(1, width);
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((part) => part.length > 0)) {
    let rest = word;
    while (rest.length > 0) {
      const candidate = current ? `${current} ${rest}` : rest;
      if (candidate.length <= columns) {
        current = candidate;
        rest = '';
      } else if (rest.length <= columns) {
        lines.push(current);
        current = '';
      } else {
        const prefix = current ? `${current} ` : '';
        const room = columns - prefix.length;
        if (room < 1) {
          lines.push(current);
          current = '';
          continue;
        }
        lines.push(`${prefix}${rest.slice(0, room)}`);
        current = '';
        rest = rest.slice(room);
      }
    }
  }

  if (current) {
    lines.push(current);
  }
  return lines;
};

const commentLine = (text: string) => (text ? ` * ${text}` : ' *');

export const formatAnnotationBlock = (comment: string, width: number) => {
  const [first = '', ...rest] = wrapText(comment, width);
  return [
    '/*',
    commentLine(`${ANNOTATION_LABEL} ${first}`.trimEnd()),
    ...rest.map(commentLine),
    ' */',
  ]
    .map((line) => `${line}\n`)
    .join('');
};

export const summaryLabel = (field: string) =>
  `${field.toUpperCase().replace(/_/g, ' ')}:`;

export const formatSummaryBlock = (summary: FeedbackSummary, width: number) =>
  [
    '/*',
    ...SUMMARY_FIELDS.flatMap((field) => [
      ' *',
      commentLine(summaryLabel(field)),
      ...wrapText(summary[field], width).map(commentLine),
    ]),
    ' */',
  ]
    .map((line) => `${line}\n`)
    .join('');

export const formatSectionHeader = (unitId: string) =>
  `/*${HEADER_RULE} ${unitId} ${HEADER_RULE}*/\n`;
