import { splitLines } from '../../../../common/lib/text-lines';

export enum LineProvenance {
  Unchanged = 'UNCHANGED',
  Added = 'ADDED',
}

export type ProvenanceLine = {
  lineNumber: number;
  provenance: LineProvenance;
  text: string;
};

export type ProvenanceDocument = {
  lines: ProvenanceLine[];
  rendered: string;
};

export const classifyLines = (
  source: string,
  lineNumbers?: ReadonlySet<number>,
): ProvenanceLine[] =>
  splitLines(source).map((text, index) => {
    const lineNumber = index + 1;
    const added = lineNumbers === undefined || lineNumbers.has(lineNumber);
    return {
      lineNumber,
      provenance: added ? LineProvenance.Added : LineProvenance.Unchanged,
      text,
    };
  });

export const renderProvenanceLine = (line: ProvenanceLine) =>
  line.provenance === LineProvenance.Added
    ? `${line.lineNumber} | + ${line.text}`
    : `${line.lineNumber} | ${line.text}`;

export const buildProvenanceDocument = (
  source: string,
  lineNumbers?: ReadonlySet<number>,
): ProvenanceDocument => {
  const lines = classifyLines(source, lineNumbers);
  return { lines, rendered: lines.map(renderProvenanceLine).join('') };
};
