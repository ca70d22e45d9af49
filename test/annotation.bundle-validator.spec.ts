import {
  AnnotationCategory,
  AnnotationSeverity,
} from '../src/modules/feedback/annotation/interfaces/feedback-bundle.interface';
import {
  parseFeedbackBundle,
  parseFeedbackSummary,
} from '../src/modules/feedback/annotation/lib/feedback-bundle.validator';

const annotation = (overrides: Record<string, unknown> = {}) => ({
  line_number: 3,
  category: 'program_design',
  comment: 'Split this function into smaller helpers.',
  severity: 'issue',
  ...overrides,
});

const summary = {
  strengths: 'Clear variable names.',
  areas_for_improvement: 'Check the result of malloc.',
  overall_assessment: 'A solid submission.',
};

describe('parseFeedbackBundle', () => {
  it('accepts a bundle that matches the schema', async () => {
    const result = await parseFeedbackBundle(
      { annotations: [annotation()] },
      { requireSummary: false },
    );

    expect(result).toEqual({
      ok: true,
      value: {
        annotations: [
          {
            line_number: 3,
            category: AnnotationCategory.ProgramDesign,
            comment: 'Split this function into smaller helpers.',
            severity: AnnotationSeverity.Issue,
          },
        ],
      },
    });
  });

  it('accepts an empty annotation list with a summary', async () => {
    const result = await parseFeedbackBundle(
      { annotations: [], summary },
      { requireSummary: true },
    );

    expect(result).toEqual({ ok: true, value: { annotations: [], summary } });
  });

  it('rejects values that are not objects', async () => {
    expect(
      await parseFeedbackBundle([annotation()], { requireSummary: false }),
    ).toEqual({ ok: false, error: ['bundle must be a JSON object'] });
    expect(
      await parseFeedbackBundle('{}', { requireSummary: false }),
    ).toEqual({ ok: false, error: ['bundle must be a JSON object'] });
  });

  it('reports nested violations with their property path', async () => {
    const result = await parseFeedbackBundle(
      { annotations: [annotation({ line_number: 0 })] },
      { requireSummary: false },
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toContain(
      'annotations.0.line_number: line_number must not be less than 1',
    );
  });

  it('rejects unknown keys at any level', async () => {
    const result = await parseFeedbackBundle(
      { annotations: [annotation({ confidence: 0.9 })], verdict: 'pass' },
      { requireSummary: false },
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toEqual(
      expect.arrayContaining([
        'verdict: property verdict should not exist',
        'annotations.0.confidence: property confidence should not exist',
      ]),
    );
  });

  it('rejects categories and severities outside the enums', async () => {
    const result = await parseFeedbackBundle(
      { annotations: [annotation({ category: 'style', severity: 'minor' })] },
      { requireSummary: false },
    );

    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }
    expect(result.error).toHaveLength(2);
    expect(result.error[0]).toMatch(/^annotations\.0\.category: /);
    expect(result.error[1]).toMatch(/^annotations\.0\.severity: /);
  });

  it('requires a summary only where one is expected', async () => {
    expect(
      await parseFeedbackBundle({ annotations: [] }, { requireSummary: true }),
    ).toEqual({ ok: false, error: ['summary: summary is required'] });
    expect(
      await parseFeedbackBundle(
        { annotations: [], summary },
        { requireSummary: false },
      ),
    ).toEqual({ ok: false, error: ['summary: summary is not allowed'] });
  });

  it('rejects annotations past the end of the file', async () => {
    const result = await parseFeedbackBundle(
      {
        annotations: [
          annotation({ line_number: 5 }),
          annotation({ line_number: 6 }),
        ],
      },
      { requireSummary: false, lineCount: 5 },
    );

    expect(result).toEqual({
      ok: false,
      error: [
        'annotations.1.line_number: line 6 does not exist (file has 5 lines)',
      ],
    });
  });
});

describe('parseFeedbackSummary', () => {
  it('accepts the three summary fields', async () => {
    expect(await parseFeedbackSummary(summary)).toEqual({
      ok: true,
      value: summary,
    });
  });

  it('reports a missing field', async () => {
    const result = await parseFeedbackSummary({
      strengths: summary.strengths,
      areas_for_improvement: summary.areas_for_improvement,
    });

    expect(result).toEqual({
      ok: false,
      error: ['overall_assessment: overall_assessment must be a string'],
    });
  });
});
