import { MeteredCall } from '../src/modules/feedback/annotation/interfaces/pipeline-stage.enum';
import {
  formatLogTimestamp,
  formatUsageLine,
} from '../src/modules/feedback/artifacts/lib/usage-log';

describe('usage log', () => {
  const date = new Date(2024, 0, 5, 9, 3, 7);

  it('formats local timestamps with zero padding', () => {
    expect(formatLogTimestamp(date)).toBe('2024-01-05 09:03:07');
  });

  it('formats one metering line per call', () => {
    expect(
      formatUsageLine(date, MeteredCall.Summarizer, {
        inputTokens: 310,
        cachedTokens: 0,
        outputTokens: 84,
      }),
    ).toBe(
      '2024-01-05 09:03:07 : Summarizer Input / Cached / Output tokens: 310 / 0 / 84\n',
    );
  });
});
