import type { TokenUsage } from '../../annotation/interfaces/annotation-provider.interface';
import type { MeteredCall } from '../../annotation/interfaces/pipeline-stage.enum';

const pad = (value: number) => String(value).padStart(2, '0');

export const formatLogTimestamp = (date: Date) =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatUsageLine = (
  date: Date,
  call: MeteredCall,
  usage: TokenUsage,
) =>
  `${formatLogTimestamp(date)} : ${call} Input / Cached / Output tokens: ` +
  `${usage.inputTokens} / ${usage.cachedTokens} / ${usage.outputTokens}\n`;
