import { format, isValid, parse } from 'date-fns';
import { InvalidTimeError } from './errors.js';

export type SnapshotTimeFormat = 'date' | 'datetime' | 'spaced';

export interface SnapshotTime {
  format: SnapshotTimeFormat;
  input: string;
  // Local wall-clock time as typed, normalized once here
  date: Date;
}

const PATTERNS: ReadonlyArray<{ format: SnapshotTimeFormat; pattern: string }> = [
  { format: 'date', pattern: 'yyyy-MM-dd' },
  { format: 'datetime', pattern: "yyyy-MM-dd'T'HH:mm:ss" },
  { format: 'spaced', pattern: 'yyyy-MM-dd HH:mm:ss' },
];

// date-fns takes 1-4 digit years; the year must be written in full
const SHAPE = /^\d{4}-\d{1,2}-\d{1,2}(?:[T ]\d{1,2}:\d{1,2}:\d{1,2})?$/;

export const ACCEPTED_TIME_FORMATS = ['YYYY-MM-DD', 'YYYY-MM-DDTHH:mm:ss', 'YYYY-MM-DD HH:mm:ss'];

export function parseSnapshotTime(text: string): SnapshotTime {
  const input = text.trim();
  const reference = new Date();
  const candidates = SHAPE.test(input) ? PATTERNS : [];
  for (const { format: kind, pattern } of candidates) {
    const date = parse(input, pattern, reference);
    if (isValid(date)) {
      return { format: kind, input, date };
    }
  }
  throw new InvalidTimeError(
    `Invalid time "${text}". Accepted formats: ${ACCEPTED_TIME_FORMATS.join(', ')}`,
  );
}

export function describeSnapshotTime(time: SnapshotTime | undefined): string {
  if (!time) return 'Now';
  return time.format === 'date'
    ? format(time.date, 'yyyy-MM-dd')
    : format(time.date, 'yyyy-MM-dd HH:mm:ss');
}
