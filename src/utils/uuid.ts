import { v4 as uuidv4 } from 'uuid';

export function generateId(prefix?: string): string {
  const id = uuidv4();
  return prefix ? `${prefix}-${id}` : id;
}

/** Short id used to correlate the log lines of one extraction run. */
export function generateRunId(): string {
  return generateId('run').slice(0, 12);
}
