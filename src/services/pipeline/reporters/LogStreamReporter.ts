import { describeError } from '../../../utils/errors.js';
import type { PipelineEvent, PipelineReporter } from '../events.js';

const pad = (value: number): string => String(value).padStart(2, '0');

export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/** Collects a human-readable log of one run, for front ends that show it after the fact. */
export class LogStreamReporter implements PipelineReporter {
  private lines: string[] = [];

  emit(event: PipelineEvent): void {
    const level = event.type === 'error' ? 'ERROR' : 'INFO';
    const message = event.type === 'error' ? describeError(event.error) : event.message;
    this.lines.push(`${formatTime(event.at)} - ${level} - ${message}`);
  }

  getLines(): string[] {
    return [...this.lines];
  }

  toString(): string {
    return this.lines.join('\n');
  }
}
