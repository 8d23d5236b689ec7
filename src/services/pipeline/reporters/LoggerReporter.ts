import type { Logger } from 'pino';
import type { PipelineEvent, PipelineReporter } from '../events.js';

export class LoggerReporter implements PipelineReporter {
  constructor(private log: Logger) {}

  emit(event: PipelineEvent): void {
    if (event.type === 'error') {
      this.log.error({ stage: event.stage, error: event.error }, event.message);
    } else {
      this.log.debug({ stage: event.stage, event: event.type }, event.message);
    }
  }
}
