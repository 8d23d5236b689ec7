import type { PipelineEvent, PipelineReporter } from '../events.js';

export class CompositeReporter implements PipelineReporter {
  private reporters: PipelineReporter[];

  constructor(...reporters: PipelineReporter[]) {
    this.reporters = reporters;
  }

  emit(event: PipelineEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event);
    }
  }
}
