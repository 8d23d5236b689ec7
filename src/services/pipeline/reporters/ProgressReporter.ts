import { STAGE_LABELS, type PipelineEvent, type PipelineReporter } from '../events.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

export class ProgressReporter implements PipelineReporter {
  private enabled: boolean;
  private lastLineLength: number = 0;

  constructor(enabled: boolean = true, private out: NodeJS.WritableStream & { isTTY?: boolean } = process.stdout) {
    this.enabled = enabled && Boolean(out.isTTY);
  }

  emit(event: PipelineEvent): void {
    switch (event.type) {
      case 'stage-start':
        this.update(event);
        break;
      case 'stage-end':
        this.complete(event.message);
        break;
      case 'error':
        this.error(`${STAGE_LABELS[event.stage]}: ${event.message}`);
        break;
    }
  }

  private update(event: PipelineEvent): void {
    if (!this.enabled) return;

    this.clearLine();
    const stage = fmt('cyan', `[${STAGE_LABELS[event.stage]}]`);
    const line = `${stage} ${fmt('dim', event.message)}`;
    this.out.write(line);
    this.lastLineLength = line.length;
  }

  private complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(fmt('green', '✓') + ` ${message}\n`);
  }

  private error(message: string): void {
    this.clearLine();
    this.out.write(fmt('red', '✗') + ` ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.out.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
