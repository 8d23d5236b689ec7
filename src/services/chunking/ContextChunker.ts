import { get_encoding, type Tiktoken } from 'tiktoken';
import { logger } from '../../utils/logger.js';
import { InvalidTemplateError } from '../../utils/errors.js';

export interface ContextWindow {
  index: number;
  zhText: string;
  enText: string;
  tokens: number;
}

const BOUNDARIES = ['\n\n', '\n', ' '];

/**
 * Keeps each model call inside the context budget. Parallel documents are cut
 * into the same number of windows at proportional positions so that window i
 * of the Chinese text roughly covers the same content as window i of the
 * English text.
 */
export class ContextChunker {
  private encoder: Tiktoken;

  /** `budgetTokens` of 0 disables chunking. */
  constructor(private budgetTokens: number) {
    this.encoder = get_encoding('cl100k_base');
  }

  countTokens(text: string): number {
    return this.encoder.encode(text, 'all').length;
  }

  planWindows(zhText: string, enText: string, overheadTokens = 0): ContextWindow[] {
    if (this.budgetTokens === 0) {
      return [{ index: 0, zhText, enText, tokens: 0 }];
    }

    const available = this.budgetTokens - overheadTokens;
    if (available <= 0) {
      throw new InvalidTemplateError(
        `Template needs ${overheadTokens} tokens, leaving no room within the ${this.budgetTokens} token budget`
      );
    }

    const total = this.countTokens(zhText) + this.countTokens(enText);
    if (total <= available) {
      return [{ index: 0, zhText, enText, tokens: total }];
    }

    const maxParts = Math.max(zhText.length, enText.length, 1);
    let parts = Math.ceil(total / available);

    while (parts <= maxParts) {
      const zhParts = this.splitInto(zhText, parts);
      const enParts = this.splitInto(enText, parts);
      const windows = zhParts.map((zh, index) => {
        const en = enParts[index] ?? '';
        return { index, zhText: zh, enText: en, tokens: this.countTokens(zh) + this.countTokens(en) };
      });

      if (windows.every(window => window.tokens <= available)) {
        logger.info(
          { windows: windows.length, totalTokens: total, availableTokens: available },
          'Texts exceed context budget, split into parallel windows'
        );
        return windows;
      }
      parts++;
    }

    logger.warn({ totalTokens: total, availableTokens: available }, 'Could not fit windows into budget');
    const enParts = this.splitInto(enText, maxParts);
    return this.splitInto(zhText, maxParts).map((zh, index) => {
      const en = enParts[index] ?? '';
      return { index, zhText: zh, enText: en, tokens: this.countTokens(zh) + this.countTokens(en) };
    });
  }

  /** Cuts `text` into exactly `parts` pieces, snapping cuts to paragraph, line or word breaks. */
  splitInto(text: string, parts: number): string[] {
    if (parts <= 1) return [text];

    const span = Math.max(1, Math.floor(text.length / (2 * parts)));
    const cuts: number[] = [];
    let previous = 0;

    for (let i = 1; i < parts; i++) {
      const target = Math.round((text.length * i) / parts);
      let cut = this.snap(text, target, span);
      if (cut <= previous || cut >= text.length) {
        cut = Math.max(previous + 1, Math.min(target, text.length));
      }
      cuts.push(cut);
      previous = cut;
    }

    const pieces: string[] = [];
    let start = 0;
    for (const cut of [...cuts, text.length]) {
      pieces.push(text.slice(start, cut).trim());
      start = cut;
    }
    return pieces;
  }

  private snap(text: string, target: number, span: number): number {
    for (const boundary of BOUNDARIES) {
      const before = text.lastIndexOf(boundary, target);
      const after = text.indexOf(boundary, target);
      const candidates = [before, after].filter(pos => pos >= 0 && Math.abs(pos - target) <= span);
      if (candidates.length > 0) {
        const nearest = candidates.reduce((a, b) => (Math.abs(a - target) <= Math.abs(b - target) ? a : b));
        return nearest + boundary.length;
      }
    }
    return target;
  }

  dispose(): void {
    this.encoder.free();
  }
}
