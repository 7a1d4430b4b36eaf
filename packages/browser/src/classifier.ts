import { ClassificationError, PageStatus, createLogger } from '@slotwatch/core';
import type { Logger, StatusClassifier } from '@slotwatch/core';

import type { MarkerSets } from './types.js';

function normalize(markers: readonly string[]): string[] {
  return markers.map((m) => m.trim().toLowerCase()).filter((m) => m.length > 0);
}

/**
 * Classifies page content by case-insensitive substring markers.
 *
 * Precedence: captcha, then block, then negative ("no slots") markers. A
 * page matching none of them is optimistically MAYBE_SLOTS.
 */
export class MarkerClassifier implements StatusClassifier {
  private readonly captcha: readonly string[];
  private readonly block: readonly string[];
  private readonly negative: readonly string[];
  private readonly log: Logger;

  constructor(markers: MarkerSets, logger?: Logger) {
    this.captcha = normalize(markers.captcha);
    this.block = normalize(markers.block);
    this.negative = normalize(markers.negative);
    this.log = logger ?? createLogger('classifier');
  }

  classify(content: string): PageStatus {
    try {
      const text = content.toLowerCase();
      if (this.captcha.some((m) => text.includes(m))) return PageStatus.CAPTCHA;
      if (this.block.some((m) => text.includes(m))) return PageStatus.BLOCKED;
      if (this.negative.some((m) => text.includes(m))) return PageStatus.NO_SLOTS;
      return PageStatus.MAYBE_SLOTS;
    } catch (err) {
      this.log.error('classification error', undefined, new ClassificationError('marker matching failed', err));
      return PageStatus.OK;
    }
  }
}
