import { describe, it, expect } from 'vitest';
import { PageStatus } from '@slotwatch/core';
import { captureLogs } from '@slotwatch/test-utils';

import { MarkerClassifier } from '../src/classifier.js';

const markers = {
  negative: ['no appointment', 'no slots'],
  captcha: ['captcha', 'are you human'],
  block: ['too many requests', '429'],
};

describe('MarkerClassifier', () => {
  const classifier = new MarkerClassifier(markers, captureLogs().logger);

  it.each([
    ['<p>Please solve the CAPTCHA</p>', PageStatus.CAPTCHA],
    ['<h1>429 Too Many Requests</h1>', PageStatus.BLOCKED],
    ['<div>No appointment available</div>', PageStatus.NO_SLOTS],
    ['<div>Pick a date below</div>', PageStatus.MAYBE_SLOTS],
    ['', PageStatus.MAYBE_SLOTS],
  ])('classifies %j as %s', (content, expected) => {
    expect(classifier.classify(content)).toBe(expected);
  });

  it('prefers captcha over block over negative markers', () => {
    expect(classifier.classify('captcha 429 no slots')).toBe(PageStatus.CAPTCHA);
    expect(classifier.classify('429 no slots')).toBe(PageStatus.BLOCKED);
  });

  it('normalizes marker case and whitespace and drops empty markers', () => {
    const loose = new MarkerClassifier(
      { negative: ['  NO Slots ', ''], captcha: [], block: [] },
      captureLogs().logger,
    );

    expect(loose.classify('there are no slots today')).toBe(PageStatus.NO_SLOTS);
    expect(loose.classify('calendar')).toBe(PageStatus.MAYBE_SLOTS);
  });

  it('returns OK when matching itself fails', () => {
    // map() and filter() keep the subclass, so the normalized list throws too
    class ExplodingMarkers extends Array<string> {
      override some(): boolean {
        throw new Error('boom');
      }
    }
    const logs = captureLogs();
    const exploding = new MarkerClassifier(
      { negative: [], captcha: ExplodingMarkers.from(['x']), block: [] },
      logs.logger,
    );

    expect(exploding.classify('anything')).toBe(PageStatus.OK);
    expect(logs.withMessage('classification error')).toEqual([
      expect.objectContaining({
        level: 'error',
        error: expect.objectContaining({ name: 'ClassificationError', message: 'marker matching failed' }),
      }),
    ]);
  });
});
