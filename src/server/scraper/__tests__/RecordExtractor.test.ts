import { describe, test, expect } from 'vitest';
import { RecordExtractor } from '../RecordExtractor.js';
import { NoContainersError } from '../types/errors.js';
import { DEFAULT_STRATEGIES, UNAVAILABLE_CONTENT, UNKNOWN_IDENTITY } from '../strategies.js';
import { COMMENTS_HTML, DomSurface, recordingLogger } from './helpers/DomSurface.js';

const ITEM = 'https://example.com/@creator/video/1';
const FIXED_NOW = new Date('2024-05-01T10:00:00.000Z');

describe('RecordExtractor', () => {
  test('extracts records with the preferred strategy', async () => {
    const surface = new DomSurface(COMMENTS_HTML);
    const extractor = new RecordExtractor(surface, { now: () => FIXED_NOW });

    const records = await extractor.extractAll(ITEM);

    expect(records).toEqual([
      { sequence: 1, itemId: ITEM, identity: 'alice', content: 'First!', metric: 1500, extractedAt: '2024-05-01T10:00:00.000Z' },
      { sequence: 2, itemId: ITEM, identity: 'bob', content: 'Nice video', metric: 1200, extractedAt: '2024-05-01T10:00:00.000Z' },
      { sequence: 3, itemId: ITEM, identity: 'carol', content: 'Where is this?', metric: 0, extractedAt: '2024-05-01T10:00:00.000Z' },
    ]);
  });

  test('records are frozen', async () => {
    const surface = new DomSurface(COMMENTS_HTML);
    const [record] = await new RecordExtractor(surface).extractAll(ITEM);
    expect(Object.isFrozen(record)).toBe(true);
  });

  test('falls back to container text without the user name', async () => {
    const surface = new DomSurface(`
      <div class="comment-item"><a class="username">dave</a> totally agree dave</div>
    `);
    const [record] = await new RecordExtractor(surface).extractAll(ITEM);

    expect(record.identity).toBe('dave');
    expect(record.content).toBe('totally agree');
    expect(record.metric).toBe(0);
  });

  test('uses placeholders when fields are missing', async () => {
    const surface = new DomSurface('<div class="comment-item"><img src="x.png"></div>');
    const [record] = await new RecordExtractor(surface).extractAll(ITEM);

    expect(record.identity).toBe(UNKNOWN_IDENTITY);
    expect(record.content).toBe(UNAVAILABLE_CONTENT);
  });

  test('uses generic fallbacks inside the resolved strategy', async () => {
    const surface = new DomSurface(`
      <div data-e2e="comment-item">
        <a href="/@erin">erin</a>
        <div class="comment-content">great</div>
        <button data-testid="like-button">32</button>
      </div>
    `);
    const [record] = await new RecordExtractor(surface).extractAll(ITEM);

    expect(record).toMatchObject({ identity: 'erin', content: 'great', metric: 32 });
  });

  test('skips a container that throws and keeps the rest', async () => {
    const surface = new DomSurface(COMMENTS_HTML);
    const broken = surface.document.querySelectorAll('[data-e2e="comment-username"]')[1];
    surface.brokenElements.add(broken);
    const logger = recordingLogger();

    const result = await new RecordExtractor(surface, { logger }).extract(ITEM);

    expect(result.containerCount).toBe(3);
    expect(result.skipped).toBe(1);
    expect(result.records.map((r) => [r.sequence, r.identity])).toEqual([
      [1, 'alice'],
      [3, 'carol'],
    ]);
    expect(logger.debug).toHaveBeenCalledWith('Skipped container 2: Element is not attached to the DOM');
  });

  test('re-extracting an unchanged page differs only in timestamps', async () => {
    const surface = new DomSurface(COMMENTS_HTML);
    const first = await new RecordExtractor(surface, { now: () => new Date('2024-05-01T10:00:00Z') }).extractAll(ITEM);
    const second = await new RecordExtractor(surface, { now: () => new Date('2024-05-01T11:30:00Z') }).extractAll(ITEM);

    const withoutTime = (records: typeof first) => records.map(({ extractedAt: _, ...rest }) => rest);
    expect(withoutTime(second)).toEqual(withoutTime(first));
    expect(second[0].extractedAt).not.toBe(first[0].extractedAt);
  });

  test('throws when no strategy matches', async () => {
    const surface = new DomSurface('<p>nothing</p>');
    await expect(new RecordExtractor(surface).extractAll(ITEM)).rejects.toThrow(NoContainersError);
  });

  test('honors a custom strategy list', async () => {
    const surface = new DomSurface(COMMENTS_HTML);
    const custom = { name: 'custom', container: '#comments > div', identity: 'a', content: 'p', metric: 'span' };
    const result = await new RecordExtractor(surface, { strategies: [custom, ...DEFAULT_STRATEGIES] }).extract(ITEM);

    expect(result.strategy.name).toBe('custom');
    expect(result.records.map((r) => r.metric)).toEqual([1500, 1200, 0]);
  });
});
