import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Telemetry } from '../observability/telemetry.js';
import { loadCatalog, parseCatalogJson, toCardRecord } from './catalog.js';

const TSV_HEADER = 'Category1\tCategory2\tName\tText\tShortText\tURL';

let workDir = '';

const createTelemetrySpy = () => ({
  recordAction: vi.fn(),
  recordTransition: vi.fn(),
  recordFailure: vi.fn(),
}) satisfies Telemetry;

const pathsIn = (dir: string) => ({
  cardsJsonPath: join(dir, 'cards.json'),
  cardsTsvPath: join(dir, 'cards.tsv'),
});

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), 'suit-draw-catalog-'));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe('toCardRecord', () => {
  it('trims strings, stringifies numbers and blanks everything else', () => {
    expect(toCardRecord({ Category1: ' Tool ', Name: 42, Text: null, URL: ['x'] })).toEqual({
      Category1: 'Tool',
      Category2: '',
      Name: '42',
      Text: '',
      ShortText: '',
      URL: '',
    });
  });

  it('turns a non-object entry into a blank card', () => {
    expect(toCardRecord('Tool')).toEqual({
      Category1: '',
      Category2: '',
      Name: '',
      Text: '',
      ShortText: '',
      URL: '',
    });
  });
});

describe('parseCatalogJson', () => {
  it('treats a non-array document as an empty catalog', () => {
    expect(parseCatalogJson('{"cards": []}')).toEqual([]);
  });

  it('keeps entry order so indexes line up with the file', () => {
    const cards = parseCatalogJson('[{"Name":"first","Category1":"Tool"}, 7, {"Name":"third"}]');
    expect(cards.map((card) => card.Name)).toEqual(['first', '', 'third']);
    expect(cards[0].Category1).toBe('Tool');
  });
});

describe('loadCatalog', () => {
  it('prefers cards.json over cards.tsv', () => {
    const paths = pathsIn(workDir);
    writeFileSync(paths.cardsJsonPath, JSON.stringify([{ Category1: 'Tool', Name: 'from json' }]));
    writeFileSync(paths.cardsTsvPath, `${TSV_HEADER}\nTool\t\tfrom tsv\t\t\t\n`);

    const catalog = loadCatalog(paths);
    expect(catalog.source).toBe('json');
    expect(catalog.cards.map((card) => card.Name)).toEqual(['from json']);
  });

  it('falls back to cards.tsv', () => {
    const paths = pathsIn(workDir);
    writeFileSync(paths.cardsTsvPath, `${TSV_HEADER}\nWorkshop\t\tPaper prototype\tSketch it.\tSketch\thttps://example.org/p\n`);

    expect(loadCatalog(paths)).toEqual({
      source: 'tsv',
      cards: [
        {
          Category1: 'Workshop',
          Category2: '',
          Name: 'Paper prototype',
          Text: 'Sketch it.',
          ShortText: 'Sketch',
          URL: 'https://example.org/p',
        },
      ],
    });
  });

  it('returns an empty catalog and records the absence when no source exists', () => {
    const telemetry = createTelemetrySpy();
    const paths = pathsIn(workDir);

    expect(loadCatalog(paths, telemetry)).toEqual({ cards: [], source: 'none' });
    expect(telemetry.recordAction).toHaveBeenCalledWith('CATALOG_MISSING', paths);
  });

  it('returns an empty catalog and records the failure when cards.json is unreadable', () => {
    const telemetry = createTelemetrySpy();
    const paths = pathsIn(workDir);
    writeFileSync(paths.cardsJsonPath, '[{"Name": ');

    expect(loadCatalog(paths, telemetry)).toEqual({ cards: [], source: 'none' });
    expect(telemetry.recordFailure).toHaveBeenCalledTimes(1);
    expect(telemetry.recordFailure.mock.calls[0][0]).toBe('CATALOG_LOAD');
  });
});
