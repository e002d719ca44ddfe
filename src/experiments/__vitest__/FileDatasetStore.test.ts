/**
 * Test file for FileDatasetStore
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DatasetNotFoundError, DatasetRecordSchema, FileDatasetStore } from '../FileDatasetStore.js';
import type { DatasetRecord } from '../types.js';
import { form, validConstituencyForm } from '../../__vitest__/fixtures.js';

function record(id: string, expected = validConstituencyForm()): DatasetRecord {
  return { id, input: { formSetName: id, imagePaths: [`${id}/p1.png`] }, expected };
}

describe('FileDatasetStore', () => {
  let root: string;
  let store: FileDatasetStore;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'datasets-'));
    store = new FileDatasetStore(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('stores a new version on every push', async () => {
    expect(await store.push('stations', [record('r1')])).toBe('stations@v1');
    expect(await store.push('stations', [record('r1'), record('r2')])).toBe('stations@v2');

    expect(await store.listVersions('stations')).toEqual([1, 2]);
    expect(fs.existsSync(path.join(root, 'stations', 'v2.json'))).toBe(true);
  });

  it('pulls the latest version unless one is named', async () => {
    await store.push('stations', [record('r1')]);
    await store.push('stations', [record('r1'), record('r2')]);

    expect((await store.pull('stations')).map(r => r.id)).toEqual(['r1', 'r2']);
    expect((await store.pull('stations', 1)).map(r => r.id)).toEqual(['r1']);
  });

  it('round-trips expected forms unchanged', async () => {
    await store.push('stations', [record('r1')]);

    const [pulled] = await store.pull('stations');

    expect(pulled.expected).toEqual(validConstituencyForm());
  });

  it('returns read-only records', async () => {
    await store.push('stations', [record('r1')]);

    const records = await store.pull('stations');

    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0].expected.voteRows[0])).toBe(true);
  });

  it('fails for a missing dataset or version', async () => {
    await expect(store.pull('nothing-here')).rejects.toThrow(DatasetNotFoundError);

    await store.push('stations', [record('r1')]);
    await expect(store.pull('stations', 7)).rejects.toThrow('Dataset stations has no version 7 (available: 1)');
  });

  it('rejects duplicate record ids', async () => {
    await expect(store.push('stations', [record('r1'), record('r1')])).rejects.toThrow(
      'Duplicate record id in dataset stations: r1'
    );
    expect(await store.listVersions('stations')).toEqual([]);
  });

  it('rejects dataset names that are not plain', async () => {
    await expect(store.push('../escape', [record('r1')])).rejects.toThrow('Invalid dataset name: "../escape"');
  });

  it('reports a corrupted version file', async () => {
    fs.mkdirSync(path.join(root, 'stations'));
    fs.writeFileSync(path.join(root, 'stations', 'v1.json'), JSON.stringify({ name: 'stations', records: [] }));

    await expect(store.pull('stations')).rejects.toThrow(/^Invalid dataset file .*v1\.json: version: Required/);
  });
});

describe('DatasetRecordSchema', () => {
  it('fills omitted form fields with nulls', () => {
    const parsed = DatasetRecordSchema.parse({
      id: 'r1',
      input: { formSetName: 'r1', imagePaths: [] },
      expected: { ballotStatistics: { ballotsUsed: 5 } },
    });

    expect(parsed.expected).toEqual(form({ ballotStatistics: { ballotsUsed: 5 } }));
  });
});
