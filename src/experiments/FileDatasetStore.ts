/**
 * File Dataset Store
 *
 * Keeps each dataset version as `<root>/<name>/v<N>.json`. Versions are
 * append-only; a push never rewrites an existing version.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ConsolidatedForm } from '../types/forms.js';
import type { DatasetRecord, DatasetStore } from './types.js';
import { logger } from '../utils/logger.js';

const nullableString = z.string().nullable().default(null);
const nullableCount = z.number().int().nullable().default(null);

export const ConsolidatedFormSchema = z.object({
  formInfo: z
    .object({
      formType: z.enum(['Constituency', 'PartyList']).nullable().default(null),
      date: nullableString,
      province: nullableString,
      district: nullableString,
      subDistrict: nullableString,
      constituencyNumber: nullableString,
      pollingStationNumber: nullableString,
    })
    .default({}),
  voterStatistics: z
    .object({
      eligibleVoters: nullableCount,
      votersPresent: nullableCount,
    })
    .default({}),
  ballotStatistics: z
    .object({
      ballotsAllocated: nullableCount,
      ballotsUsed: nullableCount,
      validBallots: nullableCount,
      voidBallots: nullableCount,
      noVoteBallots: nullableCount,
      ballotsRemaining: nullableCount,
    })
    .default({}),
  voteRows: z
    .array(
      z.object({
        number: z.number().int(),
        candidateName: nullableString,
        partyName: nullableString,
        voteCount: nullableCount,
        voteCountText: nullableString,
      })
    )
    .default([]),
  sourcePages: z.array(z.number().int()).default([]),
});

export const DatasetRecordSchema = z.object({
  id: z.string().min(1),
  input: z.object({
    formSetName: z.string(),
    imagePaths: z.array(z.string()),
  }),
  expected: ConsolidatedFormSchema,
});

const DatasetFileSchema = z.object({
  name: z.string(),
  version: z.number().int().positive(),
  createdAt: z.string(),
  records: z.array(DatasetRecordSchema),
});

const VERSION_FILE = /^v(\d+)\.json$/;
const DATASET_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export class DatasetNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetNotFoundError';
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class FileDatasetStore implements DatasetStore {
  private readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  async listVersions(name: string): Promise<number[]> {
    this.assertName(name);
    let entries: string[];
    try {
      entries = await fs.readdir(path.join(this.root, name));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    return entries
      .map(entry => VERSION_FILE.exec(entry))
      .filter((match): match is RegExpExecArray => match !== null)
      .map(match => Number(match[1]))
      .sort((a, b) => a - b);
  }

  async pull(name: string, version?: number): Promise<readonly DatasetRecord[]> {
    const versions = await this.listVersions(name);
    if (versions.length === 0) {
      throw new DatasetNotFoundError(`Dataset not found: ${name}`);
    }

    const selected = version ?? versions[versions.length - 1];
    if (!versions.includes(selected)) {
      throw new DatasetNotFoundError(`Dataset ${name} has no version ${selected} (available: ${versions.join(', ')})`);
    }

    const filePath = this.versionPath(name, selected);
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    const parsed = DatasetFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid dataset file ${filePath}: ${parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    }

    const records: DatasetRecord[] = parsed.data.records.map(record => ({
      id: record.id,
      input: record.input,
      expected: record.expected satisfies ConsolidatedForm,
    }));

    logger.debug(`Pulled ${records.length} record(s) from ${name}@v${selected}`);
    return deepFreeze(records);
  }

  async push(name: string, records: readonly DatasetRecord[]): Promise<string> {
    this.assertName(name);

    const validated = z.array(DatasetRecordSchema).parse(records);
    const ids = new Set<string>();
    for (const record of validated) {
      if (ids.has(record.id)) {
        throw new Error(`Duplicate record id in dataset ${name}: ${record.id}`);
      }
      ids.add(record.id);
    }

    const versions = await this.listVersions(name);
    const version = (versions[versions.length - 1] ?? 0) + 1;

    await fs.mkdir(path.join(this.root, name), { recursive: true });
    const content = {
      name,
      version,
      createdAt: new Date().toISOString(),
      records: validated,
    };
    // "wx" keeps a concurrent push from overwriting the same version
    await fs.writeFile(this.versionPath(name, version), JSON.stringify(content, null, 2), { flag: 'wx' });

    const datasetId = `${name}@v${version}`;
    logger.info(`Stored dataset ${datasetId} with ${validated.length} record(s)`);
    return datasetId;
  }

  private versionPath(name: string, version: number): string {
    return path.join(this.root, name, `v${version}.json`);
  }

  private assertName(name: string): void {
    if (!DATASET_NAME.test(name)) {
      throw new Error(`Invalid dataset name: "${name}"`);
    }
  }
}
