/**
 * CLI Command Tests
 *
 * Runs the report and sequence commands against datasets written to a
 * temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { reportCommand } from '../../../cli/commands/report.js';
import { sequenceCommand, sequenceEntries } from '../../../cli/commands/sequence.js';
import { DEFAULT_CONFIG, type CLIConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { createCLILogger, type CLILogger } from '../../../cli/lib/logger.js';
import type { OutputFormat } from '../../../cli/lib/output.js';
import { InputValidationError } from '../../../core/errors.js';
import {
  TEST_PROFILE_DEFINITION,
  designItem,
  engineeringDataset,
  engineeringLocation,
  photo,
  poleNode,
  surveyDataset,
  surveyWire,
  testProfile,
  trace,
} from '../../utils/builders.js';

const survey = surveyDataset({
  nodes: { n1: poleNode({ poleNumber: 'PL1001', photoIds: ['p1'] }) },
  photos: { p1: photo([surveyWire('t2', 300)]) },
  traces: { t2: trace({ company: 'Provider', cableType: 'Fiber' }) },
});

const engineering = engineeringDataset([
  engineeringLocation(
    'PL1001',
    {
      wires: [
        designItem({ id: 'w1', owner: 'Utility', type: 'Neutral', heightIn: 336 }),
        designItem({ id: 'w2', owner: 'Provider', type: 'Fiber', heightIn: 300 }),
      ],
    },
    {
      wires: [
        designItem({ id: 'w1', owner: 'Utility', type: 'Neutral', heightIn: 336 }),
        designItem({ id: 'w2', owner: 'Provider', type: 'Fiber', heightIn: 290 }),
      ],
    }
  ),
  engineeringLocation('PL1002', {}, {}),
]);

describe('CLI commands', () => {
  let tempDir: string;
  let lines: string[];
  let logger: CLILogger;

  function configFor(format: OutputFormat): CLIConfig {
    return {
      ...DEFAULT_CONFIG,
      profile: join(tempDir, 'profile.json'),
      format,
      verbose: false,
      json: true,
      configPath: null,
    };
  }

  beforeEach(async () => {
    tempDir = join(tmpdir(), `make-ready-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(tempDir, { recursive: true });
    await writeFile(join(tempDir, 'profile.json'), JSON.stringify(TEST_PROFILE_DEFINITION));
    await writeFile(join(tempDir, 'survey.json'), JSON.stringify(survey));
    await writeFile(join(tempDir, 'engineering.json'), JSON.stringify(engineering));
    lines = [];
    logger = createCLILogger({ json: true, sink: (_level, line) => lines.push(line) });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('reportCommand', () => {
    it('should write spreadsheet rows as CSV', async () => {
      const output = join(tempDir, 'rows.csv');

      const exitCode = await reportCommand(
        join(tempDir, 'survey.json'),
        join(tempDir, 'engineering.json'),
        { rows: true, output },
        configFor('csv'),
        logger
      );

      const csv = (await readFile(output, 'utf-8')).split('\n');
      expect(exitCode).toBe(EXIT_CODES.SUCCESS);
      expect(csv[0]).toBe('Pole,Row,Description,Existing,Proposed,Midspan,Style');
      expect(csv[2]).toBe(`PL1001,attachment,PROVIDER Fiber,"25'-0""","24'-2""",N/A,`);
      expect(csv).toHaveLength(4);
    });

    it('should exit with warnings for a survey-only run', async () => {
      const output = join(tempDir, 'report.json');

      const exitCode = await reportCommand(join(tempDir, 'survey.json'), undefined, { output }, configFor('json'), logger);

      const written: unknown = JSON.parse(await readFile(output, 'utf-8'));
      expect(exitCode).toBe(EXIT_CODES.WARNINGS);
      expect(written).toMatchObject({
        warnings: [
          'No engineering dataset supplied; running survey-only',
          'No neutral wire found for pole PL1001; attachments are not filtered',
        ],
      });
      expect(lines.some((line) => line.includes('"message":"Starting report"'))).toBe(true);
    });

    it('should reject a survey file that is not JSON', async () => {
      await writeFile(join(tempDir, 'broken.json'), '{ nodes: ');

      await expect(
        reportCommand(join(tempDir, 'broken.json'), undefined, {}, configFor('json'), logger)
      ).rejects.toBeInstanceOf(InputValidationError);
    });
  });

  describe('sequence', () => {
    it('should number poles in visitation order', () => {
      expect(sequenceEntries(engineering, testProfile())).toEqual([
        { operation: 1, poleId: '1001', label: 'PL1001' },
        { operation: 2, poleId: '1002', label: 'PL1002' },
      ]);
    });

    it('should exit with warnings when there are no poles', async () => {
      await writeFile(join(tempDir, 'empty.json'), JSON.stringify(engineeringDataset([])));
      const output = join(tempDir, 'sequence.txt');

      const exitCode = await sequenceCommand(join(tempDir, 'empty.json'), { output }, configFor('table'), logger);

      expect(exitCode).toBe(EXIT_CODES.WARNINGS);
      expect(await readFile(output, 'utf-8')).toBe('No entries found.\n');
    });
  });
});
