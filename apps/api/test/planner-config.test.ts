import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { DEFAULT_PLANNER_CONFIG_PATH } from '../src/config/env';
import { loadPlannerConfig } from '../src/config/planner';
import { ConfigurationError } from '../src/errors';

describe('loadPlannerConfig', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'planner-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('loads the bundled data file', async () => {
    const config = await loadPlannerConfig(DEFAULT_PLANNER_CONFIG_PATH);

    expect(config.parents.map(p => p.id)).toEqual(['sam', 'jo', 'fran', 'chris']);
    expect(config.journeys.primaryChildId).toBe('ada');
    expect(config.optimizer).toEqual({ variableChildId: 'ada', fixedChildIds: ['bea', 'cal'] });
  });

  it('rejects a missing file', async () => {
    const path = join(dir, 'missing.json');

    await expect(loadPlannerConfig(path)).rejects.toThrow(`Cannot read planner config ${path}`);
  });

  it('rejects malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "parents": [', 'utf8');

    await expect(loadPlannerConfig(path)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('lists cross-reference problems', async () => {
    const path = join(dir, 'planner.json');
    await writeFile(
      path,
      JSON.stringify({
        timezone: 'UTC',
        parents: [],
        schools: [],
        children: [],
        journeys: { primaryChildId: 'ada' },
        optimizer: { variableChildId: 'ada' },
      }),
      'utf8'
    );

    await expect(loadPlannerConfig(path)).rejects.toMatchObject({
      problems: ['journeys.primaryChildId=ada is unknown', 'optimizer.variableChildId=ada is unknown'],
    });
  });
});
