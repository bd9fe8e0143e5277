import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { TaxonomyIndex } from '../src/taxonomies/taxonomy-index';

jest.mock('node:fs', () => {
  const actual = jest.requireActual<typeof import('node:fs')>('node:fs');
  const mockPath = jest.requireActual<typeof import('node:path')>('node:path');
  return {
    ...actual,
    readdirSync: (...args: Parameters<typeof actual.readdirSync>) => {
      if (mockPath.basename(String(args[0])) === 'locked') {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${String(args[0])}'`), {
          code: 'EACCES',
        });
      }
      return actual.readdirSync(...args);
    },
  };
});

describe('TaxonomyIndex.load with an unreadable skills directory', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), 'taxonomy-locked-'));
    mkdirSync(path.join(root, 'skills', 'locked'), { recursive: true });
    writeFileSync(
      path.join(root, 'skills', 'audio.json'),
      JSON.stringify({ name: 'audio', caption: 'Audio', uid: 5, extends: 'base_skill' })
    );
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('skips the directory with a warning and keeps loading', () => {
    const logger = jest.fn();
    const lockedDir = path.join(root, 'skills', 'locked');
    const { index, warnings } = TaxonomyIndex.load(root, { logger });

    expect(index.hasSkill('audio')).toBe(true);
    expect(warnings).toEqual([
      {
        code: 'SKILL_FILE_INVALID',
        path: lockedDir,
        message: `Failed loading taxonomy file ${lockedDir} (unreadable directory): EACCES: permission denied, scandir '${lockedDir}'`,
      },
    ]);
    expect(logger).toHaveBeenCalledWith('taxonomy:file-skipped', {
      path: lockedDir,
      reason: warnings[0].message,
    });
  });
});
