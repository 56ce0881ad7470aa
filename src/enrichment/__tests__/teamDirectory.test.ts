import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { TeamDirectory } from '../teamDirectory.js';

const EXAMPLE_PATH = fileURLToPath(new URL('../../../data/team-directory.example.json', import.meta.url));

describe('TeamDirectory', () => {
  it('looks owners up by normalized name', async () => {
    const directory = await TeamDirectory.load(EXAMPLE_PATH);
    expect(directory.size).toBe(3);
    expect(directory.lookup('  asha   RAO ')).toEqual({
      email: 'asha.rao@example.com',
      manager: 'Vikram Shah',
      team: 'West',
      managerEmail: 'vikram.shah@example.com',
    });
    expect(directory.lookup('Someone Else')).toBeNull();
  });

  it('leaves the manager email empty when the manager is unknown', () => {
    const directory = TeamDirectory.fromJson({
      members: { Kiran: { email: 'kiran@example.com', manager: 'Nobody', team: 'East' } },
    });
    expect(directory.lookup('kiran')?.managerEmail).toBe('');
  });

  it('skips malformed member entries', () => {
    const directory = TeamDirectory.fromJson({ members: { A: 'not an object', B: { email: 5 } } });
    expect(directory.size).toBe(1);
    expect(directory.lookup('B')).toEqual({ email: '', manager: '', team: '', managerEmail: '' });
  });

  it('is empty when the file is missing or invalid', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'team-test-'));
    try {
      expect((await TeamDirectory.load(path.join(dir, 'missing.json'))).size).toBe(0);
      const invalid = path.join(dir, 'invalid.json');
      await fs.writeFile(invalid, '{ not json');
      expect((await TeamDirectory.load(invalid)).size).toBe(0);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
