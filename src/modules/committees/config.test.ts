import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { committeeChannels, committeeCodes, loadCommittees, selectCommittees } from './config.js';

const COMMITTEES_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../data/committees.json',
);

describe('loadCommittees', () => {
  let tmpDir: string | null = null;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = null;
  });

  it('loads the bundled committee list', () => {
    const committees = loadCommittees(COMMITTEES_PATH);
    const ec = committees.find(c => c.id === 'house-energy-commerce');
    expect(ec?.active).toBe(true);
    expect(ec?.systemCodes['hsif14']).toBe('Health Subcommittee');
  });

  it('applies defaults for optional fields', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'committees-'));
    const file = path.join(tmpDir, 'committees.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ committees: [{ id: 'test', name: 'Test', chamber: 'Senate', systemCodes: {} }] }),
    );
    expect(loadCommittees(file)).toEqual([
      { id: 'test', name: 'Test', chamber: 'Senate', active: true, systemCodes: {}, youtubeChannels: [] },
    ]);
  });

  it('rejects an unknown chamber', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'committees-'));
    const file = path.join(tmpDir, 'committees.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ committees: [{ id: 'x', name: 'X', chamber: 'Both', systemCodes: {} }] }),
    );
    expect(() => loadCommittees(file)).toThrow();
  });
});

describe('selectCommittees', () => {
  const committees = loadCommittees(COMMITTEES_PATH);

  it('defaults to the active committees', () => {
    expect(selectCommittees(committees).map(c => c.id)).toEqual(['house-energy-commerce']);
  });

  it('selects an inactive committee by id', () => {
    expect(selectCommittees(committees, 'house-judiciary').map(c => c.id)).toEqual(['house-judiciary']);
  });

  it('throws on an unknown id', () => {
    expect(() => selectCommittees(committees, 'house-agriculture')).toThrow('Unknown committee "house-agriculture"');
  });
});

describe('committee helpers', () => {
  const committee = {
    id: 'house-energy-commerce',
    name: 'House Energy and Commerce Committee',
    chamber: 'House' as const,
    active: true,
    systemCodes: { hsif00: 'Full', hsif14: 'Health' },
    youtubeChannels: [{ channelId: 'UCtest', channelName: 'E&C' }],
  };

  it('tags channels with the committee id', () => {
    expect(committeeChannels(committee)).toEqual([
      { channelId: 'UCtest', channelName: 'E&C', committeeId: 'house-energy-commerce' },
    ]);
  });

  it('lists system codes', () => {
    expect(committeeCodes(committee)).toEqual(['hsif00', 'hsif14']);
  });
});
