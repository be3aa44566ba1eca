import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { runPipeline } from './run';
import type { CatalogSource } from './catalog';

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), 'appres-run-'));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const source: CatalogSource = {
  list: async (kind) => (kind === 'formulae' ? ['git', 'wget'] : ['visual-studio-code', 'iterm2']),
};

describe('runPipeline', () => {
  it('resolves, then enriches the unresolved apps', async () => {
    const appsRaw = path.join(dir, 'apps_raw.txt');
    await fs.writeFile(appsRaw, 'Visual Studio Code\nZoom\nGoogle Chrome\nDiscord\n');
    const resolved = path.join(dir, 'resolved.json');
    const output = path.join(dir, 'enriched.json');

    const summary = await runPipeline({
      appsRaw,
      brewState: path.join(dir, 'brew_state.json'),
      resolved,
      output,
      source,
    });

    expect(summary).toEqual({ installable: 1, unresolved: 3, vendorMatched: 2 });
    expect(JSON.parse(await fs.readFile(resolved, 'utf8'))).toEqual({
      brew_installable: [{ app: 'Visual Studio Code', command: 'visual-studio-code' }],
      unresolved: [
        { app: 'Zoom', normalized: 'zoom' },
        { app: 'Google Chrome', normalized: 'google-chrome' },
        { app: 'Discord', normalized: 'discord' },
      ],
    });
    expect(JSON.parse(await fs.readFile(output, 'utf8'))).toEqual({
      unresolved: [
        { app: 'Discord', normalized: 'discord', official_download_url: 'https://discord.com/download', confidence: 'high' },
        { app: 'Google Chrome', normalized: 'google-chrome', official_download_url: 'Not found', confidence: 'low' },
        { app: 'Zoom', normalized: 'zoom', official_download_url: 'https://zoom.us/download', confidence: 'high' },
      ],
    });
  });

  it('renders a snapshot from the brew state and both stage outputs', async () => {
    const appsRaw = path.join(dir, 'apps_raw.txt');
    await fs.writeFile(appsRaw, 'Visual Studio Code\nDiscord\n');
    const brewState = path.join(dir, 'brew_state.json');
    await fs.writeFile(brewState, JSON.stringify({ taps: [], formulae: ['git'], casks: ['iterm2'] }));
    const snapshot = path.join(dir, 'snapshot.txt');

    await runPipeline({
      appsRaw,
      brewState,
      resolved: path.join(dir, 'resolved.json'),
      output: path.join(dir, 'enriched.json'),
      source,
      snapshot,
      now: new Date(2026, 0, 2, 3, 4, 5),
    });

    const text = await fs.readFile(snapshot, 'utf8');
    expect(text).toContain('Generated: 2026-01-02 03:04:05\n');
    expect(text).toContain('\n  visual-studio-code\n');
    expect(text).toContain('\nbrew install git\nbrew install --cask iterm2\n');
    expect(text).toContain('\nDiscord\n  Source: https://discord.com/download\n  Confidence: high\n');
  });

  it('produces empty outputs from a missing apps file', async () => {
    const summary = await runPipeline({
      appsRaw: path.join(dir, 'missing.txt'),
      brewState: path.join(dir, 'brew_state.json'),
      resolved: path.join(dir, 'resolved.json'),
      output: path.join(dir, 'enriched.json'),
      source,
    });

    expect(summary).toEqual({ installable: 0, unresolved: 0, vendorMatched: 0 });
  });
});
