import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BrewCatalogSource, loadCatalog, type CatalogKind, type CatalogSource } from './catalog';

const { warn } = vi.hoisted(() => ({ warn: vi.fn() }));

vi.mock('../utils/logger', () => {
  const child = () => ({ warn, info: vi.fn(), debug: vi.fn() });
  return { logger: { child }, createStageLogger: child };
});

const fakeSource = (lists: Record<CatalogKind, string[]>): CatalogSource => ({
  list: async (kind) => lists[kind],
});

describe('loadCatalog', () => {
  beforeEach(() => {
    warn.mockClear();
  });

  it('unions formulae and casks', async () => {
    const catalog = await loadCatalog(fakeSource({ formulae: ['git', 'wget'], casks: ['firefox', 'git'] }));
    expect([...catalog].sort()).toEqual(['firefox', 'git', 'wget']);
    expect(warn).not.toHaveBeenCalled();
  });

  it('falls back to an empty catalog when a query rejects', async () => {
    const source: CatalogSource = {
      list: async (kind) => {
        if (kind === 'casks') throw new Error('brew casks failed: exit 1');
        return ['git'];
      },
    };

    const catalog = await loadCatalog(source);

    expect(catalog.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][1]).toBe('Catalog query failed, continuing with an empty catalog');
  });

  it('falls back to an empty catalog when brew is not installed', async () => {
    const catalog = await loadCatalog(new BrewCatalogSource('nonexistent-brew-binary-xyz'));
    expect(catalog.size).toBe(0);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('BrewCatalogSource', () => {
  it('rejects when the binary is missing', async () => {
    await expect(new BrewCatalogSource('nonexistent-brew-binary-xyz').list('formulae')).rejects.toThrow(
      'nonexistent-brew-binary-xyz formulae failed'
    );
  });

  it('splits the listing into names', async () => {
    // echo prints its argument, so the "catalog" is the kind itself
    const names = await new BrewCatalogSource('echo').list('casks');
    expect(names).toEqual(['casks']);
  });
});
