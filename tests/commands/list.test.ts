import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runCommand } from 'citty';
import * as p from '@clack/prompts';
import type { Registry } from '../../src/types/index.js';

const readRegistry = vi.fn<() => Promise<Registry>>();

const plain = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, '');

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  log: {
    info: vi.fn(),
    message: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
  },
}));

vi.mock('../../src/lib/registry.js', async () => {
  const actual =
    await vi.importActual<typeof import('../../src/lib/registry.js')>('../../src/lib/registry.js');
  return {
    ...actual,
    readRegistry,
  };
});

const { default: listCommand, formatEntry } = await import('../../src/commands/list.js');

const registry: Registry = {
  version: '1.0',
  repositories: [
    { id: 'docs', name: 'Docs', kind: 'local', createdAt: 1, path: '/rules/docs' },
    {
      id: 'team',
      name: 'Team',
      kind: 'remote',
      createdAt: 1,
      path: '/data/rulebook/team',
      remoteUrl: 'https://github.com/acme/team',
      branch: 'dev',
    },
  ],
};

describe('rulebook list', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints one block per repository', async () => {
    readRegistry.mockResolvedValue(registry);

    await runCommand(listCommand, { rawArgs: [] });

    expect(p.intro).toHaveBeenCalledWith('rulebook list');
    expect(vi.mocked(p.log.message).mock.calls.map(([text]) => plain(String(text)))).toEqual([
      '📁 Docs\n   /rules/docs',
      '🔗 Team\n   /data/rulebook/team\n   https://github.com/acme/team (dev)',
    ]);
    expect(p.outro).toHaveBeenCalledWith('2 repositories');
  });

  it('explains an empty registry', async () => {
    readRegistry.mockResolvedValue({ version: '1.0', repositories: [] });

    await runCommand(listCommand, { rawArgs: [] });

    expect(p.log.info).toHaveBeenCalledWith("No repositories configured. Run 'rulebook' to add one.");
    expect(p.outro).toHaveBeenCalledWith('Nothing to show');
    expect(p.log.message).not.toHaveBeenCalled();
  });

  it('prints the registry as JSON', async () => {
    readRegistry.mockResolvedValue(registry);
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await runCommand(listCommand, { rawArgs: ['--json'] });

    expect(write).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(write.mock.calls[0][0]))).toEqual(registry);
    expect(p.intro).not.toHaveBeenCalled();
  });
});

describe('formatEntry', () => {
  it('falls back to the default branch and shows the last sync', () => {
    const text = formatEntry(
      {
        id: 'team',
        name: 'Team',
        kind: 'remote',
        createdAt: 1,
        path: '/data/rulebook/team',
        remoteUrl: 'https://github.com/acme/team',
        lastSyncedAt: '2026-03-01T10:00:00Z',
      },
      new Date('2026-03-01T12:00:00Z')
    );

    expect(plain(text).split('\n')).toEqual([
      '🔗 Team',
      '   /data/rulebook/team',
      '   https://github.com/acme/team (default branch)',
      '   synced 2h ago',
    ]);
  });
});
