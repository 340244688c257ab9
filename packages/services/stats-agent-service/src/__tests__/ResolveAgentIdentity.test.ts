import { describe, it, expect, vi } from 'vitest';
import { resolveAgentIdentity, AGENT_ID } from '../application/use-cases/ResolveAgentIdentity';
import { StatsAgentError, StatsAgentErrorCodes, TransportError } from '../application/errors';
import { StubFetcher, clusterSnapshot } from './fixtures';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('@clusterwatch/platform-core', async importOriginal => {
  const actual = await importOriginal<typeof import('@clusterwatch/platform-core')>();
  return {
    ...actual,
    createLogger: vi.fn(() => mockLogger),
    getLogger: vi.fn(() => mockLogger),
  };
});

describe('resolveAgentIdentity', () => {
  it('should take the cluster name from the cluster snapshot', async () => {
    const fetcher = new StubFetcher();
    fetcher.cluster = clusterSnapshot(0, { cluster_name: 'search-prod' });

    await expect(resolveAgentIdentity(fetcher, '1.0.0')).resolves.toEqual({
      agentId: AGENT_ID,
      version: '1.0.0',
      clusterName: 'search-prod',
    });
    expect(fetcher.nodesCalls).toBe(0);
  });

  it('should refuse to start when the cluster cannot be reached', async () => {
    const fetcher = new StubFetcher();
    fetcher.cluster = new TransportError('cluster', 'connect ECONNREFUSED');

    const error = await resolveAgentIdentity(fetcher, '1.0.0').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StatsAgentError);
    expect(error).toHaveProperty('code', StatsAgentErrorCodes.IDENTITY_UNAVAILABLE);
    expect(error).toHaveProperty('cause', fetcher.cluster);
  });
});
