/**
 * ClusterStatsClient
 *
 * Fetches `/_cluster/stats` and `/_nodes/stats` and validates them against
 * the shared contracts.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  ContractViolationError,
  HttpClientError,
  errorMessage,
  parseServiceResponse,
  toError,
  type HttpClient,
  type HttpResponse,
} from '@clusterwatch/platform-core';
import {
  ClusterStatsSchema,
  NodesStatsSchema,
  type ClusterStats,
  type NodesStats,
} from '@clusterwatch/shared-contracts';
import { ParseError, TransportError } from '../../application/errors';
import type { IClusterStatsFetcher } from '../../application/interfaces';

const SOURCE = 'search-cluster';

export const CLUSTER_STATS_PATH = '/_cluster/stats';
export const NODES_STATS_PATH = '/_nodes/stats';

export class ClusterStatsClient implements IClusterStatsFetcher {
  constructor(private readonly http: HttpClient) {}

  fetchClusterStats(): Promise<ClusterStats> {
    return this.fetchSnapshot('cluster', CLUSTER_STATS_PATH, ClusterStatsSchema);
  }

  fetchNodesStats(): Promise<NodesStats> {
    return this.fetchSnapshot('nodes', NODES_STATS_PATH, NodesStatsSchema);
  }

  private async fetchSnapshot<T>(target: string, path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let response: HttpResponse<unknown>;
    try {
      response = await this.http.getWithResponse<unknown>(path);
    } catch (error) {
      if (error instanceof HttpClientError) {
        throw new TransportError(target, error.message, error);
      }
      throw new TransportError(target, errorMessage(error), toError(error));
    }

    if (!response.ok) {
      throw new TransportError(target, `unexpected HTTP status ${response.status}`);
    }

    try {
      return parseServiceResponse(schema, response.data, SOURCE, `fetch ${target} stats`);
    } catch (error) {
      if (error instanceof ContractViolationError) {
        const first = error.zodError.issues[0];
        const where = first && first.path.length > 0 ? `${first.path.join('.')}: ` : '';
        throw new ParseError(target, first ? `${where}${first.message}` : error.message, error);
      }
      throw error;
    }
  }
}
