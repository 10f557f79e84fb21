import type { Row } from '../../domain/model/Row.js';
import type { DatasetInfo, DatasetInfos, HubClient, HubLoadRequest, SplitInfo } from '../../domain/ports/HubClient.js';
import { SourceUnavailableError, errorMessage } from '../../domain/errors/RowstreamError.js';
import { DEFAULT_CONFIG } from '../../domain/services/SchemaResolver.js';
import { isRecord } from '../utils/isRecord.js';
import { RemoteRowsDataset } from './RemoteRowsDataset.js';
import type { RowsPage } from './RemoteRowsDataset.js';

export interface HttpHubClientOptions {
  /** Base URL of the datasets server. Default: `https://datasets-server.huggingface.co`. */
  readonly endpoint?: string;
  /** Access token sent as a bearer token. */
  readonly token?: string;
  /** Custom HTTP headers to send with every request. */
  readonly headers?: Readonly<Record<string, string>>;
  /** Request timeout in milliseconds. Default: `30000` (30 seconds). */
  readonly timeout?: number;
  /** Rows per page when reading. Default: `100`, the server's maximum. */
  readonly pageSize?: number;
}

/**
 * Hub client for a datasets-server style HTTP API, using the Fetch API.
 *
 * - `GET /info?dataset=` returns features and per-split row counts of every config.
 * - `GET /rows?dataset=&config=&split=&offset=&length=` returns one page of rows.
 *
 * Requires a runtime with global `fetch` (Node.js >= 18).
 */
export class HttpHubClient implements HubClient {
  private readonly endpoint: string;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeout: number;
  private readonly pageSize: number;

  constructor(options?: HttpHubClientOptions) {
    this.endpoint = (options?.endpoint ?? 'https://datasets-server.huggingface.co').replace(/\/+$/, '');
    this.headers = {
      ...(options?.token ? { Authorization: `Bearer ${options.token}` } : {}),
      ...options?.headers,
    };
    this.timeout = options?.timeout ?? 30000;
    this.pageSize = options?.pageSize ?? 100;
  }

  async getDatasetInfos(repoId: string): Promise<DatasetInfos> {
    const body = await this.getJson('/info', { dataset: repoId });
    const datasetInfo = isRecord(body) ? body['dataset_info'] : undefined;
    if (!isRecord(datasetInfo)) {
      throw new SourceUnavailableError(`HttpHubClient: malformed info response for '${repoId}'`, { repoId });
    }

    const infos: Record<string, DatasetInfo> = {};
    for (const [config, info] of Object.entries(datasetInfo)) {
      if (isRecord(info)) infos[config] = toDatasetInfo(info);
    }
    return infos;
  }

  async loadDataset(request: HubLoadRequest): Promise<RemoteRowsDataset> {
    const params = { dataset: request.repoId, config: request.config ?? DEFAULT_CONFIG, split: request.split };
    const fetchPage = async (offset: number, length: number): Promise<RowsPage> =>
      toRowsPage(await this.getJson('/rows', { ...params, offset: String(offset), length: String(length) }), params);

    // A materialized load fails here when the split cannot be reached; a streaming one on first read.
    const firstPage = request.streaming ? undefined : await fetchPage(0, this.pageSize);

    return new RemoteRowsDataset({ fetchPage, pageSize: this.pageSize, streaming: request.streaming, firstPage });
  }

  private async getJson(path: string, query: Readonly<Record<string, string>>): Promise<unknown> {
    const url = `${this.endpoint}${path}?${new URLSearchParams(query).toString()}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.timeout);

    try {
      let response: Response;
      try {
        response = await fetch(url, { headers: this.headers, signal: controller.signal });
      } catch (error) {
        throw new SourceUnavailableError(`HttpHubClient: request to ${url} failed: ${errorMessage(error)}`, { url }, {
          cause: error,
        });
      }

      if (!response.ok) {
        throw new SourceUnavailableError(
          `HttpHubClient: HTTP ${String(response.status)} ${response.statusText} for ${url}`,
          { url, status: response.status },
        );
      }

      try {
        const body: unknown = await response.json();
        return body;
      } catch (error) {
        throw new SourceUnavailableError(
          `HttpHubClient: cannot read the response body from ${url}: ${errorMessage(error)}`,
          { url },
          { cause: error },
        );
      }
    } finally {
      // The timeout covers reading the body as well as the request.
      clearTimeout(timeoutId);
    }
  }
}

function toDatasetInfo(info: Record<string, unknown>): DatasetInfo {
  const rawFeatures = info['features'];
  const rawSplits = info['splits'];
  const features: Record<string, unknown> = isRecord(rawFeatures) ? rawFeatures : {};
  const splitEntries: Record<string, unknown> = isRecord(rawSplits) ? rawSplits : {};
  const splits: Record<string, SplitInfo> = {};

  for (const [name, split] of Object.entries(splitEntries)) {
    const numExamples: unknown = isRecord(split) ? split['num_examples'] : undefined;
    if (typeof numExamples === 'number') {
      splits[name] = { name, numExamples };
    }
  }
  return { features, splits };
}

function toRowsPage(body: unknown, params: Readonly<Record<string, string>>): RowsPage {
  const page: Record<string, unknown> = isRecord(body) ? body : {};
  const rawRows = page['rows'];
  if (!Array.isArray(rawRows)) {
    throw new SourceUnavailableError('HttpHubClient: malformed rows response', { ...params });
  }

  const rawFeatures = page['features'];
  const features: unknown[] = Array.isArray(rawFeatures) ? rawFeatures : [];
  const columns: string[] = [];
  for (const feature of features) {
    const name = isRecord(feature) ? feature['name'] : undefined;
    if (typeof name === 'string') columns.push(name);
  }

  const rows: Row[] = [];
  for (const entry of rawRows) {
    const row: unknown = isRecord(entry) ? entry['row'] : undefined;
    if (isRecord(row)) rows.push(row);
  }
  const total = page['num_rows_total'];

  return { columns, rows, numRowsTotal: typeof total === 'number' ? total : undefined };
}
