import type { LookupRequest, MappingRecord, MappingResult } from '../types/api.js';
import type { UpstreamApiClient } from '../utils/api-client.js';

export interface ParsedMappings {
  records: MappingRecord[];
  // Lines with fewer than two tab-separated fields; they are dropped
  skipped: string[];
}

export function parseMappings(body: string): ParsedMappings {
  const records: MappingRecord[] = [];
  const skipped: string[] = [];

  for (const line of body.trim().split(/\r?\n/)) {
    if (line.trim() === '') {
      continue;
    }
    const fields = line.split('\t');
    if (fields.length < 2) {
      skipped.push(line);
      continue;
    }
    records.push({ identifier: fields[0].trim(), label: fields[1].trim() });
  }

  return { records, skipped };
}

export function xrefsPath(request: LookupRequest): string {
  const segments = [request.species, 'xrefs', request.source, request.identifier];
  return '/' + segments.map((segment) => encodeURIComponent(segment)).join('/');
}

export class BridgeDbClient {
  constructor(
    private api: UpstreamApiClient,
    private debug = false
  ) {}

  async mapIdentifier(request: LookupRequest): Promise<MappingResult> {
    const fields: Array<[string, string]> = [
      ['species', request.species],
      ['source', request.source],
      ['identifier', request.identifier],
    ];
    for (const [field, value] of fields) {
      if (value.trim().length === 0) {
        throw new TypeError(`BridgeDB lookup requires a non-empty ${field}`);
      }
    }

    const path = xrefsPath(request);
    const response = await this.api.getText(path);

    if (this.debug) {
      console.error(`[bridgedb] GET ${path} -> ${response.status}`);
    }

    if (response.status !== 200) {
      return { kind: 'http_error', status: response.status, reason: response.statusText };
    }

    const { records, skipped } = parseMappings(response.body);
    if (this.debug && skipped.length > 0) {
      console.error(`[bridgedb] skipped ${skipped.length} malformed line(s) for ${path}`);
    }

    return records.length > 0 ? { kind: 'success', records } : { kind: 'not_found' };
  }
}
