// Types shared by the BridgeDB and PubChem clients and the resolver

export const DEFAULT_SPECIES = 'Human';

/**
 * Namespace codes understood by the BridgeDB web service.
 * Only the ones the fallback chain needs are listed here; callers may pass any
 * code the service knows (e.g. "Ensembl", "L", "Ck").
 */
export const SourceCodes = {
  Ensembl: 'En',
  HGNC: 'H',
  PubChemCompound: 'Cpc',
} as const;

export interface LookupRequest {
  readonly species: string;
  readonly source: string;
  readonly identifier: string;
}

export interface MappingRecord {
  identifier: string;
  label: string;
}

export type MappingResult =
  | { kind: 'success'; records: MappingRecord[] }
  | { kind: 'not_found' }
  | { kind: 'http_error'; status: number; reason: string };

export type Resolution =
  | { kind: 'mapped'; request: LookupRequest; result: MappingResult }
  | { kind: 'malformed'; query: string }
  | { kind: 'exhausted'; token: string };

export type ParsedQuery =
  | { kind: 'explicit'; request: LookupRequest }
  | { kind: 'ambiguous'; token: string }
  | { kind: 'malformed'; query: string };
