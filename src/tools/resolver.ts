import type { AxiosAdapter } from 'axios';
import { loadConfig, type ServerConfig } from '../config.js';
import {
  DEFAULT_SPECIES,
  SourceCodes,
  type LookupRequest,
  type ParsedQuery,
  type Resolution,
} from '../types/api.js';
import { UpstreamApiClient } from '../utils/api-client.js';
import { formatResolution } from '../utils/format.js';
import { BridgeDbClient } from './bridgedb.js';
import { PubChemClient } from './pubchem.js';

/**
 * Splits a free-text query into its comma-separated parts.
 *
 *   "Homo sapiens, Ensembl, ENSG00000139618" -> explicit, species given
 *   "Cpc, 2478"                              -> explicit, species "Human"
 *   "BRCA2"                                  -> ambiguous, goes through the fallback chain
 *
 * Anything else, including a part that is blank after trimming, is malformed.
 */
export function parseQuery(query: string): ParsedQuery {
  const parts = query.split(',').map((part) => part.trim());

  if (parts.some((part) => part.length === 0)) {
    return { kind: 'malformed', query };
  }

  switch (parts.length) {
    case 1:
      return { kind: 'ambiguous', token: parts[0] };
    case 2:
      return {
        kind: 'explicit',
        request: { species: DEFAULT_SPECIES, source: parts[0], identifier: parts[1] },
      };
    case 3:
      return {
        kind: 'explicit',
        request: { species: parts[0], source: parts[1], identifier: parts[2] },
      };
    default:
      return { kind: 'malformed', query };
  }
}

export interface FallbackStep {
  description: string;
  source: string;
  applies: (token: string) => boolean;
  // Set when the token must be translated before the lookup (chemical name -> CID)
  viaCompoundName?: boolean;
}

const always = () => true;

/** Namespaces tried, in order, for a single bare token. */
export const FALLBACK_STEPS: readonly FallbackStep[] = [
  { description: 'Ensembl gene ID', source: SourceCodes.Ensembl, applies: always },
  { description: 'HGNC ID', source: SourceCodes.HGNC, applies: (token) => token.startsWith('HGNC:') },
  { description: 'gene symbol', source: SourceCodes.HGNC, applies: always },
  { description: 'PubChem compound ID', source: SourceCodes.PubChemCompound, applies: always },
  {
    description: 'chemical name',
    source: SourceCodes.PubChemCompound,
    applies: always,
    viaCompoundName: true,
  },
];

export interface ResolverOptions {
  config?: Readonly<ServerConfig>;
  bridgedb?: BridgeDbClient;
  pubchem?: PubChemClient;
  steps?: readonly FallbackStep[];
  adapter?: AxiosAdapter;
}

export class IdentifierResolver {
  readonly bridgedb: BridgeDbClient;
  readonly pubchem: PubChemClient;
  private steps: readonly FallbackStep[];
  private debug: boolean;

  constructor(options: ResolverOptions = {}) {
    const config = options.config ?? loadConfig();
    this.debug = config.debug;
    this.steps = options.steps ?? FALLBACK_STEPS;

    this.bridgedb =
      options.bridgedb ??
      new BridgeDbClient(
        new UpstreamApiClient({
          name: 'BridgeDB',
          baseURL: config.bridgedbBaseUrl,
          timeout: config.timeoutMs,
          userAgent: config.userAgent,
          adapter: options.adapter,
        }),
        config.debug
      );

    this.pubchem =
      options.pubchem ??
      new PubChemClient(
        new UpstreamApiClient({
          name: 'PubChem',
          baseURL: config.pubchemBaseUrl,
          timeout: config.timeoutMs,
          userAgent: config.userAgent,
          adapter: options.adapter,
        }),
        config.debug
      );
  }

  async resolve(query: string): Promise<string> {
    return formatResolution(await this.resolveQuery(query));
  }

  async resolveQuery(query: string): Promise<Resolution> {
    const parsed = parseQuery(query);

    switch (parsed.kind) {
      case 'malformed':
        return parsed;
      case 'explicit':
        return {
          kind: 'mapped',
          request: parsed.request,
          result: await this.bridgedb.mapIdentifier(parsed.request),
        };
      case 'ambiguous':
        return this.resolveToken(parsed.token);
    }
  }

  /**
   * Walks the fallback steps for a bare token. The first lookup that is not an
   * HTTP failure wins, including "no mappings found".
   */
  async resolveToken(token: string): Promise<Resolution> {
    const attempted = new Set<string>();

    for (const step of this.steps) {
      if (!step.applies(token)) {
        continue;
      }

      const identifier = step.viaCompoundName ? await this.pubchem.lookupCid(token) : token;
      if (identifier === undefined) {
        if (this.debug) {
          console.error(`[resolver] no PubChem compound named ${token}`);
        }
        continue;
      }

      const request: LookupRequest = { species: DEFAULT_SPECIES, source: step.source, identifier };
      const key = `${request.source}\u0000${request.identifier}`;
      if (attempted.has(key)) {
        continue;
      }
      attempted.add(key);

      if (this.debug) {
        console.error(`[resolver] trying ${token} as ${step.description} (${step.source}:${identifier})`);
      }

      const result = await this.bridgedb.mapIdentifier(request);
      if (result.kind !== 'http_error') {
        return { kind: 'mapped', request, result };
      }
    }

    return { kind: 'exhausted', token };
  }
}

/** Resolves a free-text query to a printable report. Expected failures come back as text. */
export async function resolve(query: string, resolver: IdentifierResolver = new IdentifierResolver()): Promise<string> {
  return resolver.resolve(query);
}
