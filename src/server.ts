/**
 * BridgeDB MCP Server
 *
 * Exposes the BridgeDB identifier-mapping web service to MCP clients:
 * - identifier_mapping: free-text lookup with an Ensembl / HGNC / PubChem fallback chain
 * - map_identifier: a single explicit xrefs lookup, returned as JSON
 * - get_pubchem_cid: chemical name to PubChem compound ID(s)
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { SERVER_NAME, SERVER_VERSION } from './config.js';
import { IdentifierResolver } from './tools/resolver.js';
import { DEFAULT_SPECIES, type LookupRequest } from './types/api.js';
import { formatResolution } from './utils/format.js';

interface IdentifierMappingArgs {
  query: string;
}

interface MapIdentifierArgs {
  source: string;
  identifier: string;
  species?: string;
}

interface PubChemCidArgs {
  name: string;
}

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === 'string' && value.trim().length > 0;

// Type guards and validation functions
const isValidIdentifierMappingArgs = (args: unknown): args is IdentifierMappingArgs =>
  typeof args === 'object' &&
  args !== null &&
  'query' in args &&
  typeof args.query === 'string';

const isValidMapIdentifierArgs = (args: unknown): args is MapIdentifierArgs =>
  typeof args === 'object' &&
  args !== null &&
  'source' in args &&
  isNonEmptyString(args.source) &&
  'identifier' in args &&
  isNonEmptyString(args.identifier) &&
  (!('species' in args) || args.species === undefined || isNonEmptyString(args.species));

const isValidPubChemCidArgs = (args: unknown): args is PubChemCidArgs =>
  typeof args === 'object' &&
  args !== null &&
  'name' in args &&
  isNonEmptyString(args.name);

const textResult = (text: string, isError = false): CallToolResult => ({
  content: [{ type: 'text', text }],
  ...(isError ? { isError: true } : {}),
});

const XREFS_URI = /^bridgedb:\/\/([^/]+)\/xrefs\/([^/]+)\/(.+)$/;
const PUBCHEM_NAME_URI = /^pubchem:\/\/compound\/name\/(.+)$/;

export class BridgeDbServer {
  readonly server: Server;

  constructor(private resolver: IdentifierResolver = new IdentifierResolver()) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    this.setupResourceHandlers();
    this.setupToolHandlers();

    // Error handling
    this.server.onerror = (error: Error) => console.error('[MCP Error]', error);
  }

  private setupResourceHandlers() {
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: [],
    }));

    this.server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
      resourceTemplates: [
        {
          uriTemplate: 'bridgedb://{species}/xrefs/{source}/{identifier}',
          name: 'BridgeDB cross-references',
          mimeType: 'application/json',
          description: 'Identifiers mapped from one database to all others BridgeDB knows',
        },
        {
          uriTemplate: 'pubchem://compound/name/{name}',
          name: 'PubChem compound IDs by name',
          mimeType: 'application/json',
          description: 'PubChem CIDs matching a chemical name',
        },
      ],
    }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) =>
      this.readResource(request.params.uri)
    );
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: [
        {
          name: 'identifier_mapping',
          description: `Map identifiers between biological and chemical databases.
Input can be in the following formats:
1. 'species, source_ds, identifier' (e.g., 'Homo sapiens, Ensembl, ENSG00000139618')
2. 'source_ds, identifier' (e.g., 'Cpc, 2478')
3. Just the identifier or gene/chemical name (e.g., 'ENSG00000139618' or 'BRCA2' or 'Busulfan')`,
          inputSchema: {
            type: 'object',
            properties: {
              query: {
                type: 'string',
                description: 'Identifier, gene symbol, chemical name, or comma-separated lookup',
              },
            },
            required: ['query'],
          },
        },
        {
          name: 'map_identifier',
          description: 'Look up cross-references for one identifier in an explicit BridgeDB source namespace',
          inputSchema: {
            type: 'object',
            properties: {
              source: {
                type: 'string',
                description: 'BridgeDB system code of the source database (e.g., "En", "H", "Cpc", "L")',
              },
              identifier: {
                type: 'string',
                description: 'Identifier in the source database (e.g., "ENSG00000139618")',
              },
              species: {
                type: 'string',
                description: 'Species name as BridgeDB knows it',
                default: DEFAULT_SPECIES,
              },
            },
            required: ['source', 'identifier'],
          },
        },
        {
          name: 'get_pubchem_cid',
          description: 'Find PubChem compound IDs (CIDs) for a chemical name',
          inputSchema: {
            type: 'object',
            properties: {
              name: {
                type: 'string',
                description: 'Chemical name (e.g., "Busulfan", "aspirin")',
              },
            },
            required: ['name'],
          },
        },
      ],
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );
  }

  async callTool(name: string, args: unknown): Promise<CallToolResult> {
    try {
      switch (name) {
        case 'identifier_mapping':
          return await this.handleIdentifierMapping(args);

        case 'map_identifier':
          return await this.handleMapIdentifier(args);

        case 'get_pubchem_cid':
          return await this.handlePubChemCid(args);

        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    } catch (error) {
      throw this.toMcpError(error);
    }
  }

  async readResource(uri: string): Promise<ReadResourceResult> {
    try {
      const xrefsMatch = uri.match(XREFS_URI);
      if (xrefsMatch) {
        const request: LookupRequest = {
          species: decodeURIComponent(xrefsMatch[1]),
          source: decodeURIComponent(xrefsMatch[2]),
          identifier: decodeURIComponent(xrefsMatch[3]),
        };
        const result = await this.resolver.bridgedb.mapIdentifier(request);
        if (result.kind === 'http_error') {
          throw new McpError(
            ErrorCode.InternalError,
            `BridgeDB returned ${result.status} for ${uri}`
          );
        }
        return {
          contents: [
            {
              uri,
              mimeType: 'application/json',
              text: JSON.stringify(
                { request, mappings: result.kind === 'success' ? result.records : [] },
                null,
                2
              ),
            },
          ],
        };
      }

      const nameMatch = uri.match(PUBCHEM_NAME_URI);
      if (nameMatch) {
        const name = decodeURIComponent(nameMatch[1]);
        const cids = await this.resolver.pubchem.lookupCids(name);
        return {
          contents: [
            {
              uri,
              mimeType: 'application/json',
              text: JSON.stringify({ name, cids }, null, 2),
            },
          ],
        };
      }
    } catch (error) {
      throw this.toMcpError(error);
    }

    throw new McpError(ErrorCode.InvalidRequest, `Unsupported resource URI: ${uri}`);
  }

  private async handleIdentifierMapping(args: unknown): Promise<CallToolResult> {
    if (!isValidIdentifierMappingArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, 'Invalid identifier mapping arguments. query is required.');
    }

    const resolution = await this.resolver.resolveQuery(args.query);
    const text = formatResolution(resolution);
    const failed =
      resolution.kind !== 'mapped' || resolution.result.kind === 'http_error';
    return textResult(text, failed);
  }

  private async handleMapIdentifier(args: unknown): Promise<CallToolResult> {
    if (!isValidMapIdentifierArgs(args)) {
      throw new McpError(
        ErrorCode.InvalidParams,
        'Invalid map identifier arguments. source and identifier are required.'
      );
    }

    const request: LookupRequest = {
      species: args.species?.trim() || DEFAULT_SPECIES,
      source: args.source.trim(),
      identifier: args.identifier.trim(),
    };
    const result = await this.resolver.bridgedb.mapIdentifier(request);

    if (result.kind === 'http_error') {
      return textResult(
        `BridgeDB request failed (${result.status}${result.reason ? ` ${result.reason}` : ''}) for ${request.source}:${request.identifier}`,
        true
      );
    }

    return textResult(
      JSON.stringify(
        {
          request,
          mappings: result.kind === 'success' ? result.records : [],
        },
        null,
        2
      )
    );
  }

  private async handlePubChemCid(args: unknown): Promise<CallToolResult> {
    if (!isValidPubChemCidArgs(args)) {
      throw new McpError(ErrorCode.InvalidParams, 'Invalid PubChem arguments. name is required.');
    }

    const name = args.name.trim();
    const cids = await this.resolver.pubchem.lookupCids(name);
    if (cids.length === 0) {
      return textResult(`No PubChem compound found for: ${name}`, true);
    }

    return textResult(JSON.stringify({ name, cids }, null, 2));
  }

  private toMcpError(error: unknown): McpError {
    if (error instanceof McpError) {
      return error;
    }
    return new McpError(
      ErrorCode.InternalError,
      `Unexpected error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
