import { describe, it, expect } from 'vitest';
import { ErrorCode, McpError, type ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { BridgeDbServer } from '../server.js';
import { IdentifierResolver } from '../tools/resolver.js';
import { INVALID_QUERY_MESSAGE } from '../utils/format.js';
import {
  BRIDGEDB_URL,
  PUBCHEM_URL,
  createStubUpstream,
  ok,
  testConfig,
  type StubReply,
} from './stub-upstream.js';

const routes: Record<string, StubReply> = {
  [`${BRIDGEDB_URL}/Human/xrefs/Cpc/2478`]: ok('CID2478\tPubChem Compound\n'),
  [`${PUBCHEM_URL}/rest/pug/compound/name/Busulfan/cids/TXT`]: ok('2478\n'),
};

const createServer = (extra: Record<string, StubReply | Error> = {}) => {
  const stub = createStubUpstream({ ...routes, ...extra });
  const server = new BridgeDbServer(new IdentifierResolver({ config: testConfig(), adapter: stub.adapter }));
  return { server, calls: stub.calls };
};

const firstText = (result: { content: Array<{ type: string; text?: unknown }> }) => {
  const [item] = result.content;
  return typeof item.text === 'string' ? item.text : '';
};

const resourceText = (result: ReadResourceResult) => {
  const [item] = result.contents;
  return 'text' in item && typeof item.text === 'string' ? item.text : '';
};

describe('BridgeDbServer tools', () => {
  it('answers identifier_mapping with the formatted report', async () => {
    const { server } = createServer();

    const result = await server.callTool('identifier_mapping', { query: 'Cpc, 2478' });

    expect(result.isError).toBeUndefined();
    expect(result.content).toEqual([
      { type: 'text', text: 'Mapped identifiers for 2478 from Cpc:\n- CID2478\tPubChem Compound\n' },
    ]);
  });

  it('flags malformed queries as tool errors', async () => {
    const { server, calls } = createServer();

    const result = await server.callTool('identifier_mapping', { query: 'a, b, c, d' });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe(INVALID_QUERY_MESSAGE);
    expect(calls).toEqual([]);
  });

  it('returns structured mappings from map_identifier', async () => {
    const { server } = createServer();

    const result = await server.callTool('map_identifier', { source: 'Cpc', identifier: ' 2478 ' });

    expect(JSON.parse(firstText(result))).toEqual({
      request: { species: 'Human', source: 'Cpc', identifier: '2478' },
      mappings: [{ identifier: 'CID2478', label: 'PubChem Compound' }],
    });
  });

  it('reports the upstream status when map_identifier fails', async () => {
    const { server } = createServer();

    const result = await server.callTool('map_identifier', {
      species: 'Mouse',
      source: 'En',
      identifier: 'ENSMUSG00000041147',
    });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe('BridgeDB request failed (404 Not Found) for En:ENSMUSG00000041147');
  });

  it('looks up PubChem CIDs by name', async () => {
    const { server } = createServer();

    const found = await server.callTool('get_pubchem_cid', { name: 'Busulfan' });
    const missing = await server.callTool('get_pubchem_cid', { name: 'Unobtainium' });

    expect(JSON.parse(firstText(found))).toEqual({ name: 'Busulfan', cids: ['2478'] });
    expect(missing.isError).toBe(true);
    expect(firstText(missing)).toBe('No PubChem compound found for: Unobtainium');
  });

  it.each<[string, unknown]>([
    ['identifier_mapping', {}],
    ['identifier_mapping', { query: 42 }],
    ['map_identifier', { source: 'En' }],
    ['map_identifier', { source: 'En', identifier: 'X', species: '' }],
    ['get_pubchem_cid', { name: ' ' }],
    ['get_pubchem_cid', undefined],
  ])('rejects invalid arguments for %s', async (name, args) => {
    const { server } = createServer();

    await expect(server.callTool(name, args)).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('rejects unknown tools', async () => {
    const { server } = createServer();

    await expect(server.callTool('translate_everything', {})).rejects.toMatchObject({
      code: ErrorCode.MethodNotFound,
    });
  });

  it('turns transport failures into internal errors', async () => {
    const { server } = createServer({
      [`${BRIDGEDB_URL}/Human/xrefs/En/BRCA2`]: new Error('socket hang up'),
    });

    const error = await server.callTool('identifier_mapping', { query: 'BRCA2' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(McpError);
    expect(error).toMatchObject({ code: ErrorCode.InternalError });
    expect(error instanceof McpError ? error.message : '').toContain('Request setup error: socket hang up');
  });
});

describe('BridgeDbServer resources', () => {
  it('reads cross-references by URI', async () => {
    const { server } = createServer();

    const result = await server.readResource('bridgedb://Human/xrefs/Cpc/2478');

    expect(result.contents).toHaveLength(1);
    expect(result.contents[0]).toMatchObject({ uri: 'bridgedb://Human/xrefs/Cpc/2478', mimeType: 'application/json' });
    expect(JSON.parse(resourceText(result))).toEqual({
      request: { species: 'Human', source: 'Cpc', identifier: '2478' },
      mappings: [{ identifier: 'CID2478', label: 'PubChem Compound' }],
    });
  });

  it('reads PubChem CIDs by compound name', async () => {
    const { server } = createServer();

    const result = await server.readResource('pubchem://compound/name/Busulfan');

    expect(JSON.parse(resourceText(result))).toEqual({ name: 'Busulfan', cids: ['2478'] });
  });

  it('fails when BridgeDB rejects the lookup', async () => {
    const { server } = createServer();

    await expect(server.readResource('bridgedb://Human/xrefs/En/nothing')).rejects.toMatchObject({
      code: ErrorCode.InternalError,
    });
  });

  it('rejects unknown URIs', async () => {
    const { server } = createServer();

    await expect(server.readResource('chembl://molecule/CHEMBL25')).rejects.toMatchObject({
      code: ErrorCode.InvalidRequest,
    });
  });
});
