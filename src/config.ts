// Runtime settings for the BridgeDB MCP server, read from the environment

export interface ServerConfig {
  bridgedbBaseUrl: string;
  pubchemBaseUrl: string;
  timeoutMs: number;
  userAgent: string;
  debug: boolean;
}

export const SERVER_NAME = 'bridgedb-server';
export const SERVER_VERSION = '0.1.0';

const DEFAULT_BRIDGEDB_BASE_URL = 'https://webservice.bridgedb.org';
const DEFAULT_PUBCHEM_BASE_URL = 'https://pubchem.ncbi.nlm.nih.gov';
const DEFAULT_TIMEOUT_MS = 30000;

const stripTrailingSlash = (url: string) => url.replace(/\/+$/, '');

const parseTimeout = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_TIMEOUT_MS;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : DEFAULT_TIMEOUT_MS;
};

const parseFlag = (raw: string | undefined): boolean =>
  raw !== undefined && ['1', 'true', 'yes'].includes(raw.trim().toLowerCase());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServerConfig> {
  return Object.freeze({
    bridgedbBaseUrl: stripTrailingSlash(env.BRIDGEDB_BASE_URL?.trim() || DEFAULT_BRIDGEDB_BASE_URL),
    pubchemBaseUrl: stripTrailingSlash(env.PUBCHEM_BASE_URL?.trim() || DEFAULT_PUBCHEM_BASE_URL),
    timeoutMs: parseTimeout(env.BRIDGEDB_TIMEOUT_MS),
    userAgent: `BridgeDB-MCP-Server/${SERVER_VERSION}`,
    debug: parseFlag(env.BRIDGEDB_MCP_DEBUG),
  });
}
