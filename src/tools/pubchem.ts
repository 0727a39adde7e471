import type { UpstreamApiClient } from '../utils/api-client.js';

export function cidsPath(name: string): string {
  return `/rest/pug/compound/name/${encodeURIComponent(name)}/cids/TXT`;
}

export class PubChemClient {
  constructor(
    private api: UpstreamApiClient,
    private debug = false
  ) {}

  /** All compound IDs PubChem lists for the name, in response order. Empty on any non-200. */
  async lookupCids(name: string): Promise<string[]> {
    if (name.trim().length === 0) {
      throw new TypeError('PubChem lookup requires a non-empty compound name');
    }

    const path = cidsPath(name.trim());
    const response = await this.api.getText(path);

    if (this.debug) {
      console.error(`[pubchem] GET ${path} -> ${response.status}`);
    }

    if (response.status !== 200) {
      return [];
    }
    const body = response.body.trim();
    return body === '' ? [] : body.split(/\s+/);
  }

  // A name can match several compounds; the first listed CID is taken
  async lookupCid(name: string): Promise<string | undefined> {
    const cids = await this.lookupCids(name);
    return cids[0];
  }
}
