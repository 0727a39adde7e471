import type { LookupRequest, MappingRecord, MappingResult, Resolution } from '../types/api.js';

export const GENE_ONTOLOGY_URL = 'http://geneontology.org/';

export const INVALID_QUERY_MESSAGE =
  "Error: Invalid query format. Expected 'species, source, identifier', 'source, identifier' or a single identifier.";

export function formatRecord(record: MappingRecord): string {
  switch (record.label) {
    case 'GeneOntology':
      return `- Gene Ontology term: ${record.identifier} (Look up at ${GENE_ONTOLOGY_URL})`;
    case 'UCSC Genome Browser':
      // UCSC ids are internal to the browser and cannot be opened directly
      return `- UCSC Genome Browser identifier: ${record.identifier} (Use gene name or genomic location to search)`;
    default:
      return `- ${record.identifier}\t${record.label}`;
  }
}

export function formatMappingResult(request: LookupRequest, result: MappingResult): string {
  switch (result.kind) {
    case 'success': {
      const lines = result.records.map((record) => `${formatRecord(record)}\n`).join('');
      return `Mapped identifiers for ${request.identifier} from ${request.source}:\n${lines}`;
    }
    case 'not_found':
      return `No mappings found for ${request.identifier} from ${request.source}`;
    case 'http_error': {
      const reason = result.reason ? ` (${result.reason})` : '';
      return `Error: Failed to retrieve mappings. Status code: ${result.status}${reason}`;
    }
  }
}

export function formatResolution(resolution: Resolution): string {
  switch (resolution.kind) {
    case 'mapped':
      return formatMappingResult(resolution.request, resolution.result);
    case 'malformed':
      return INVALID_QUERY_MESSAGE;
    case 'exhausted':
      return `Error: Unable to map identifier or find compound: ${resolution.token}`;
  }
}
