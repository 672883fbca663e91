/**
 * REST fallback for the company name.
 *
 * When the GraphQL endpoint cannot be reached or will not authenticate, the
 * company name is still available from the v3 REST company-info resource.
 * Only the canonical company-name query is eligible:
 *
 *   { company { companyName } }
 *   query GetCompanyName { company { companyName } }
 *
 * Comments and whitespace are ignored. Extra fields, arguments, variables,
 * directives, fragments and mutations all disqualify the query, so widening
 * the fallback is a deliberate change to COMPANY_NAME_QUERY.
 */

import type { AuthenticatedRequestExecutor } from '../../adapters/authenticated-executor.js';
import { companyInfoUrl, type IntuitEndpoints } from '../../adapters/intuit-endpoints.js';
import { TransportError } from '../../core/errors.js';

const COMPANY_NAME_QUERY = /^(?:query(?: [_A-Za-z][_0-9A-Za-z]*)?)?\{company\{companyName\}\}$/;

/**
 * Strips comments and every whitespace run that GraphQL treats as
 * insignificant around braces.
 */
export function normalizeDocument(document: string): string {
  return document
    .replace(/#[^\n\r]*/g, '')
    .replace(/[\s,]+/g, ' ')
    .replace(/ ?([{}]) ?/g, '$1')
    .trim();
}

export function isCompanyNameQuery(document: string): boolean {
  return COMPANY_NAME_QUERY.test(normalizeDocument(document));
}

export interface CompanyNameEnvelope {
  data: {
    company: {
      companyName: string;
    };
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reshapes a REST `{ CompanyInfo: { CompanyName } }` body into the GraphQL
 * envelope the caller would have received from the primary path.
 */
export function toCompanyNameEnvelope(body: unknown): CompanyNameEnvelope {
  const info = isRecord(body) ? body.CompanyInfo : undefined;
  const companyName = isRecord(info) ? info.CompanyName : undefined;

  if (typeof companyName !== 'string') {
    throw new TransportError('Company info response did not contain CompanyInfo.CompanyName');
  }

  return { data: { company: { companyName } } };
}

/**
 * Issues the single REST GET and returns the reshaped envelope.
 */
export async function fetchCompanyName(
  executor: Pick<AuthenticatedRequestExecutor, 'execute'>,
  endpoints: IntuitEndpoints,
  realmId: string
): Promise<CompanyNameEnvelope> {
  const response = await executor.execute({
    method: 'GET',
    url: companyInfoUrl(endpoints, realmId),
  });
  return toCompanyNameEnvelope(response.body);
}
