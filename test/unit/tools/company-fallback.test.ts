import { describe, it, expect, vi } from 'vitest';
import type { AuthenticatedRequestExecutor } from '../../../src/adapters/authenticated-executor.js';
import { resolveEndpoints } from '../../../src/adapters/intuit-endpoints.js';
import { TransportError } from '../../../src/core/errors.js';
import {
  fetchCompanyName,
  isCompanyNameQuery,
  normalizeDocument,
  toCompanyNameEnvelope,
} from '../../../src/tools/graphql/company-fallback.js';

describe('normalizeDocument', () => {
  it('should collapse whitespace around braces', () => {
    expect(normalizeDocument('{ company { companyName } }')).toBe('{company{companyName}}');
  });

  it('should drop comments', () => {
    expect(normalizeDocument('# name only\n{ company { companyName } }')).toBe(
      '{company{companyName}}'
    );
  });

  it('should keep single spaces between names', () => {
    expect(normalizeDocument('query   GetName {\n  company { companyName legalName }\n}')).toBe(
      'query GetName{company{companyName legalName}}'
    );
  });
});

describe('isCompanyNameQuery', () => {
  it.each([
    '{ company { companyName } }',
    '{company{companyName}}',
    'query { company { companyName } }',
    'query GetCompanyName {\n  company {\n    companyName\n  }\n}',
    '  # just the name\n  { company { companyName } }  ',
  ])('should accept %j', (query) => {
    expect(isCompanyNameQuery(query)).toBe(true);
  });

  it.each([
    '{ company { companyName legalName } }',
    '{ company { companyAddr { city } } }',
    'mutation { company { companyName } }',
    'query ($realmId: String) { company { companyName } }',
    '{ company { companyName } customers { edges { node { id } } } }',
    '{ company { name: companyName } }',
    '{ company { companyName @include(if: true) } }',
    '',
  ])('should reject %j', (query) => {
    expect(isCompanyNameQuery(query)).toBe(false);
  });
});

describe('toCompanyNameEnvelope', () => {
  it('should reshape the REST company info into a GraphQL envelope', () => {
    const body = { CompanyInfo: { CompanyName: 'Acme Inc', LegalName: 'Acme Incorporated' }, time: 'x' };

    expect(toCompanyNameEnvelope(body)).toEqual({ data: { company: { companyName: 'Acme Inc' } } });
  });

  it('should throw TransportError when the name is missing', () => {
    expect(() => toCompanyNameEnvelope({ CompanyInfo: {} })).toThrow(TransportError);
    expect(() => toCompanyNameEnvelope({ QueryResponse: {} })).toThrow(
      'Company info response did not contain CompanyInfo.CompanyName'
    );
  });
});

describe('fetchCompanyName', () => {
  it('should issue one GET against the company info resource', async () => {
    const execute = vi.fn<AuthenticatedRequestExecutor['execute']>(async () => ({
      status: 200,
      body: { CompanyInfo: { CompanyName: 'Acme Inc' } },
      rawBody: '{"CompanyInfo":{"CompanyName":"Acme Inc"}}',
    }));

    const envelope = await fetchCompanyName({ execute }, resolveEndpoints('sandbox'), '123');

    expect(envelope).toEqual({ data: { company: { companyName: 'Acme Inc' } } });
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledWith({
      method: 'GET',
      url: 'https://sandbox-quickbooks.api.intuit.com/v3/company/123/companyinfo/123',
    });
  });

  it('should propagate executor failures', async () => {
    const execute = vi.fn<AuthenticatedRequestExecutor['execute']>(async () => {
      throw new TransportError('HTTP status error: 503 - Response: unavailable', { status: 503 });
    });

    await expect(
      fetchCompanyName({ execute }, resolveEndpoints('production'), '123')
    ).rejects.toThrow('HTTP status error: 503 - Response: unavailable');
  });
});
