export type IntuitEnvironment = 'sandbox' | 'production';

export interface IntuitEndpoints {
  tokenUrl: string;
  graphqlUrl: string;
  /** Base of the v3 REST API, without the realm segment */
  restBaseUrl: string;
}

// Intuit serves the token endpoint from one host for both environments.
const TOKEN_URL = 'https://oauth.platform.intuit.com/oauth2/v1/tokens/bearer';

const ENDPOINTS: Record<IntuitEnvironment, IntuitEndpoints> = {
  sandbox: {
    tokenUrl: TOKEN_URL,
    graphqlUrl: 'https://public-e2e.api.intuit.com/2020-04/graphql',
    restBaseUrl: 'https://sandbox-quickbooks.api.intuit.com/v3/company',
  },
  production: {
    tokenUrl: TOKEN_URL,
    graphqlUrl: 'https://public.api.intuit.com/2020-04/graphql',
    restBaseUrl: 'https://quickbooks.api.intuit.com/v3/company',
  },
};

export function resolveEndpoints(environment: IntuitEnvironment): IntuitEndpoints {
  return ENDPOINTS[environment];
}

/**
 * REST company-info-by-id URL for a realm.
 */
export function companyInfoUrl(endpoints: IntuitEndpoints, realmId: string): string {
  const realm = encodeURIComponent(realmId);
  return `${endpoints.restBaseUrl}/${realm}/companyinfo/${realm}`;
}
