export const RATE_LIMIT_ALLOWLIST = ['127.0.0.1', '::1'];

export const SEARCH_ROUTE_RATE_LIMIT = { max: 30, timeWindow: '1 minute' };

export const PUBLIC_ROUTE_PREFIXES = ['/health', '/ready'];

export const API_INFO = {
  name: 'Hybrid Text Search API',
  version: '1.0.0'
};
