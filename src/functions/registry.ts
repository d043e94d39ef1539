/**
 * Function registry: name, command, arguments and help text of every
 * caller-facing function. Hosts build their registrations from this list.
 */

import type { FunctionDescriptor, FunctionName } from './types'

const ISIN_ARG = { name: 'isin', description: 'ISIN code (e.g. GB00BYZW3G56)', kind: 'string' } as const

export const FUNCTION_REGISTRY: readonly FunctionDescriptor[] = [
  {
    name: 'BONDSTATIC',
    command: 'static',
    summary: 'Get a single field value',
    lookup: true,
    args: [
      ISIN_ARG,
      { name: 'field', description: 'Field name or shorthand (coupon, maturity, type...)', kind: 'string' }
    ]
  },
  {
    name: 'BONDINFO',
    command: 'info',
    summary: 'Get all fields as a row',
    lookup: true,
    args: [
      ISIN_ARG,
      { name: 'withHeaders', description: 'Include a header row', kind: 'boolean', optional: true }
    ]
  },
  {
    name: 'BONDLIST',
    command: 'list',
    summary: 'List ISINs by country',
    args: [
      { name: 'country', description: 'Country code: US, GB, DE, FR, IT, ES, JP, NL', kind: 'string' },
      { name: 'securityType', description: 'NOMINAL or INDEX_LINKED', kind: 'string', optional: true },
      { name: 'limit', description: 'Max results (default: 500, at most 1000)', kind: 'number', optional: true }
    ]
  },
  {
    name: 'BONDSEARCH',
    command: 'search',
    summary: 'Search with filters',
    args: [
      {
        name: 'filters',
        description: 'Field/value pairs, up to three (country DE currency EUR)',
        kind: 'string',
        variadic: true
      }
    ]
  },
  {
    name: 'BONDCOUNT',
    command: 'count',
    summary: 'Count bonds',
    volatile: true,
    args: [{ name: 'country', description: 'Country code to filter by', kind: 'string', optional: true }]
  },
  {
    name: 'BONDYEARSTOMAT',
    command: 'years-to-maturity',
    summary: 'Years to maturity',
    lookup: true,
    args: [
      ISIN_ARG,
      { name: 'asOf', description: 'Calculation date, YYYY-MM-DD (default: today)', kind: 'string', optional: true }
    ]
  },
  {
    name: 'BONDMATURITYRANGE',
    command: 'maturity-range',
    summary: 'Bonds maturing in date range',
    args: [
      { name: 'fromDate', description: 'Start date (YYYY-MM-DD)', kind: 'string' },
      { name: 'toDate', description: 'End date (YYYY-MM-DD)', kind: 'string' },
      { name: 'country', description: 'Country code to filter by', kind: 'string', optional: true }
    ]
  },
  {
    name: 'BONDCOUPONFREQ',
    command: 'coupon-frequency',
    summary: 'Payment frequency text',
    lookup: true,
    args: [ISIN_ARG]
  },
  {
    name: 'BONDISLINKER',
    command: 'is-linker',
    summary: 'Check if inflation-linked',
    lookup: true,
    args: [ISIN_ARG]
  },
  {
    name: 'BONDREFRESH',
    command: 'refresh',
    summary: 'Refresh data from sources',
    volatile: true,
    args: [
      { name: 'country', description: 'Country to refresh (blank for all)', kind: 'string', optional: true },
      { name: 'apiKey', description: 'API key (default: configured key)', kind: 'string', optional: true }
    ]
  },
  {
    name: 'BONDLINEAGE',
    command: 'lineage',
    summary: 'Data source attribution',
    args: [
      ISIN_ARG,
      { name: 'field', description: 'Field to check (default: summary)', kind: 'string', optional: true }
    ]
  },
  {
    name: 'BONDHISTORY',
    command: 'history',
    summary: 'Change history',
    args: [
      ISIN_ARG,
      { name: 'limit', description: 'Max records (default: 10)', kind: 'number', optional: true }
    ]
  },
  {
    name: 'BONDACTIONS',
    command: 'actions',
    summary: 'Corporate actions',
    volatile: true,
    args: [
      { name: 'actionType', description: 'MATURED, CALLED or COUPON_CHANGE', kind: 'string', optional: true },
      { name: 'daysAhead', description: 'For maturities: days to look ahead (default: 30)', kind: 'number', optional: true }
    ]
  },
  {
    name: 'BONDAPI_STATUS',
    command: 'api-status',
    summary: 'Check API connection',
    volatile: true,
    args: []
  },
  {
    name: 'BONDCACHE_CLEAR',
    command: 'cache-clear',
    summary: 'Clear cache',
    volatile: true,
    args: []
  },
  {
    name: 'BONDCACHE_STATS',
    command: 'cache-stats',
    summary: 'Cache statistics',
    volatile: true,
    args: []
  },
  {
    name: 'BONDHELP',
    command: 'reference',
    summary: 'This help',
    args: [
      { name: 'topic', description: 'fields, countries or functions', kind: 'string', optional: true }
    ]
  },
  {
    name: 'BONDISVALID',
    command: 'is-valid',
    summary: 'Validate an ISIN',
    args: [{ name: 'isin', description: 'ISIN to validate', kind: 'string' }]
  }
]

export function getFunctionDescriptor(name: FunctionName): FunctionDescriptor | undefined {
  return FUNCTION_REGISTRY.find((descriptor) => descriptor.name === name)
}
