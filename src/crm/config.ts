import 'dotenv/config';

export type AppEnv = 'development' | 'production';

export interface CrmConfig {
  appEnv: AppEnv;
  isDev: boolean;
  baseUrl: string;
  accessToken: string;
  systemSource: string;
  orgId: string;
  deptId: string;
  ownerId: string;
  defaultCurrency: string;
  customerApplyTransType: string;
  opportunity: {
    transType: string;
    /** Stage ids by usage mode */
    stageIds: {
      rent: string;
      buy: string;
    };
    defaultWinningRate: string;
  };
  tasks: {
    ownerId: string;
    installTypeId: string;
    renewTypeId: string;
    filterTypeId: string;
    executorIds: string[];
    /** Days before contract end that the renewal task falls due */
    renewLeadDays: number;
    /** Days before the next filter replacement that its task falls due */
    filterLeadDays: number;
  };
  paths: {
    customerDuplicateCheck: string;
    customerApply: string;
    customerAudit: string;
    customerLookup: string;
    opportunityDuplicateCheck: string;
    opportunityCreate: string;
    taskSave: string;
  };
}

function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function listEnv(key: string): string[] {
  return optionalEnv(key)
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

const appEnv: AppEnv = optionalEnv('APP_ENV', 'development') === 'production' ? 'production' : 'development';

export const crmConfig: CrmConfig = {
  appEnv,
  isDev: appEnv === 'development',
  baseUrl: requiredEnv('CRM_BASE_URL').replace(/\/+$/, ''),
  accessToken: requiredEnv('CRM_ACCESS_TOKEN'),
  systemSource: optionalEnv('CRM_SYSTEM_SOURCE', 'yonbip-cc-ucf'),
  orgId: optionalEnv('CRM_ORG_ID'),
  deptId: optionalEnv('CRM_DEPT_ID'),
  ownerId: optionalEnv('CRM_OWNER_ID'),
  defaultCurrency: optionalEnv('CRM_DEFAULT_CURRENCY', 'MOP'),
  customerApplyTransType: optionalEnv('CRM_CUSTOMER_APPLY_TRANS_TYPE'),
  opportunity: {
    transType: optionalEnv('CRM_OPPORTUNITY_TRANS_TYPE'),
    stageIds: {
      rent: optionalEnv('CRM_OPPORTUNITY_STAGE_RENT'),
      buy: optionalEnv('CRM_OPPORTUNITY_STAGE_BUY'),
    },
    defaultWinningRate: optionalEnv('CRM_OPPORTUNITY_WINNING_RATE', '50'),
  },
  tasks: {
    ownerId: optionalEnv('CRM_TASK_OWNER_ID'),
    installTypeId: optionalEnv('CRM_TASK_TYPE_INSTALL'),
    renewTypeId: optionalEnv('CRM_TASK_TYPE_RENEW'),
    filterTypeId: optionalEnv('CRM_TASK_TYPE_FILTER'),
    executorIds: listEnv('CRM_TASK_EXECUTOR_IDS'),
    renewLeadDays: parseInt(optionalEnv('CRM_RENEW_LEAD_DAYS', '14'), 10),
    filterLeadDays: parseInt(optionalEnv('CRM_FILTER_LEAD_DAYS', '14'), 10),
  },
  paths: {
    customerDuplicateCheck: optionalEnv('CRM_PATH_CUSTOMER_DUPLICATE', '/yonbip/crm/bill/custcheckrepeat'),
    customerApply: optionalEnv('CRM_PATH_CUSTOMER_APPLY', '/yonbip/crm/custaddapply/save'),
    customerAudit: optionalEnv('CRM_PATH_CUSTOMER_AUDIT', '/yonbip/crm/customeraddapply/audit'),
    customerLookup: optionalEnv('CRM_PATH_CUSTOMER_LOOKUP', '/yonbip/crm/followup/list'),
    opportunityDuplicateCheck: optionalEnv('CRM_PATH_OPPORTUNITY_DUPLICATE', '/yonbip/crm/bill/opptcheckrepeat'),
    opportunityCreate: optionalEnv('CRM_PATH_OPPORTUNITY_CREATE', '/yonbip/crm/bill/opptsave'),
    taskSave: optionalEnv('CRM_PATH_TASK_SAVE', '/yonbip/crm/task/save'),
  },
};

const RUNTIME_IDS: ReadonlyArray<[envKey: string, read: (config: CrmConfig) => string]> = [
  ['CRM_ORG_ID', (c) => c.orgId],
  ['CRM_DEPT_ID', (c) => c.deptId],
  ['CRM_OWNER_ID', (c) => c.ownerId],
  ['CRM_OPPORTUNITY_TRANS_TYPE', (c) => c.opportunity.transType],
  ['CRM_OPPORTUNITY_STAGE_RENT', (c) => c.opportunity.stageIds.rent],
  ['CRM_OPPORTUNITY_STAGE_BUY', (c) => c.opportunity.stageIds.buy],
  ['CRM_TASK_OWNER_ID', (c) => c.tasks.ownerId],
  ['CRM_TASK_TYPE_INSTALL', (c) => c.tasks.installTypeId],
  ['CRM_TASK_TYPE_RENEW', (c) => c.tasks.renewTypeId],
  ['CRM_TASK_TYPE_FILTER', (c) => c.tasks.filterTypeId],
];

const DAY_COUNTS: ReadonlyArray<[envKey: string, read: (config: CrmConfig) => number]> = [
  ['CRM_RENEW_LEAD_DAYS', (c) => c.tasks.renewLeadDays],
  ['CRM_FILTER_LEAD_DAYS', (c) => c.tasks.filterLeadDays],
];

/**
 * Validates that all CRM ids required for runtime operation are populated
 * and that day counts are whole, non-negative numbers.
 * Call this at application startup. Throws with a list of all problems.
 */
export function validateConfig(config: CrmConfig = crmConfig): void {
  const missing = RUNTIME_IDS.filter(([, read]) => !read(config)).map(([envKey]) => envKey);
  const malformed = DAY_COUNTS.filter(([, read]) => {
    const days = read(config);
    return !Number.isInteger(days) || days < 0;
  }).map(([envKey]) => envKey);

  if (config.tasks.executorIds.length === 0) {
    console.warn('[CRM config] CRM_TASK_EXECUTOR_IDS is empty; tasks will be created without executors');
  }

  if (missing.length > 0 || malformed.length > 0) {
    const lines = [
      ...missing.map((k) => `  - ${k}`),
      ...malformed.map((k) => `  - ${k} (must be a whole number of days)`),
    ];
    throw new Error(
      `CRM config incomplete. Missing or invalid environment variables:\n` +
      lines.join('\n') +
      `\n\nSee .env.example for the full list.`
    );
  }
}

/** In dev mode, prefixes strings with [TEST] so they are visible and filterable in CRM */
export function devPrefix(text: string): string {
  return crmConfig.isDev ? `[TEST] ${text}` : text;
}
