/**
 * Shared Application Configuration
 *
 * Centralizes environment access for the HTTP surface and the submission
 * flow. Backend ids and paths live in src/crm/config.ts.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to refuse new submissions
 * - STEP_CHECK_DUPLICATE / STEP_AUDIT_CUSTOMER / STEP_CHECK_OPPORTUNITY_DUPLICATE /
 *   STEP_CREATE_OPPORTUNITY / STEP_CREATE_TASKS: Set to 'false' to switch a step off
 * - CRM_CALL_TIMEOUT_MS: Per-call timeout for backend requests (default 15000)
 * - PORT: HTTP server port (default 3000)
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  submission: {
    callTimeoutMs: number;
    steps: {
      checkDuplicate: boolean;
      auditCustomer: boolean;
      checkOpportunityDuplicate: boolean;
      createOpportunity: boolean;
      createTasks: boolean;
    };
  };
  server: {
    port: number;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

function flagEnv(key: string, fallback: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() !== 'false';
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  submission: {
    callTimeoutMs: parseInt(optionalEnv('CRM_CALL_TIMEOUT_MS', '15000'), 10),
    steps: {
      checkDuplicate: flagEnv('STEP_CHECK_DUPLICATE', true),
      auditCustomer: flagEnv('STEP_AUDIT_CUSTOMER', true),
      checkOpportunityDuplicate: flagEnv('STEP_CHECK_OPPORTUNITY_DUPLICATE', true),
      createOpportunity: flagEnv('STEP_CREATE_OPPORTUNITY', true),
      createTasks: flagEnv('STEP_CREATE_TASKS', true),
    },
  },
  server: {
    port: parseInt(optionalEnv('PORT', '3000'), 10),
  },
};

/**
 * Checks the numeric settings. Call at startup next to the CRM validateConfig.
 * Throws with every malformed variable listed.
 */
export function validateAppConfig(config: AppConfig = appConfig): void {
  const problems: string[] = [];
  if (!Number.isInteger(config.submission.callTimeoutMs) || config.submission.callTimeoutMs <= 0) {
    problems.push('CRM_CALL_TIMEOUT_MS (must be a positive number of milliseconds)');
  }
  if (!Number.isInteger(config.server.port) || config.server.port <= 0) {
    problems.push('PORT (must be a positive integer)');
  }

  if (problems.length > 0) {
    throw new Error(`App config invalid:\n${problems.map((p) => `  - ${p}`).join('\n')}`);
  }
}
