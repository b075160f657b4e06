// ============================================================================
// Submission Orchestrator — Customer, audit, opportunity and follow-up tasks
// ============================================================================

import {
  ExternalServiceError,
  extractApplicationId,
  extractCreatedCustomerId,
  isDuplicateRuleMissingError,
  isPendingApplicationError,
  planFollowUpTasks,
  readOpportunityResult,
  suggestCustomerCode,
} from '../crm/index.js';
import type {
  CrmCallOptions,
  CrmCustomerMatch,
  CrmEnvelope,
  CrmGateway,
  CrmOpportunityMatch,
  FollowUpTaskKind,
} from '../crm/index.js';
import type { SubmissionContext } from '../context/index.js';
import { IdentifierUnresolved, ValidationError } from './errors.js';
import { createCustomerIdChain } from './identifier-chain.js';
import { sanitizeForLog } from './sanitize.js';
import type {
  StepError,
  StepFlags,
  StepName,
  StepResult,
  SubmissionOptions,
  SubmissionResult,
  SubmissionWarning,
} from './types.js';

export const DEFAULT_STEP_FLAGS: StepFlags = {
  checkDuplicate: true,
  auditCustomer: true,
  checkOpportunityDuplicate: true,
  createOpportunity: true,
  createTasks: true,
};

// ============================================================================
// Step Results
// ============================================================================

export function toStepError(error: unknown): StepError {
  if (error instanceof ExternalServiceError) {
    return {
      name: error.name,
      message: error.message,
      retryable: error.retryable,
      ...(error.backendCode !== undefined ? { backendCode: error.backendCode } : {}),
    };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message, retryable: false };
  }
  return { name: 'Error', message: String(error), retryable: false };
}

function succeeded(stepName: StepName, responseData: unknown): StepResult {
  return { stepName, success: true, skipped: false, responseData };
}

function failed(stepName: StepName, error: unknown, responseData?: unknown): StepResult {
  return {
    stepName,
    success: false,
    skipped: false,
    ...(responseData !== undefined ? { responseData } : {}),
    error: toStepError(error),
  };
}

function skipped(stepName: StepName, reason: string, details: Record<string, unknown> = {}): StepResult {
  return { stepName, success: false, skipped: true, responseData: { reason, ...details } };
}

function logStep(step: StepResult): void {
  if (step.skipped) {
    console.log(`[orchestrator] ${step.stepName} skipped`, sanitizeForLog(step.responseData));
  } else if (step.success) {
    console.log(`[orchestrator] ${step.stepName} succeeded`);
  } else {
    console.error(`[orchestrator] ${step.stepName} failed: ${step.error?.message ?? 'Unknown error'}`, {
      retryable: step.error?.retryable,
      backendCode: step.error?.backendCode,
    });
  }
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Run the backend steps for one submission.
 *
 * A failing step is recorded and never undoes an earlier one. Steps that
 * depend on a failed step are recorded as skipped. Every value a step
 * learns (customer id, opportunity id and stage) goes into the context with
 * setIfAbsent.
 *
 * Only one failure escapes: an IdentifierUnresolved while preparing the
 * follow-up tasks, raised with `partialResult` holding everything gathered
 * so far.
 *
 * @param context - Built by buildContext; mutated as ids become known
 * @param gateway - Backend operations (HTTP in production, a fake in tests)
 */
export async function runSubmission(
  context: SubmissionContext,
  gateway: CrmGateway,
  options: SubmissionOptions = {},
): Promise<SubmissionResult> {
  const flags: StepFlags = { ...DEFAULT_STEP_FLAGS, ...options.steps };
  const call: CrmCallOptions = options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {};
  const chain = createCustomerIdChain((code) => gateway.lookupCustomerIdByCode(code, call));

  const steps: StepResult[] = [];
  const warnings: SubmissionWarning[] = [];

  const record = (step: StepResult): void => {
    steps.push(step);
    logStep(step);
  };

  const snapshot = (): SubmissionResult => {
    const conflictWarnings: SubmissionWarning[] = context.conflicts.map((conflict) => ({
      code: 'context-conflict',
      message: `${conflict.key} kept "${conflict.kept}", refused "${conflict.rejected}"`,
    }));
    return { steps: [...steps], context: context.toRecord(), warnings: [...warnings, ...conflictWarnings] };
  };

  /** Resolve the customer id through the chain and report any divergent source */
  const resolveCustomerId = async (step: StepName, response: CrmEnvelope | undefined): Promise<string> => {
    const resolution = await chain.resolve(context, response);
    context.setIfAbsent('customerId', resolution.value);

    for (const divergent of resolution.divergent) {
      const message =
        `customerId from ${divergent.source} (${divergent.value}) differs from ` +
        `${resolution.source} (${resolution.value}); kept ${resolution.source}`;
      console.warn(`[orchestrator] ${step}: ${message}`);
      warnings.push({ code: 'divergent-identifier', step, message });
    }
    return resolution.value;
  };

  // --------------------------------------------------------------------------
  // 1-2. Customer: duplicate check, then application
  // --------------------------------------------------------------------------

  let customerReady = false;
  let customerResponse: CrmEnvelope | undefined;
  const knownCustomerId = context.get('customerId');

  if (knownCustomerId) {
    record(skipped('CheckDuplicate', 'customerId already known', { customerId: knownCustomerId }));
    record(skipped('CreateCustomer', 'customerId already known', { customerId: knownCustomerId }));
    customerReady = true;
  } else {
    let duplicate: CrmCustomerMatch | null = null;
    let checkFailed = false;

    if (!flags.checkDuplicate) {
      record(skipped('CheckDuplicate', 'disabled'));
    } else {
      try {
        duplicate = await gateway.findDuplicateCustomer(context, call);
        record(succeeded('CheckDuplicate', { duplicate }));
      } catch (error) {
        checkFailed = true;
        record(failed('CheckDuplicate', error));
      }
    }

    if (checkFailed) {
      record(skipped('CreateCustomer', 'duplicate check failed'));
    } else if (duplicate) {
      context.setIfAbsent('customerId', duplicate.id);
      context.setIfAbsent('customerCode', duplicate.code);
      record(skipped('CreateCustomer', 'existing customer reused', { customerId: duplicate.id }));
      customerReady = true;
    } else {
      try {
        if (!context.has('customerCode') && !context.has('customerName')) {
          throw new ValidationError('CreateCustomer', ['customerCode', 'customerName']);
        }
        customerResponse = await gateway.createCustomer(context, call);
        context.setIfAbsent('customerId', extractCreatedCustomerId(customerResponse));
        record(succeeded('CreateCustomer', customerResponse.data));
        customerReady = true;
      } catch (error) {
        if (isPendingApplicationError(error)) {
          // The context is write-once, so the new code is only suggested for a resubmission
          const suggestedCustomerCode = suggestCustomerCode(context.get('customerCode'), options.now);
          warnings.push({
            code: 'pending-application',
            step: 'CreateCustomer',
            message: `customer code already has an application under review; resubmit as ${suggestedCustomerCode}`,
          });
          record(failed('CreateCustomer', error, { pendingApplication: true, suggestedCustomerCode }));
        } else {
          record(failed('CreateCustomer', error));
        }
      }
    }
  }

  // --------------------------------------------------------------------------
  // 3. Audit the new application
  // --------------------------------------------------------------------------

  if (!customerResponse) {
    record(skipped('AuditCustomer', 'no application submitted'));
  } else if (!flags.auditCustomer) {
    record(skipped('AuditCustomer', 'disabled'));
  } else {
    const applicationId = extractApplicationId(customerResponse);
    if (!applicationId) {
      record(skipped('AuditCustomer', 'application id missing'));
    } else {
      // An unaudited application still lets the opportunity go through
      try {
        const audit = await gateway.auditCustomerApplication(applicationId, call);
        record(succeeded('AuditCustomer', audit.data));
      } catch (error) {
        record(failed('AuditCustomer', error));
      }
    }
  }

  // --------------------------------------------------------------------------
  // 4. Opportunity duplicate check
  // --------------------------------------------------------------------------

  let existingOpportunity: CrmOpportunityMatch | null = null;
  let opportunityCheckFailed = false;

  if (!customerReady) {
    record(skipped('CheckOpportunityDuplicate', 'customer step did not complete'));
  } else if (!flags.checkOpportunityDuplicate || !flags.createOpportunity) {
    record(skipped('CheckOpportunityDuplicate', 'disabled'));
  } else {
    try {
      existingOpportunity = await gateway.findDuplicateOpportunity(context, call);
      record(succeeded('CheckOpportunityDuplicate', { duplicate: existingOpportunity }));
    } catch (error) {
      if (isDuplicateRuleMissingError(error)) {
        const { backendCode } = toStepError(error);
        record(skipped('CheckOpportunityDuplicate', 'duplicate rule not configured', { backendCode }));
      } else {
        opportunityCheckFailed = true;
        record(failed('CheckOpportunityDuplicate', error));
      }
    }
  }

  // --------------------------------------------------------------------------
  // 5. Opportunity
  // --------------------------------------------------------------------------

  let opportunityResponse: CrmEnvelope | undefined;
  let opportunityFailed = false;

  if (!flags.createOpportunity) {
    record(skipped('CreateOpportunity', 'disabled'));
  } else if (!customerReady) {
    record(skipped('CreateOpportunity', 'customer step did not complete'));
    opportunityFailed = true;
  } else if (opportunityCheckFailed) {
    record(skipped('CreateOpportunity', 'opportunity duplicate check failed'));
    opportunityFailed = true;
  } else if (existingOpportunity) {
    context.setIfAbsent('opptId', existingOpportunity.id);
    context.setIfAbsent('opptStage', existingOpportunity.stage);
    record(skipped('CreateOpportunity', 'existing opportunity reused', { opptId: existingOpportunity.id }));
  } else {
    try {
      await resolveCustomerId('CreateOpportunity', customerResponse);
      opportunityResponse = await gateway.createOpportunity(context, call);
      const opportunity = readOpportunityResult(opportunityResponse);
      context.setIfAbsent('opptId', opportunity.opportunityId);
      context.setIfAbsent('opptStage', opportunity.opportunityStage);
      record(succeeded('CreateOpportunity', opportunityResponse.data));
    } catch (error) {
      opportunityFailed = true;
      record(failed('CreateOpportunity', error));
    }
  }

  // --------------------------------------------------------------------------
  // 6. Follow-up tasks
  // --------------------------------------------------------------------------

  if (!flags.createTasks) {
    record(skipped('CreateTasks', 'disabled'));
    return snapshot();
  }
  if (!customerReady || opportunityFailed) {
    record(skipped('CreateTasks', customerReady ? 'opportunity step did not complete' : 'customer step did not complete'));
    return snapshot();
  }

  let customerId: string;
  try {
    customerId = await resolveCustomerId('CreateTasks', opportunityResponse ?? customerResponse);
  } catch (error) {
    record(failed('CreateTasks', error));
    if (error instanceof IdentifierUnresolved) {
      throw new IdentifierUnresolved(error.identifier, error.observed, snapshot());
    }
    return snapshot();
  }

  const tasks = planFollowUpTasks({
    context,
    customerId,
    opportunityId: context.get('opptId'),
    opportunityStage: context.get('opptStage'),
    now: options.now,
    opportunityData: opportunityResponse?.data,
  });

  const created: Array<{ kind: FollowUpTaskKind; data: unknown }> = [];
  try {
    for (const task of tasks) {
      const envelope = await gateway.createTask(task, call);
      created.push({ kind: task.kind, data: envelope.data });
    }
    record(succeeded('CreateTasks', { tasks: created }));
  } catch (error) {
    record(failed('CreateTasks', error, { tasks: created }));
  }

  return snapshot();
}
