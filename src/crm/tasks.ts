// ============================================================================
// CRM Tasks Service — Installation, renewal and filter-change follow-up tasks
// ============================================================================

import { addDays, addMonths, parseIsoDate, toIsoDate } from '../context/index.js';
import type { SubmissionContext } from '../context/index.js';
import { crmConfig, devPrefix } from './config.js';
import { asRecord, crmPost, pickString } from './client.js';
import type { CrmCallOptions } from './client.js';
import type { CrmEnvelope, FollowUpTask } from './types/index.js';

export interface TaskPlanInput {
  context: SubmissionContext;
  /** Resolved through the identifier chain, never read from a response directly */
  customerId: string;
  opportunityId?: string;
  opportunityStage?: string;
  /** Reference "today" used when the notes carry no usable date */
  now?: Date;
  /** `data` of the opportunity response; its item list carries replacement dates */
  opportunityData?: unknown;
}

// ============================================================================
// Filter Replacement
// ============================================================================

export interface ReplacementDue {
  /** YYYY-MM-DD */
  date: string;
  productName: string | undefined;
}

function isoDatePart(value: string | undefined): string | undefined {
  const date = /^\d{4}-\d{2}-\d{2}/.exec(value ?? '')?.[0];
  return date && parseIsoDate(date) ? date : undefined;
}

function fromCycle(installed: string | undefined, cycleMonths: string | undefined): string | undefined {
  const base = isoDatePart(installed);
  const months = Number(cycleMonths);
  if (!base || !Number.isInteger(months) || months <= 0) return undefined;
  return addMonths(base, months);
}

/**
 * The next filter replacement among the opportunity's items.
 *
 * Each item's date is its next-replacement field (`bodyDef.define3`, else
 * `opptItemDefineCharacter.attrext13`), else its install date
 * (`bodyDef.define1`) plus its cycle in months (`bodyDef.define2`). The
 * earliest date on or after today wins; when all are past, the earliest.
 */
export function findNextReplacement(opportunityData: unknown, today: string): ReplacementDue | undefined {
  const items = asRecord(opportunityData)?.opptItemList;
  if (!Array.isArray(items)) return undefined;

  const candidates: ReplacementDue[] = [];
  for (const item of items.map(asRecord)) {
    if (!item) continue;
    const body = asRecord(item.bodyDef);
    const date =
      isoDatePart(pickString(body, ['define3'])) ??
      isoDatePart(pickString(asRecord(item.opptItemDefineCharacter), ['attrext13'])) ??
      fromCycle(pickString(body, ['define1']), pickString(body, ['define2']));
    if (!date) continue;

    const productName =
      pickString(body, ['productName']) ??
      pickString(item, ['productName', 'product_name', 'product']) ??
      pickString(body, ['name']);
    candidates.push({ date, productName });
  }

  const upcoming = candidates.filter((candidate) => candidate.date >= today);
  const pool = upcoming.length > 0 ? upcoming : candidates;
  return pool.reduce<ReplacementDue | undefined>(
    (earliest, candidate) => (earliest === undefined || candidate.date < earliest.date ? candidate : earliest),
    undefined,
  );
}

// ============================================================================
// Planning (pure)
// ============================================================================

/**
 * Decides which follow-up tasks a submission needs.
 *
 * - install: always. Starts on the install date, else the opportunity date,
 *   else today. Content is the original notes, else a short summary.
 * - renew: only when the contract end date is known. Falls due
 *   `renewLeadDays` before the contract ends.
 * - filter-change: only when the opportunity's items carry a replacement
 *   date. Falls due `filterLeadDays` before it; content is the product
 *   name, or 更換濾芯 when the name is missing or a bare product number.
 */
export function planFollowUpTasks(input: TaskPlanInput): FollowUpTask[] {
  const { context, customerId } = input;
  const customerName = context.get('customerName') ?? context.get('customerCode') ?? customerId;
  const installDate = /^\d{4}-\d{2}-\d{2}/.exec(context.get('installTime') ?? '')?.[0];
  const startDate =
    installDate ?? context.get('opportunityDate') ?? context.get('expectSignDate') ?? toIsoDate(input.now ?? new Date());

  const summaryFields: Array<[string, string | undefined]> = [
    ['客戶', customerName],
    ['方案', context.get('planType')],
    ['地址', context.get('installLocation')],
    ['內容', context.get('remark')],
  ];
  const summaryLines = summaryFields
    .filter((entry): entry is [string, string] => entry[1] !== undefined)
    .map(([label, value]) => `${label}：${value}`);

  const tasks: FollowUpTask[] = [
    {
      kind: 'install',
      title: devPrefix(`新增項目 ${customerName}`),
      typeId: crmConfig.tasks.installTypeId,
      customerId,
      customerName,
      opportunityId: input.opportunityId,
      opportunityStage: input.opportunityStage,
      startDate,
      endDate: startDate,
      content: context.get('rawText') ?? summaryLines.join('\n'),
    },
  ];

  const contractEnd = context.get('contractEndDate');
  const renewDate = contractEnd ? addDays(contractEnd, -crmConfig.tasks.renewLeadDays) : undefined;
  if (contractEnd && renewDate) {
    tasks.push({
      kind: 'renew',
      title: devPrefix(`續約跟進 ${customerName}`),
      typeId: crmConfig.tasks.renewTypeId,
      customerId,
      customerName,
      opportunityId: input.opportunityId,
      opportunityStage: input.opportunityStage,
      startDate: renewDate,
      endDate: renewDate,
      content: `合約到期日：${contractEnd}`,
    });
  }

  const replacement = findNextReplacement(input.opportunityData, toIsoDate(input.now ?? new Date()));
  const filterDate = replacement ? addDays(replacement.date, -crmConfig.tasks.filterLeadDays) : undefined;
  if (replacement && filterDate) {
    const productName = replacement.productName;
    tasks.push({
      kind: 'filter-change',
      title: devPrefix(`更換濾芯 ${customerName}`),
      typeId: crmConfig.tasks.filterTypeId,
      customerId,
      customerName,
      opportunityId: input.opportunityId,
      opportunityStage: input.opportunityStage,
      startDate: filterDate,
      endDate: filterDate,
      content: productName && !/^\d+$/.test(productName) ? productName : '更換濾芯',
    });
  }

  return tasks;
}

/** Render a planned task into the backend's task request body */
export function toTaskRequestBody(task: FollowUpTask): { data: Record<string, unknown> } {
  const data: Record<string, unknown> = {
    systemSource: crmConfig.systemSource,
    org: crmConfig.orgId,
    dept: crmConfig.deptId,
    taskTransType: task.typeId,
    summary: task.title,
    content: task.content,
    startDate: `${task.startDate} 00:00:00`,
    endDate: `${task.endDate} 23:59:59`,
    customer: task.customerId,
    customer_name: task.customerName,
    originator: crmConfig.tasks.ownerId,
    ower: crmConfig.tasks.ownerId,
    taskExecutorList: crmConfig.tasks.executorIds.map((executor) => ({ executor, _status: 'Insert' })),
    taskRemindRuleList: [{ remindPoint: '0', advanceTime: '0', timeUnit: '0', _status: 'Insert' }],
    _status: 'Insert',
  };
  if (task.opportunityId) data.oppt = task.opportunityId;
  if (task.opportunityStage) data.opptStage = task.opportunityStage;
  return { data };
}

// ============================================================================
// Creation
// ============================================================================

/** Creates one follow-up task. */
export async function createTask(task: FollowUpTask, options: CrmCallOptions = {}): Promise<CrmEnvelope> {
  return crmPost(crmConfig.paths.taskSave, toTaskRequestBody(task), options);
}
