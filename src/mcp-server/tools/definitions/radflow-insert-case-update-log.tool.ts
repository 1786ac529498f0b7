/**
 * @fileoverview Complete, declarative definition for the 'radflow_insert_case_update_log' tool.
 * Records a case update event. Some events carry required companion fields,
 * checked before anything is sent upstream.
 *
 * @module src/mcp-server/tools/definitions/radflow-insert-case-update-log.tool
 */

import { z } from 'zod';

import { container, RadFlowProvider } from '../../../container/index.js';
import {
  UpstreamDataPayloadSchema,
  type CaseUpdateLogEntry,
} from '../../../services/radflow/types.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { toFailurePayload } from '../utils/toolFailure.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '../utils/toolDefinition.js';

const TOOL_NAME = 'radflow_insert_case_update_log';
const TOOL_TITLE = 'Insert Case Update Log';
const TOOL_DESCRIPTION =
  'Inserts a case update log entry for a patient. Event 2 requires liabilityExpectedDate, 5 requires expectedPaymentDate, 6 requires paymentDateSent, checkNumber and checkAmount, 7 requires notes, 20 requires sendPaymentOfEstimatedDate. Dates use MM/DD/YYYY.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  destructiveHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

const dateField = (description: string) =>
  z.string().optional().describe(`${description} (MM/DD/YYYY).`);

const InputSchema = z
  .object({
    patientId: z
      .string()
      .min(1, 'Patient ID is required.')
      .describe('The RadFlow patient ID.'),
    userName: z
      .string()
      .min(1, 'User name is required.')
      .describe('Name of the user recording the event.'),
    eventId: z.number().int().describe('Case update event ID.'),
    notes: z.string().optional().describe('Free-text notes for the entry.'),
    liabilityExpectedDate: dateField('Expected liability clearance date'),
    expectedPaymentDate: dateField('Expected payment date'),
    paymentDateSent: dateField('Date the payment was sent'),
    checkNumber: z.string().optional().describe('Check number.'),
    checkAmount: z.number().optional().describe('Check amount.'),
    sendPaymentOfEstimatedDate: dateField('Estimated date for sending payment'),
  })
  .describe('Input parameters for a case update log entry.');

const OutputSchema = UpstreamDataPayloadSchema;

type InsertCaseUpdateLogInput = z.infer<typeof InputSchema>;
type InsertCaseUpdateLogOutput = z.infer<typeof OutputSchema>;

/**
 * Returns the validation message for an entry missing an event's required
 * fields, or `undefined` when the entry is complete. Empty strings count as missing.
 */
export function findMissingEventFields(
  entry: CaseUpdateLogEntry,
): string | undefined {
  switch (entry.eventId) {
    case 2:
      return entry.liabilityExpectedDate
        ? undefined
        : 'liabilityExpectedDate is required for eventId 2';
    case 5:
      return entry.expectedPaymentDate
        ? undefined
        : 'expectedPaymentDate is required for eventId 5';
    case 6:
      return entry.paymentDateSent &&
        entry.checkNumber &&
        entry.checkAmount !== undefined
        ? undefined
        : 'paymentDateSent, checkNumber, and checkAmount are required for eventId 6';
    case 7:
      return entry.notes ? undefined : 'notes is required for eventId 7';
    case 20:
      return entry.sendPaymentOfEstimatedDate
        ? undefined
        : 'sendPaymentOfEstimatedDate is required for eventId 20';
    default:
      return undefined;
  }
}

async function insertCaseUpdateLogLogic(
  input: InsertCaseUpdateLogInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<InsertCaseUpdateLogOutput> {
  logger.info(
    `Inserting case update log for patient ID: ${input.patientId}, event ID: ${input.eventId}`,
    appContext,
  );

  const missing = findMissingEventFields(input);
  if (missing) {
    logger.warning(`Rejected case update log: ${missing}`, appContext);
    return { success: false, error: missing };
  }

  const provider = container.resolve(RadFlowProvider);

  try {
    const data = await provider.insertCaseUpdateLog(input, appContext);
    return { success: true, data };
  } catch (error) {
    return toFailurePayload(error, 'insert case update log', appContext);
  }
}

export const insertCaseUpdateLogTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: insertCaseUpdateLogLogic,
};
