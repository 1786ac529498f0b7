/**
 * @fileoverview Complete, declarative definition for the 'radflow_get_lien_bill_balance' tool.
 * Fetches lien bill balance details for a patient.
 *
 * @module src/mcp-server/tools/definitions/radflow-get-lien-bill-balance.tool
 */

import { z } from 'zod';

import { container, RadFlowProvider } from '../../../container/index.js';
import { UpstreamDataPayloadSchema } from '../../../services/radflow/types.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { toFailurePayload } from '../utils/toolFailure.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '../utils/toolDefinition.js';

const TOOL_NAME = 'radflow_get_lien_bill_balance';
const TOOL_TITLE = 'Get Lien Bill Balance';
const TOOL_DESCRIPTION =
  "Fetches a patient's lien bill balance details from RadFlow. The upstream response is returned unchanged under `data`.";

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    patientId: z
      .string()
      .min(1, 'Patient ID is required.')
      .describe('The RadFlow patient ID.'),
  })
  .describe('Input parameters for fetching a lien bill balance.');

const OutputSchema = UpstreamDataPayloadSchema;

type GetLienBillBalanceInput = z.infer<typeof InputSchema>;
type GetLienBillBalanceOutput = z.infer<typeof OutputSchema>;

async function getLienBillBalanceLogic(
  input: GetLienBillBalanceInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<GetLienBillBalanceOutput> {
  logger.info(
    `Fetching lien bill balance details for patient ID: ${input.patientId}`,
    appContext,
  );

  const provider = container.resolve(RadFlowProvider);

  try {
    const data = await provider.getPatientLienBillBalance(
      input.patientId,
      appContext,
    );
    logger.info('Retrieved lien bill balance details.', appContext);
    return { success: true, data };
  } catch (error) {
    return toFailurePayload(error, 'fetch lien bill balance', appContext);
  }
}

export const getLienBillBalanceTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getLienBillBalanceLogic,
};
