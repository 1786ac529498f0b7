/**
 * @fileoverview Complete, declarative definition for the 'radflow_get_case_update_details' tool.
 * Returns the case update history RadFlow holds for a patient.
 *
 * @module src/mcp-server/tools/definitions/radflow-get-case-update-details.tool
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

const TOOL_NAME = 'radflow_get_case_update_details';
const TOOL_TITLE = 'Get Case Update Details';
const TOOL_DESCRIPTION =
  'Fetches case update details (liability, payment and settlement events) for a patient. The upstream response is returned unchanged under `data`.';

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
  .describe('Input parameters for fetching case update details.');

const OutputSchema = UpstreamDataPayloadSchema;

type GetCaseUpdateDetailsInput = z.infer<typeof InputSchema>;
type GetCaseUpdateDetailsOutput = z.infer<typeof OutputSchema>;

async function getCaseUpdateDetailsLogic(
  input: GetCaseUpdateDetailsInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<GetCaseUpdateDetailsOutput> {
  logger.info(
    `Fetching case update details for patient ID: ${input.patientId}`,
    appContext,
  );

  const provider = container.resolve(RadFlowProvider);

  try {
    const data = await provider.getCaseUpdateDetails(input.patientId, appContext);
    return { success: true, data };
  } catch (error) {
    return toFailurePayload(error, 'fetch case update details', appContext);
  }
}

export const getCaseUpdateDetailsTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getCaseUpdateDetailsLogic,
};
