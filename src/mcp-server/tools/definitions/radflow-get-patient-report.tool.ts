/**
 * @fileoverview Complete, declarative definition for the 'radflow_get_patient_report' tool.
 *
 * @module src/mcp-server/tools/definitions/radflow-get-patient-report.tool
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

const TOOL_NAME = 'radflow_get_patient_report';
const TOOL_TITLE = 'Get Patient Report';
const TOOL_DESCRIPTION =
  "Fetches the radiology report information RadFlow holds for a patient. The upstream response is returned unchanged under `data`.";

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
  .describe('Input parameters for fetching a patient report.');

const OutputSchema = UpstreamDataPayloadSchema;

type GetPatientReportInput = z.infer<typeof InputSchema>;
type GetPatientReportOutput = z.infer<typeof OutputSchema>;

async function getPatientReportLogic(
  input: GetPatientReportInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<GetPatientReportOutput> {
  logger.info(`Fetching patient report for patient ID: ${input.patientId}`, appContext);

  const provider = container.resolve(RadFlowProvider);

  try {
    const data = await provider.getPatientReport(input.patientId, appContext);
    return { success: true, data };
  } catch (error) {
    return toFailurePayload(error, 'fetch patient report', appContext);
  }
}

export const getPatientReportTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getPatientReportLogic,
};
