/**
 * @fileoverview Complete, declarative definition for the 'radflow_fetch_patient_by_id' tool.
 * Looks up a patient's demographics in RadFlow by patient ID.
 *
 * @module src/mcp-server/tools/definitions/radflow-fetch-patient-by-id.tool
 */

import { z } from 'zod';

import { container, RadFlowProvider } from '../../../container/index.js';
import { processPatientData } from '../../../services/radflow/normalization/responseNormalizer.js';
import { PatientDataPayloadSchema } from '../../../services/radflow/types.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { toFailurePayload } from '../utils/toolFailure.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '../utils/toolDefinition.js';

const TOOL_NAME = 'radflow_fetch_patient_by_id';
const TOOL_TITLE = 'Fetch Patient by ID';
const TOOL_DESCRIPTION =
  'Fetches patient information from RadFlow by patient ID. Returns normalized demographic records and a numbered list of matches.';

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
  .describe('Input parameters for a patient lookup by ID.');

const OutputSchema = PatientDataPayloadSchema;

type FetchPatientByIdInput = z.infer<typeof InputSchema>;
type FetchPatientByIdOutput = z.infer<typeof OutputSchema>;

async function fetchPatientByIdLogic(
  input: FetchPatientByIdInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<FetchPatientByIdOutput> {
  logger.info(`Fetching patient data for ID: ${input.patientId}`, appContext);

  const provider = container.resolve(RadFlowProvider);

  try {
    const raw = await provider.searchPatients(
      { patientId: input.patientId },
      appContext,
    );
    const result = processPatientData(raw, '');

    if (result.success) {
      logger.info(`Retrieved patient data: ${result.message ?? ''}`, appContext);
    } else {
      logger.warning(`Patient lookup returned no data: ${result.error ?? ''}`, appContext);
    }
    return result;
  } catch (error) {
    return toFailurePayload(error, 'fetch patient data', appContext);
  }
}

export const fetchPatientByIdTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: fetchPatientByIdLogic,
};
