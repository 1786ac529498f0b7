/**
 * @fileoverview Complete, declarative definition for the 'radflow_fetch_study_details' tool.
 * Fetches a patient's imaging studies with their latest appointment status.
 *
 * @module src/mcp-server/tools/definitions/radflow-fetch-study-details.tool
 */

import { z } from 'zod';

import { container, RadFlowProvider } from '../../../container/index.js';
import { processStudyData } from '../../../services/radflow/normalization/responseNormalizer.js';
import { StudyDataPayloadSchema } from '../../../services/radflow/types.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { toFailurePayload } from '../utils/toolFailure.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '../utils/toolDefinition.js';

const TOOL_NAME = 'radflow_fetch_study_details';
const TOOL_TITLE = 'Fetch Study Details';
const TOOL_DESCRIPTION =
  "Fetches a patient's imaging studies from RadFlow: description, modality, facility, appointment time and the latest appointment status.";

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
      .describe('The RadFlow patient ID whose studies to fetch.'),
  })
  .describe('Input parameters for a study lookup.');

const OutputSchema = StudyDataPayloadSchema;

type FetchStudyDetailsInput = z.infer<typeof InputSchema>;
type FetchStudyDetailsOutput = z.infer<typeof OutputSchema>;

async function fetchStudyDetailsLogic(
  input: FetchStudyDetailsInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<FetchStudyDetailsOutput> {
  logger.info(`Fetching study details for patient ID: ${input.patientId}`, appContext);

  const provider = container.resolve(RadFlowProvider);

  try {
    const raw = await provider.fetchStudyDetails(input.patientId, appContext);
    return processStudyData(raw, input.patientId);
  } catch (error) {
    return toFailurePayload(error, 'fetch study details', appContext);
  }
}

export const fetchStudyDetailsTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: fetchStudyDetailsLogic,
};
