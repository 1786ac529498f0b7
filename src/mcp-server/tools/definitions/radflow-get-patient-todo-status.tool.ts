/**
 * @fileoverview Complete, declarative definition for the 'radflow_get_patient_todo_status' tool.
 * Calls the patient portal to-do endpoint, which requires a partner JWT.
 *
 * @module src/mcp-server/tools/definitions/radflow-get-patient-todo-status.tool
 */

import { z } from 'zod';

import { container, RadFlowProvider } from '../../../container/index.js';
import { TodoStatusPayloadSchema } from '../../../services/radflow/types.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { toFailurePayload } from '../utils/toolFailure.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '../utils/toolDefinition.js';

const TOOL_NAME = 'radflow_get_patient_todo_status';
const TOOL_TITLE = 'Get Patient To-Do Status';
const TOOL_DESCRIPTION =
  "Fetches a patient's outstanding to-do items (forms and documents) from the RadFlow patient portal.";

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    patientId: z
      .string()
      .min(1, 'Patient ID is required.')
      .describe('The RadFlow patient ID.'),
    documentTypeId: z
      .number()
      .int()
      .default(21)
      .describe('Document type to check. Defaults to 21.'),
    loggedPartnerId: z
      .number()
      .int()
      .default(1)
      .describe('ID of the partner making the request. Defaults to 1.'),
    patientPreferredLanguage: z
      .string()
      .default('english')
      .describe('Language for returned content. Defaults to "english".'),
  })
  .describe('Input parameters for fetching a to-do status.');

const OutputSchema = TodoStatusPayloadSchema;

type GetPatientTodoStatusInput = z.infer<typeof InputSchema>;
type GetPatientTodoStatusOutput = z.infer<typeof OutputSchema>;

async function getPatientTodoStatusLogic(
  input: GetPatientTodoStatusInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<GetPatientTodoStatusOutput> {
  logger.info(`Fetching to-do status for patient ID: ${input.patientId}`, appContext);

  const provider = container.resolve(RadFlowProvider);

  try {
    const status = await provider.getPatientTodoStatus(input, appContext);
    logger.info('Retrieved patient to-do status.', appContext);
    return { success: true, status };
  } catch (error) {
    return toFailurePayload(error, 'get patient to-do status', appContext);
  }
}

export const getPatientTodoStatusTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: getPatientTodoStatusLogic,
};
