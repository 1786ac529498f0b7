/**
 * @fileoverview Complete, declarative definition for the 'radflow_fetch_patient_by_phone' tool.
 * Looks up patients in RadFlow by phone number.
 *
 * @module src/mcp-server/tools/definitions/radflow-fetch-patient-by-phone.tool
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

const TOOL_NAME = 'radflow_fetch_patient_by_phone';
const TOOL_TITLE = 'Fetch Patient by Phone';
const TOOL_DESCRIPTION =
  'Fetches patient information from RadFlow by phone number. A "+1" country code is stripped before the lookup. Several patients may share a number; the numbered list helps pick one.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    phone: z
      .string()
      .min(1, 'Phone number is required.')
      .describe('Patient phone number, with or without a "+1" prefix.'),
  })
  .describe('Input parameters for a patient lookup by phone.');

const OutputSchema = PatientDataPayloadSchema;

type FetchPatientByPhoneInput = z.infer<typeof InputSchema>;
type FetchPatientByPhoneOutput = z.infer<typeof OutputSchema>;

/** RadFlow stores numbers without the country code. Every occurrence is removed. */
export const toStoragePhone = (phone: string): string =>
  phone.replaceAll('+1', '');

async function fetchPatientByPhoneLogic(
  input: FetchPatientByPhoneInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<FetchPatientByPhoneOutput> {
  const storagePhone = toStoragePhone(input.phone);
  logger.info('Fetching patient data by phone.', {
    ...appContext,
    storagePhone,
  });

  const provider = container.resolve(RadFlowProvider);

  try {
    const raw = await provider.searchPatients({ phone: storagePhone }, appContext);
    return processPatientData(raw, storagePhone);
  } catch (error) {
    return toFailurePayload(error, 'fetch patient data', appContext);
  }
}

export const fetchPatientByPhoneTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: fetchPatientByPhoneLogic,
};
