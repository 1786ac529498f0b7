/**
 * @fileoverview Provider interface for RadFlow API operations.
 *
 * @module src/services/radflow/core/IRadFlowProvider
 */

import type { RequestContext } from '../../../utils/index.js';
import type {
  CaseUpdateLogEntry,
  PatientLookup,
  TodoStatusRequest,
} from '../types.js';

/**
 * Provider interface for the RadFlow chatbot and patient portal APIs.
 * Methods return parsed JSON bodies; patient and study envelopes are left raw
 * for the normalizer.
 *
 * Every method throws on failure:
 * - `McpError` with `Timeout` or `ServiceUnavailable` for transport failures,
 * - `UpstreamHttpError` for non-2xx responses,
 * - `MalformedResponseError` when the body is not JSON.
 */
export interface IRadFlowProvider {
  /**
   * Looks up patient demographics. Unset criteria are sent as empty strings.
   */
  searchPatients(lookup: PatientLookup, context: RequestContext): Promise<unknown>;

  /**
   * Fetches the study list for a patient.
   */
  fetchStudyDetails(patientId: string, context: RequestContext): Promise<unknown>;

  getCaseUpdateDetails(patientId: string, context: RequestContext): Promise<unknown>;

  getPatientReport(patientId: string, context: RequestContext): Promise<unknown>;

  /**
   * Records a case update event. Event-specific field rules are enforced by the caller.
   */
  insertCaseUpdateLog(
    entry: CaseUpdateLogEntry,
    context: RequestContext,
  ): Promise<unknown>;

  getPatientLienBillBalance(
    patientId: string,
    context: RequestContext,
  ): Promise<unknown>;

  /**
   * Fetches the patient's to-do status. Requires a partner JWT.
   *
   * @throws {AuthenticationError} If the partner token cannot be obtained
   */
  getPatientTodoStatus(
    request: TodoStatusRequest,
    context: RequestContext,
  ): Promise<unknown>;
}
