/**
 * @fileoverview Zod schemas and types for RadFlow data as exposed by this server.
 * Upstream payloads are loosely shaped and are narrowed by the normalizer rather
 * than validated here; the schemas below describe the canonical output records
 * and the tool payloads built from them.
 * @module src/services/radflow/types
 */

import { z } from 'zod';

/** Value of `responseStatus` on a successful upstream envelope. */
export const UPSTREAM_SUCCESS_STATUS = 'Success';

/**
 * Raw RadFlow envelope. `result.result` is either a JSON-encoded string or a
 * native array holding the same list of records.
 */
export interface RawUpstreamEnvelope {
  responseStatus?: unknown;
  exception?: unknown;
  result?: {
    result?: unknown;
    totalPatients?: unknown;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}

/** A single untyped record from the upstream list. */
export type RawRecord = Record<string, unknown>;

export const PatientRecordSchema = z
  .object({
    patient_id: z.string().describe('RadFlow patient identifier.'),
    first_name: z.string(),
    last_name: z.string(),
    phone: z
      .string()
      .describe('Patient phone, or the phone used for the lookup when absent upstream.'),
    sex: z.string(),
    financial_type: z.string(),
    language: z.string(),
    birth_date: z.string(),
    address: z.string(),
    date_of_injury: z.string(),
    date_of_loss: z.string(),
    radiologist_name: z.string(),
  })
  .describe('Normalized patient record; absent upstream fields are empty strings.');

export type PatientRecord = z.infer<typeof PatientRecordSchema>;

export const FacilitySchema = z.object({
  facility_name: z.string(),
  address: z.string(),
});

export const StudyRecordSchema = z
  .object({
    appointment_time: z
      .string()
      .describe('Latest scheduled time, or empty when not yet scheduled.'),
    pre_arrival_minutes: z.number().int(),
    facility: FacilitySchema,
    study_description: z.string(),
    status: z.string().describe('Latest appointment status, "Unknown" if none.'),
    modality: z.string(),
    referring_physician: z.string(),
    insurance: z.string(),
    authorization_number: z.string(),
    study_date_time: z.string(),
  })
  .describe('Normalized study record.');

export type StudyRecord = z.infer<typeof StudyRecordSchema>;

export const PatientDataPayloadSchema = z
  .object({
    success: z.boolean(),
    message: z.string().optional(),
    error: z.string().optional(),
    patients: z.array(PatientRecordSchema).optional(),
    numbered_list: z
      .string()
      .optional()
      .describe('Newline-separated "N. First Last (ID: id)" labels.'),
  })
  .describe('Result of processing a patient lookup.');

export type PatientDataPayload = z.infer<typeof PatientDataPayloadSchema>;

export const StudyDataPayloadSchema = z
  .object({
    success: z.boolean(),
    message: z.string().optional(),
    error: z.string().optional(),
    studies: z.array(StudyRecordSchema).optional(),
  })
  .describe('Result of processing a study lookup.');

export type StudyDataPayload = z.infer<typeof StudyDataPayloadSchema>;

/** Result of a pass-through chatbot call; `data` is the upstream JSON unchanged. */
export const UpstreamDataPayloadSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional().describe('Upstream response body.'),
  error: z.string().optional(),
});

export type UpstreamDataPayload = z.infer<typeof UpstreamDataPayloadSchema>;

export const TodoStatusPayloadSchema = z.object({
  success: z.boolean(),
  status: z.unknown().optional().describe('Upstream to-do status body.'),
  error: z.string().optional(),
});

export type TodoStatusPayload = z.infer<typeof TodoStatusPayloadSchema>;

/**
 * Token endpoint response. Only the path to the JWT is checked here.
 */
export const PartnerTokenResponseSchema = z
  .object({
    result: z.record(z.unknown()),
  })
  .passthrough();

/** Criteria accepted by the patient details endpoint. */
export interface PatientLookup {
  patientId?: string;
  phone?: string;
  firstName?: string;
  lastName?: string;
  birthDate?: string;
  doi?: string;
  accessionNumber?: string;
}

export interface CaseUpdateLogEntry {
  patientId: string;
  userName: string;
  eventId: number;
  notes?: string | undefined;
  liabilityExpectedDate?: string | undefined;
  expectedPaymentDate?: string | undefined;
  paymentDateSent?: string | undefined;
  checkNumber?: string | undefined;
  checkAmount?: number | undefined;
  sendPaymentOfEstimatedDate?: string | undefined;
}

export interface TodoStatusRequest {
  patientId: string;
  documentTypeId: number;
  loggedPartnerId: number;
  patientPreferredLanguage: string;
}
