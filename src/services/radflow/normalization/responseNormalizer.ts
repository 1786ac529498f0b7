/**
 * @fileoverview Normalizes RadFlow patient and study envelopes into canonical records.
 * All functions here are synchronous and stateless; failures are returned, never thrown.
 *
 * @module src/services/radflow/normalization/responseNormalizer
 */

import {
  UPSTREAM_SUCCESS_STATUS,
  type PatientDataPayload,
  type PatientRecord,
  type RawRecord,
  type StudyDataPayload,
  type StudyRecord,
} from '../types.js';

export type FailureReason = 'UpstreamStatus' | 'ParseError' | 'Empty';

export type NormalizationResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FailureReason; message: string };

/** Outcome of reading the nested `result.result` field. */
export type Unwrapped =
  | { kind: 'empty' }
  | { kind: 'list'; items: unknown[] }
  | { kind: 'unparseable' };

export interface PatientList {
  message: string;
  patients: PatientRecord[];
  numberedList: string;
}

export interface StudyList {
  message: string;
  studies: StudyRecord[];
}

/** Study pre-arrival time; RadFlow does not send one. */
export const DEFAULT_PRE_ARRIVAL_MINUTES = 30;
export const UNKNOWN_STUDY_STATUS = 'Unknown';
const NOT_YET_SCHEDULED = 'Not Yet Scheduled';

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Reads a field as a string; numbers are stringified, anything else is absent. */
const readString = (item: RawRecord, key: string): string | undefined => {
  const value = item[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
};

const fieldOrEmpty = (item: RawRecord, key: string): string =>
  readString(item, key) ?? '';

const listOf = (items: unknown[]): Unwrapped =>
  items.length === 0 ? { kind: 'empty' } : { kind: 'list', items };

/**
 * Resolves the double-encoded record list. A string is parsed as JSON, an array
 * is used as-is, and every other value (including a parsed non-array) is empty.
 */
export function unwrapRecordList(value: unknown): Unwrapped {
  if (typeof value === 'string') {
    let parsed: unknown;
    try {
      parsed = JSON.parse(value);
    } catch {
      return { kind: 'unparseable' };
    }
    return Array.isArray(parsed) ? listOf(parsed) : { kind: 'empty' };
  }
  if (Array.isArray(value)) {
    return listOf(value);
  }
  return { kind: 'empty' };
}

interface EnvelopeMessages {
  statusFailure: string;
  parseFailure: string;
  empty: string;
}

interface UnwrappedEnvelope {
  items: unknown[];
  result: RawRecord;
}

/** Status gate plus unwrap, shared by patients and studies. */
function openEnvelope(
  raw: unknown,
  messages: EnvelopeMessages,
): NormalizationResult<UnwrappedEnvelope> {
  const envelope: RawRecord = isRecord(raw) ? raw : {};

  if (envelope.responseStatus !== UPSTREAM_SUCCESS_STATUS) {
    const exception = envelope.exception;
    return {
      ok: false,
      reason: 'UpstreamStatus',
      message:
        typeof exception === 'string' && exception
          ? exception
          : messages.statusFailure,
    };
  }

  const result: RawRecord = isRecord(envelope.result) ? envelope.result : {};
  const unwrapped = unwrapRecordList(result.result);

  switch (unwrapped.kind) {
    case 'unparseable':
      return { ok: false, reason: 'ParseError', message: messages.parseFailure };
    case 'empty':
      return { ok: false, reason: 'Empty', message: messages.empty };
    case 'list':
      return { ok: true, value: { items: unwrapped.items, result } };
  }
}

const requireRecord = (item: unknown, index: number): RawRecord => {
  if (!isRecord(item)) {
    throw new Error(`record ${index + 1} is not an object`);
  }
  return item;
};

const reasonOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function toPatientRecord(item: RawRecord, fallbackPhone: string): PatientRecord {
  return {
    patient_id: fieldOrEmpty(item, 'PatientId'),
    first_name: fieldOrEmpty(item, 'FirstName'),
    last_name: fieldOrEmpty(item, 'LastName'),
    phone: readString(item, 'Phone') ?? fallbackPhone,
    sex: fieldOrEmpty(item, 'Sex').trim(),
    financial_type: fieldOrEmpty(item, 'FinancialTypeName'),
    language: fieldOrEmpty(item, 'LANGUAGE'),
    birth_date: fieldOrEmpty(item, 'BirthDate'),
    address: fieldOrEmpty(item, 'ADDRESS'),
    date_of_injury: fieldOrEmpty(item, 'Doi'),
    date_of_loss: fieldOrEmpty(item, 'DOL'),
    radiologist_name: fieldOrEmpty(item, 'RadiologistName'),
  };
}

const patientLabel = (patient: PatientRecord, position: number): string => {
  const name = `${patient.first_name} ${patient.last_name}`.trim();
  return `${position}. ${name} (ID: ${patient.patient_id})`;
};

/**
 * Converts a patient lookup envelope into normalized records.
 *
 * @param raw - Parsed upstream JSON
 * @param fallbackPhone - Used for records without a `Phone` field
 */
export function normalizePatientList(
  raw: unknown,
  fallbackPhone: string,
): NormalizationResult<PatientList> {
  try {
    const opened = openEnvelope(raw, {
      statusFailure: 'API response indicates failure',
      parseFailure: 'Failed to parse patient data',
      empty: 'No patients found',
    });
    if (!opened.ok) return opened;

    const { items, result } = opened.value;
    const patients = items.map((item, index) =>
      toPatientRecord(requireRecord(item, index), fallbackPhone),
    );
    const numberedList = patients
      .map((patient, index) => patientLabel(patient, index + 1))
      .join('\n');

    const total = readString(result, 'totalPatients') ?? String(patients.length);

    return {
      ok: true,
      value: {
        message: `Successfully processed ${total} patients`,
        patients,
        numberedList,
      },
    };
  } catch (error) {
    return {
      ok: false,
      reason: 'ParseError',
      message: `Failed to process patient data: ${reasonOf(error)}`,
    };
  }
}

/**
 * Walks every appointment status entry; later entries overwrite earlier ones.
 */
function latestAppointment(study: RawRecord): {
  status: string;
  scheduledTime: string;
} {
  let status = UNKNOWN_STUDY_STATUS;
  let scheduledTime = '';

  const statuses = study.AppointmentStatuses;
  if (Array.isArray(statuses)) {
    for (const entry of statuses) {
      if (!isRecord(entry)) continue;
      const candidateStatus = readString(entry, 'Status');
      if (candidateStatus) {
        status = candidateStatus;
      }
      const scheduledFor = readString(entry, 'ScheduledFor');
      if (scheduledFor && scheduledFor !== NOT_YET_SCHEDULED) {
        scheduledTime = scheduledFor;
      }
    }
  }

  return { status, scheduledTime };
}

function toStudyRecord(study: RawRecord): StudyRecord {
  const { status, scheduledTime } = latestAppointment(study);

  const facilities = study.FacilityUsed;
  const firstFacility: RawRecord =
    Array.isArray(facilities) && isRecord(facilities[0]) ? facilities[0] : {};

  return {
    appointment_time: scheduledTime,
    pre_arrival_minutes: DEFAULT_PRE_ARRIVAL_MINUTES,
    facility: {
      facility_name: fieldOrEmpty(firstFacility, 'FacilityName'),
      address: fieldOrEmpty(firstFacility, 'Address'),
    },
    study_description: fieldOrEmpty(study, 'StudyDescription'),
    status,
    modality: fieldOrEmpty(study, 'Modality'),
    referring_physician: fieldOrEmpty(study, 'SchedulerName').trim(),
    insurance: '',
    authorization_number: fieldOrEmpty(study, 'AccessionNumber'),
    study_date_time: fieldOrEmpty(study, 'StudyDateTime'),
  };
}

/**
 * Converts a study details envelope into normalized records.
 */
export function normalizeStudyList(
  raw: unknown,
  patientId: string,
): NormalizationResult<StudyList> {
  try {
    const opened = openEnvelope(raw, {
      statusFailure: 'Failed to fetch study details',
      parseFailure: 'Failed to parse study data',
      empty: 'No studies found',
    });
    if (!opened.ok) return opened;

    const studies = opened.value.items.map((item, index) =>
      toStudyRecord(requireRecord(item, index)),
    );

    return {
      ok: true,
      value: {
        message: `Successfully retrieved ${studies.length} studies for patient ${patientId}`,
        studies,
      },
    };
  } catch (error) {
    return {
      ok: false,
      reason: 'ParseError',
      message: `Failed to process study details: ${reasonOf(error)}`,
    };
  }
}

/**
 * Wire form of {@link normalizePatientList}.
 */
export function processPatientData(
  raw: unknown,
  fallbackPhone: string,
): PatientDataPayload {
  const result = normalizePatientList(raw, fallbackPhone);
  if (!result.ok) {
    return { success: false, error: result.message };
  }
  return {
    success: true,
    message: result.value.message,
    patients: result.value.patients,
    numbered_list: result.value.numberedList,
  };
}

/**
 * Wire form of {@link normalizeStudyList}.
 */
export function processStudyData(
  raw: unknown,
  patientId: string,
): StudyDataPayload {
  const result = normalizeStudyList(raw, patientId);
  if (!result.ok) {
    return { success: false, error: result.message };
  }
  return {
    success: true,
    message: result.value.message,
    studies: result.value.studies,
  };
}
