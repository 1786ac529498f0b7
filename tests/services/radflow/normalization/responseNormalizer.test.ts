/**
 * @fileoverview Tests for the RadFlow patient and study normalizer.
 * @module tests/services/radflow/normalization/responseNormalizer.test
 */
import { describe, expect, it } from 'vitest';

import {
  normalizePatientList,
  normalizeStudyList,
  processPatientData,
  processStudyData,
  unwrapRecordList,
} from '@/services/radflow/normalization/responseNormalizer.js';

const envelope = (result: unknown, extra: Record<string, unknown> = {}) => ({
  responseStatus: 'Success',
  result: { result, ...extra },
});

const EMPTY_PATIENT = {
  patient_id: '',
  first_name: '',
  last_name: '',
  phone: '',
  sex: '',
  financial_type: '',
  language: '',
  birth_date: '',
  address: '',
  date_of_injury: '',
  date_of_loss: '',
  radiologist_name: '',
};

describe('unwrapRecordList', () => {
  it('parses a JSON-encoded array', () => {
    expect(unwrapRecordList('[{"a":1}]')).toEqual({
      kind: 'list',
      items: [{ a: 1 }],
    });
  });

  it('passes a native array through', () => {
    expect(unwrapRecordList([{ a: 1 }])).toEqual({
      kind: 'list',
      items: [{ a: 1 }],
    });
  });

  it('reports unparseable strings', () => {
    expect(unwrapRecordList('{not json')).toEqual({ kind: 'unparseable' });
  });

  it.each([
    ['an empty array', []],
    ['an encoded empty array', '[]'],
    ['an encoded object', '{"a":1}'],
    ['undefined', undefined],
    ['null', null],
    ['a number', 42],
  ])('treats %s as empty', (_label, value) => {
    expect(unwrapRecordList(value)).toEqual({ kind: 'empty' });
  });
});

describe('processPatientData', () => {
  it('normalizes a string-encoded patient list', () => {
    const raw = {
      responseStatus: 'Success',
      result: {
        result: '[{"PatientId":"P1","FirstName":"Jo","LastName":"Doe"}]',
        totalPatients: 1,
      },
    };

    expect(processPatientData(raw, '555')).toEqual({
      success: true,
      message: 'Successfully processed 1 patients',
      patients: [
        {
          ...EMPTY_PATIENT,
          patient_id: 'P1',
          first_name: 'Jo',
          last_name: 'Doe',
          phone: '555',
        },
      ],
      numbered_list: '1. Jo Doe (ID: P1)',
    });
  });

  it('produces identical records for string and array encodings', () => {
    const items = [
      { PatientId: 'P1', FirstName: 'Ana', Phone: '111', Sex: ' F ' },
      { PatientId: 'P2', LastName: 'Ruiz', LANGUAGE: 'Spanish' },
    ];

    const fromString = processPatientData(envelope(JSON.stringify(items)), '9');
    const fromArray = processPatientData(envelope(items), '9');

    expect(fromString).toEqual(fromArray);
    expect(fromArray.numbered_list).toBe('1. Ana (ID: P1)\n2. Ruiz (ID: P2)');
  });

  it('maps every upstream field', () => {
    const item = {
      PatientId: 'P7',
      FirstName: 'Lee',
      LastName: 'Park',
      Phone: '5551234',
      Sex: '  M ',
      FinancialTypeName: 'Lien',
      LANGUAGE: 'English',
      BirthDate: '01/02/1980',
      ADDRESS: '1 Main St',
      Doi: '03/04/2024',
      DOL: '03/05/2024',
      RadiologistName: 'Dr. Kay',
    };

    const result = normalizePatientList(envelope([item]), 'fallback');

    expect(result).toEqual({
      ok: true,
      value: {
        message: 'Successfully processed 1 patients',
        numberedList: '1. Lee Park (ID: P7)',
        patients: [
          {
            patient_id: 'P7',
            first_name: 'Lee',
            last_name: 'Park',
            phone: '5551234',
            sex: 'M',
            financial_type: 'Lien',
            language: 'English',
            birth_date: '01/02/1980',
            address: '1 Main St',
            date_of_injury: '03/04/2024',
            date_of_loss: '03/05/2024',
            radiologist_name: 'Dr. Kay',
          },
        ],
      },
    });
  });

  it('fills every missing field with an empty string', () => {
    const result = processPatientData(envelope([{}]), '');

    expect(result.patients).toEqual([EMPTY_PATIENT]);
    expect(result.numbered_list).toBe('1.  (ID: )');
  });

  it('renders numeric values as strings and treats null as absent', () => {
    const result = processPatientData(
      envelope([{ PatientId: 1234, Phone: null }]),
      '777',
    );

    expect(result.patients?.[0]?.patient_id).toBe('1234');
    expect(result.patients?.[0]?.phone).toBe('777');
  });

  it('uses the list length when totalPatients is absent', () => {
    const result = processPatientData(envelope([{}, {}]), '');
    expect(result.message).toBe('Successfully processed 2 patients');
  });

  it('uses a string totalPatients as given', () => {
    const result = processPatientData(
      envelope([{}], { totalPatients: '12' }),
      '',
    );
    expect(result.message).toBe('Successfully processed 12 patients');
  });

  it.each([
    ['Failure', undefined, 'API response indicates failure'],
    ['Failure', 'Patient lookup failed', 'Patient lookup failed'],
    ['Failure', '', 'API response indicates failure'],
    [undefined, undefined, 'API response indicates failure'],
  ])(
    'fails on responseStatus %s (exception %s)',
    (responseStatus, exception, expected) => {
      const raw = {
        responseStatus,
        exception,
        result: { result: '[{"PatientId":"P1"}]' },
      };
      expect(processPatientData(raw, '')).toEqual({
        success: false,
        error: expected,
      });
    },
  );

  it('fails when the raw value is not an object', () => {
    expect(processPatientData('nope', '')).toEqual({
      success: false,
      error: 'API response indicates failure',
    });
  });

  it('hides parser details for an unparseable list', () => {
    expect(processPatientData(envelope('[{broken'), '')).toEqual({
      success: false,
      error: 'Failed to parse patient data',
    });
  });

  it.each([[[]], ['[]'], [undefined]])('reports no patients for %j', (list) => {
    expect(processPatientData(envelope(list), '')).toEqual({
      success: false,
      error: 'No patients found',
    });
  });

  it('reports a catch-all failure for a non-object record', () => {
    expect(normalizePatientList(envelope([{}, 'oops']), '')).toEqual({
      ok: false,
      reason: 'ParseError',
      message: 'Failed to process patient data: record 2 is not an object',
    });
  });

  it('returns equal output when run twice', () => {
    const raw = envelope('[{"PatientId":"P1","FirstName":"Jo"}]');
    expect(processPatientData(raw, '1')).toEqual(processPatientData(raw, '1'));
  });
});

describe('processStudyData', () => {
  const study = {
    StudyDescription: 'MRI Lumbar Spine',
    Modality: 'MR',
    SchedulerName: '  Dr. Rivera ',
    AccessionNumber: 'ACC-1',
    StudyDateTime: '2024-05-01T09:00:00',
    AppointmentStatuses: [
      { Status: 'Scheduled', ScheduledFor: '05/01/2024 09:00 AM' },
      { Status: 'Checked In', ScheduledFor: 'Not Yet Scheduled' },
    ],
    FacilityUsed: [
      { FacilityName: 'North Imaging', Address: '9 Elm Rd' },
      { FacilityName: 'South Imaging', Address: '3 Oak Ave' },
    ],
  };

  it('normalizes a study', () => {
    expect(processStudyData(envelope(JSON.stringify([study])), 'P1')).toEqual({
      success: true,
      message: 'Successfully retrieved 1 studies for patient P1',
      studies: [
        {
          appointment_time: '05/01/2024 09:00 AM',
          pre_arrival_minutes: 30,
          facility: { facility_name: 'North Imaging', address: '9 Elm Rd' },
          study_description: 'MRI Lumbar Spine',
          status: 'Checked In',
          modality: 'MR',
          referring_physician: 'Dr. Rivera',
          insurance: '',
          authorization_number: 'ACC-1',
          study_date_time: '2024-05-01T09:00:00',
        },
      ],
    });
  });

  it('keeps the last status in the list', () => {
    const result = normalizeStudyList(
      envelope([{ AppointmentStatuses: [{ Status: 'A' }, { Status: 'B' }] }]),
      'P1',
    );
    expect(result.ok && result.value.studies[0]?.status).toBe('B');
  });

  it('defaults status, time and facility when absent', () => {
    const result = processStudyData(envelope([{}]), 'P2');
    expect(result.studies).toEqual([
      {
        appointment_time: '',
        pre_arrival_minutes: 30,
        facility: { facility_name: '', address: '' },
        study_description: '',
        status: 'Unknown',
        modality: '',
        referring_physician: '',
        insurance: '',
        authorization_number: '',
        study_date_time: '',
      },
    ]);
  });

  it('ignores empty status entries', () => {
    const result = processStudyData(
      envelope([{ AppointmentStatuses: [{ Status: 'Done' }, { Status: '' }, {}] }]),
      'P3',
    );
    expect(result.studies?.[0]?.status).toBe('Done');
  });

  it('uses the study-specific failure messages', () => {
    expect(processStudyData({ responseStatus: 'Error' }, 'P1')).toEqual({
      success: false,
      error: 'Failed to fetch study details',
    });
    expect(processStudyData(envelope('nope['), 'P1')).toEqual({
      success: false,
      error: 'Failed to parse study data',
    });
    expect(processStudyData(envelope('[]'), 'P1')).toEqual({
      success: false,
      error: 'No studies found',
    });
  });

  it('reports a catch-all failure for a non-object study', () => {
    expect(processStudyData(envelope([null]), 'P1')).toEqual({
      success: false,
      error: 'Failed to process study details: record 1 is not an object',
    });
  });
});
