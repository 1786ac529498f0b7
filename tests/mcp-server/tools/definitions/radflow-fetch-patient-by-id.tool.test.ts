/**
 * @fileoverview Tests for the radflow_fetch_patient_by_id tool definition.
 * @module tests/mcp-server/tools/definitions/radflow-fetch-patient-by-id.tool.test
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  createAppContext,
  createMockSdkContext,
  patientEnvelope,
} from '../../../helpers/mcpContext.js';

const { mockSearchPatients } = vi.hoisted(() => ({
  mockSearchPatients: vi.fn(),
}));

vi.mock('@/container/index.js', () => ({
  container: {
    resolve: vi.fn(() => ({ searchPatients: mockSearchPatients })),
  },
  RadFlowProvider: 'RadFlowProvider',
}));

const { fetchPatientByIdTool } = await import(
  '@/mcp-server/tools/definitions/radflow-fetch-patient-by-id.tool.js'
);

describe('fetchPatientByIdTool', () => {
  beforeEach(() => {
    mockSearchPatients.mockReset();
  });

  describe('metadata', () => {
    it('is a read-only lookup', () => {
      expect(fetchPatientByIdTool.name).toBe('radflow_fetch_patient_by_id');
      expect(fetchPatientByIdTool.annotations).toEqual({
        readOnlyHint: true,
        idempotentHint: true,
        openWorldHint: true,
      });
    });
  });

  describe('input validation', () => {
    it('rejects an empty patient ID', () => {
      expect(
        fetchPatientByIdTool.inputSchema.safeParse({ patientId: '' }).success,
      ).toBe(false);
    });

    it('accepts a patient ID', () => {
      expect(
        fetchPatientByIdTool.inputSchema.parse({ patientId: 'P1' }),
      ).toEqual({ patientId: 'P1' });
    });
  });

  describe('logic', () => {
    it('looks up by ID and normalizes the result', async () => {
      mockSearchPatients.mockResolvedValue(
        patientEnvelope([{ PatientId: 'P1', FirstName: 'Jo', LastName: 'Doe' }]),
      );
      const appContext = createAppContext();

      const result = await fetchPatientByIdTool.logic(
        { patientId: 'P1' },
        appContext,
        createMockSdkContext(),
      );

      expect(mockSearchPatients).toHaveBeenCalledWith(
        { patientId: 'P1' },
        appContext,
      );
      expect(result).toMatchObject({
        success: true,
        message: 'Successfully processed 1 patients',
        numbered_list: '1. Jo Doe (ID: P1)',
      });
      expect(result.patients?.[0]).toMatchObject({
        patient_id: 'P1',
        phone: '',
      });
    });

    it('returns the upstream failure as a payload', async () => {
      mockSearchPatients.mockResolvedValue({
        responseStatus: 'Failure',
        exception: 'Patient not found',
      });

      const result = await fetchPatientByIdTool.logic(
        { patientId: 'P404' },
        createAppContext(),
        createMockSdkContext(),
      );

      expect(result).toEqual({ success: false, error: 'Patient not found' });
    });

    it('keeps the message of a classified error', async () => {
      mockSearchPatients.mockRejectedValue(
        new McpError(
          JsonRpcErrorCode.Timeout,
          'API request timed out after 30 seconds',
        ),
      );

      const result = await fetchPatientByIdTool.logic(
        { patientId: 'P1' },
        createAppContext(),
        createMockSdkContext(),
      );

      expect(result).toEqual({
        success: false,
        error: 'API request timed out after 30 seconds',
      });
    });

    it('prefixes an unclassified error with the operation', async () => {
      mockSearchPatients.mockRejectedValue(new Error('socket hang up'));

      const result = await fetchPatientByIdTool.logic(
        { patientId: 'P1' },
        createAppContext(),
        createMockSdkContext(),
      );

      expect(result).toEqual({
        success: false,
        error: 'Failed to fetch patient data: socket hang up',
      });
    });
  });
});
