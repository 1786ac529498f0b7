/**
 * @fileoverview Tests for the RadFlow provider: payloads, credentials, and error mapping.
 * @module tests/services/radflow/providers/radflow.provider.test
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';

import type { RadFlowConfig } from '@/config/index.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { requestContextService, type RequestContext } from '@/utils/index.js';

const { mockFetchWithTimeout } = vi.hoisted(() => ({
  mockFetchWithTimeout:
    vi.fn<
      (
        url: string,
        timeoutMs: number,
        context: RequestContext,
        init?: RequestInit,
      ) => Promise<Response>
    >(),
}));

vi.mock('@/utils/network/fetchWithTimeout.js', () => ({
  fetchWithTimeout: mockFetchWithTimeout,
}));

const { RadFlowProvider } = await import(
  '@/services/radflow/providers/radflow.provider.js'
);
const { PartnerTokenService } = await import(
  '@/services/radflow/auth/partnerTokenService.js'
);
const { TokenCache } = await import('@/services/radflow/auth/tokenCache.js');
const { MalformedResponseError, UpstreamHttpError } = await import(
  '@/services/radflow/errors.js'
);

const settings: RadFlowConfig = {
  patientDetailsUrl: 'https://radflow.test/Patient/GetPatientStudyRelatedDetails',
  partnerTokenUrl: 'https://radflow.test/Partner/GetRefreshToken',
  todoStatusUrl: 'https://radflow.test/Patient/GetPatientToDoStatus',
  caseUpdateDetailsUrl: 'https://radflow.test/GetCaseUpdateDetailsChatbot',
  patientReportUrl: 'https://radflow.test/GetPatientReportChatbot',
  insertCaseUpdateLogUrl: 'https://radflow.test/InsertCaseUpdateLogChatbot',
  lienBillBalanceUrl: 'https://radflow.test/GetPatientLienBillBalanceDetails',
  partnerApiKey: 'test-secret',
  chatbotUser: 'Chatbot',
  chatbotPassword: 'test-secret',
  requestTimeoutMs: 30_000,
};

type ChatbotMethod =
  | 'getCaseUpdateDetails'
  | 'getPatientReport'
  | 'getPatientLienBillBalance';

const BASIC_AUTH = 'Basic Q2hhdGJvdDp0ZXN0LXNlY3JldA==';
const JSON_HEADERS = {
  Accept: 'application/json',
  'Content-Type': 'application/json',
};

const context = requestContextService.createRequestContext({
  operation: 'radflow-provider-test',
});

function createProvider(overrides: Partial<RadFlowConfig> = {}) {
  const cache = new TokenCache();
  cache.set('cached-jwt', Math.floor(Date.now() / 1000) + 3600);
  const merged = { ...settings, ...overrides };
  const tokens = new PartnerTokenService(cache, {
    tokenUrl: merged.partnerTokenUrl,
    partnerApiKey: merged.partnerApiKey,
    timeoutMs: merged.requestTimeoutMs,
  });
  return new RadFlowProvider(merged, tokens);
}

function lastRequest() {
  const call = mockFetchWithTimeout.mock.calls.at(-1);
  if (!call) throw new Error('fetchWithTimeout was not called');
  const [url, timeoutMs, , init] = call;
  const body: unknown = JSON.parse(String(init?.body));
  return { url, timeoutMs, method: init?.method, headers: init?.headers, body };
}

describe('RadFlowProvider', () => {
  beforeEach(() => {
    mockFetchWithTimeout.mockReset();
    mockFetchWithTimeout.mockImplementation(
      async () => new Response(JSON.stringify({ ok: true }), { status: 200 }),
    );
  });

  describe('patient details endpoint', () => {
    it('sends unset lookup criteria as empty strings', async () => {
      const provider = createProvider();

      const result = await provider.searchPatients({ phone: '5550100' }, context);

      expect(result).toEqual({ ok: true });
      expect(lastRequest()).toEqual({
        url: settings.patientDetailsUrl,
        timeoutMs: 30_000,
        method: 'POST',
        headers: JSON_HEADERS,
        body: {
          patientId: '',
          phone: '5550100',
          firstName: '',
          lastName: '',
          birthDate: '',
          doi: '',
          accessionNumber: '',
          requiredField: 'Details',
        },
      });
    });

    it('requests study details for a patient', async () => {
      await createProvider().fetchStudyDetails('P1', context);

      expect(lastRequest().body).toEqual({
        patientId: 'P1',
        phone: '',
        firstName: '',
        lastName: '',
        birthDate: '',
        doi: '',
        accessionNumber: '',
        requiredField: 'Study Details',
      });
    });
  });

  describe('chatbot endpoints', () => {
    const chatbotCases: [ChatbotMethod, string, Record<string, string>][] = [
      ['getCaseUpdateDetails', settings.caseUpdateDetailsUrl, { patientID: 'P9' }],
      ['getPatientReport', settings.patientReportUrl, { patientID: 'P9' }],
      [
        'getPatientLienBillBalance',
        settings.lienBillBalanceUrl,
        { patientId: 'P9' },
      ],
    ];

    it.each(chatbotCases)('%s uses basic auth', async (method, url, body) => {
      const provider = createProvider();

      await provider[method]('P9', context);

      expect(lastRequest()).toEqual({
        url,
        timeoutMs: 30_000,
        method: 'POST',
        headers: { ...JSON_HEADERS, Authorization: BASIC_AUTH },
        body,
      });
    });

    it('omits unset optional fields from a case update log', async () => {
      await createProvider().insertCaseUpdateLog(
        {
          patientId: 'P9',
          userName: 'agent',
          eventId: 6,
          paymentDateSent: '04/01/2024',
          checkNumber: '1001',
          checkAmount: 250.5,
        },
        context,
      );

      expect(lastRequest().url).toBe(settings.insertCaseUpdateLogUrl);
      expect(lastRequest().body).toEqual({
        patientId: 'P9',
        userName: 'agent',
        eventId: 6,
        eventStatus: 6,
        paymentDateSent: '04/01/2024',
        checkNumber: '1001',
        checkAmount: 250.5,
      });
    });

    it('refuses to call without a chatbot password', async () => {
      const provider = createProvider({ chatbotPassword: undefined });

      await expect(provider.getPatientReport('P9', context)).rejects.toMatchObject({
        code: JsonRpcErrorCode.ConfigurationError,
      });
      expect(mockFetchWithTimeout).not.toHaveBeenCalled();
    });
  });

  describe('to-do status endpoint', () => {
    it('sends the partner JWT as bearer and in the body', async () => {
      await createProvider().getPatientTodoStatus(
        {
          patientId: 'P3',
          documentTypeId: 21,
          loggedPartnerId: 1,
          patientPreferredLanguage: 'english',
        },
        context,
      );

      expect(lastRequest()).toEqual({
        url: settings.todoStatusUrl,
        timeoutMs: 30_000,
        method: 'POST',
        headers: { ...JSON_HEADERS, Authorization: 'Bearer cached-jwt' },
        body: {
          patientId: 'P3',
          documentTypeId: 21,
          loggedPartnerId: 1,
          jwtToken: 'cached-jwt',
          patientPreferredLanguage: 'english',
        },
      });
    });
  });

  describe('error mapping', () => {
    it('raises UpstreamHttpError on a non-2xx status', async () => {
      mockFetchWithTimeout.mockImplementation(
        async () => new Response('gateway down', { status: 502 }),
      );

      const error = await createProvider()
        .searchPatients({ patientId: 'P1' }, context)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(UpstreamHttpError);
      expect(error).toMatchObject({
        status: 502,
        message: 'API request failed with status 502',
        data: {
          status: 502,
          url: settings.patientDetailsUrl,
          body: 'gateway down',
        },
      });
    });

    it('raises MalformedResponseError on a non-JSON body', async () => {
      mockFetchWithTimeout.mockImplementation(
        async () => new Response('<html>', { status: 200 }),
      );

      const error = await createProvider()
        .getCaseUpdateDetails('P1', context)
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error).toMatchObject({
        code: JsonRpcErrorCode.ValidationError,
        message: 'Invalid JSON response from API',
      });
    });

    it('propagates transport errors unchanged', async () => {
      const timeout = new McpError(
        JsonRpcErrorCode.Timeout,
        'API request timed out after 30 seconds',
      );
      mockFetchWithTimeout.mockRejectedValue(timeout);

      await expect(
        createProvider().fetchStudyDetails('P1', context),
      ).rejects.toBe(timeout);
    });
  });
});
