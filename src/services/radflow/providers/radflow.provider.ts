/**
 * @fileoverview RadFlow API provider implementation.
 * Builds upstream payloads, attaches basic or bearer credentials, and maps
 * HTTP failures onto typed errors.
 *
 * @module src/services/radflow/providers/radflow.provider
 */

import type { RadFlowConfig } from '../../../config/index.js';
import { JsonRpcErrorCode, McpError } from '../../../types-global/errors.js';
import { logger, type RequestContext } from '../../../utils/index.js';
import { fetchWithTimeout } from '../../../utils/network/fetchWithTimeout.js';
import type { PartnerTokenService } from '../auth/partnerTokenService.js';
import type { IRadFlowProvider } from '../core/IRadFlowProvider.js';
import { MalformedResponseError, UpstreamHttpError } from '../errors.js';
import type {
  CaseUpdateLogEntry,
  PatientLookup,
  TodoStatusRequest,
} from '../types.js';

type RequiredField = 'Details' | 'Study Details';

type Credentials =
  | { kind: 'none' }
  | { kind: 'basic' }
  | { kind: 'bearer'; token: string };

/**
 * Implementation of IRadFlowProvider over the RadFlow REST endpoints.
 */
export class RadFlowProvider implements IRadFlowProvider {
  constructor(
    private readonly settings: RadFlowConfig,
    private readonly partnerTokens: PartnerTokenService,
  ) {}

  /**
   * @inheritdoc
   */
  async searchPatients(
    lookup: PatientLookup,
    context: RequestContext,
  ): Promise<unknown> {
    return this.postJson(
      this.settings.patientDetailsUrl,
      this.detailsPayload(lookup, 'Details'),
      { kind: 'none' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async fetchStudyDetails(
    patientId: string,
    context: RequestContext,
  ): Promise<unknown> {
    return this.postJson(
      this.settings.patientDetailsUrl,
      this.detailsPayload({ patientId }, 'Study Details'),
      { kind: 'none' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async getCaseUpdateDetails(
    patientId: string,
    context: RequestContext,
  ): Promise<unknown> {
    return this.postJson(
      this.settings.caseUpdateDetailsUrl,
      { patientID: patientId },
      { kind: 'basic' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async getPatientReport(
    patientId: string,
    context: RequestContext,
  ): Promise<unknown> {
    return this.postJson(
      this.settings.patientReportUrl,
      { patientID: patientId },
      { kind: 'basic' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async insertCaseUpdateLog(
    entry: CaseUpdateLogEntry,
    context: RequestContext,
  ): Promise<unknown> {
    const payload: Record<string, unknown> = {
      patientId: entry.patientId,
      userName: entry.userName,
      eventId: entry.eventId,
      eventStatus: entry.eventId,
      notes: entry.notes,
      liabilityExpectedDate: entry.liabilityExpectedDate,
      expectedPaymentDate: entry.expectedPaymentDate,
      paymentDateSent: entry.paymentDateSent,
      checkNumber: entry.checkNumber,
      checkAmount: entry.checkAmount,
      sendPaymentOfEstimatedDate: entry.sendPaymentOfEstimatedDate,
    };

    return this.postJson(
      this.settings.insertCaseUpdateLogUrl,
      Object.fromEntries(
        Object.entries(payload).filter(([, value]) => value !== undefined),
      ),
      { kind: 'basic' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async getPatientLienBillBalance(
    patientId: string,
    context: RequestContext,
  ): Promise<unknown> {
    return this.postJson(
      this.settings.lienBillBalanceUrl,
      { patientId },
      { kind: 'basic' },
      context,
    );
  }

  /**
   * @inheritdoc
   */
  async getPatientTodoStatus(
    request: TodoStatusRequest,
    context: RequestContext,
  ): Promise<unknown> {
    const jwtToken = await this.partnerTokens.getToken(context);

    return this.postJson(
      this.settings.todoStatusUrl,
      {
        patientId: request.patientId,
        documentTypeId: request.documentTypeId,
        loggedPartnerId: request.loggedPartnerId,
        jwtToken,
        patientPreferredLanguage: request.patientPreferredLanguage,
      },
      { kind: 'bearer', token: jwtToken },
      context,
    );
  }

  private detailsPayload(
    lookup: PatientLookup,
    requiredField: RequiredField,
  ): Record<string, string> {
    return {
      patientId: lookup.patientId ?? '',
      phone: lookup.phone ?? '',
      firstName: lookup.firstName ?? '',
      lastName: lookup.lastName ?? '',
      birthDate: lookup.birthDate ?? '',
      doi: lookup.doi ?? '',
      accessionNumber: lookup.accessionNumber ?? '',
      requiredField,
    };
  }

  private authorizationHeader(credentials: Credentials): string | undefined {
    switch (credentials.kind) {
      case 'none':
        return undefined;
      case 'bearer':
        return `Bearer ${credentials.token}`;
      case 'basic': {
        const { chatbotUser, chatbotPassword } = this.settings;
        if (!chatbotPassword) {
          throw new McpError(
            JsonRpcErrorCode.ConfigurationError,
            'RadFlow chatbot credentials are not configured',
          );
        }
        const encoded = Buffer.from(
          `${chatbotUser}:${chatbotPassword}`,
        ).toString('base64');
        return `Basic ${encoded}`;
      }
    }
  }

  /**
   * POSTs a JSON body and returns the parsed JSON response.
   *
   * @throws {UpstreamHttpError} On a non-2xx status
   * @throws {MalformedResponseError} If the body is not JSON
   */
  private async postJson(
    url: string,
    body: Record<string, unknown>,
    credentials: Credentials,
    context: RequestContext,
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    const authorization = this.authorizationHeader(credentials);
    if (authorization) {
      headers.Authorization = authorization;
    }

    logger.debug(`[RadFlow] POST ${url}`, context);

    const response = await fetchWithTimeout(
      url,
      this.settings.requestTimeoutMs,
      context,
      {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
      },
    );

    const responseBody = await response.text();

    if (!response.ok) {
      logger.error(`[RadFlow] Error response ${response.status}`, {
        ...context,
        url,
        body: responseBody.slice(0, 500),
      });
      throw new UpstreamHttpError(response.status, {
        url,
        body: responseBody,
      });
    }

    try {
      return JSON.parse(responseBody);
    } catch {
      logger.error('[RadFlow] Response body is not JSON', {
        ...context,
        url,
        body: responseBody.slice(0, 500),
      });
      throw new MalformedResponseError('Invalid JSON response from API', {
        url,
      });
    }
  }
}
