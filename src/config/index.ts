/**
 * @fileoverview Loads, validates, and exports application configuration.
 * Environment variables (plus an optional `.env` file) are read once through a
 * Zod schema; the parsed object is immutable for the lifetime of the process.
 * @module src/config/index
 */
import dotenv from 'dotenv';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '../types-global/errors.js';

// `.env` in the working directory; variables already set take precedence.
// Quiet so nothing reaches stdout, which the stdio transport owns.
dotenv.config({ quiet: true });

const RADFLOW_APP_URL = 'https://app.radflow360.com';
const RADFLOW_STAGING_URL = 'https://staging-app.radflow360.com';

/** Upstream call timeout. Fixed; not configurable from the environment. */
export const RADFLOW_REQUEST_TIMEOUT_MS = 30_000;

const McpLogLevelSchema = z.enum([
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'crit',
  'alert',
  'emerg',
]);

export type McpLogLevel = z.infer<typeof McpLogLevelSchema>;

const emptyStringAsUndefined = (val: unknown) =>
  typeof val === 'string' && val.trim() === '' ? undefined : val;

const optionalString = z.preprocess(
  emptyStringAsUndefined,
  z.string().optional(),
);

const urlWithDefault = (fallback: string) =>
  z.preprocess(emptyStringAsUndefined, z.string().url().default(fallback));

const logLevelAliases: Record<string, McpLogLevel> = {
  warn: 'warning',
  err: 'error',
  critical: 'crit',
  emergency: 'emerg',
};

const environmentAliases: Record<string, string> = {
  dev: 'development',
  prod: 'production',
  test: 'testing',
};

const ConfigSchema = z.object({
  mcpServerName: z.preprocess(
    emptyStringAsUndefined,
    z.string().default('radflow-mcp-server'),
  ),
  mcpServerVersion: z.preprocess(
    emptyStringAsUndefined,
    z.string().default('1.0.0'),
  ),
  logLevel: z.preprocess((val) => {
    const raw = emptyStringAsUndefined(val);
    if (typeof raw !== 'string') return raw;
    const lower = raw.toLowerCase();
    return logLevelAliases[lower] ?? lower;
  }, McpLogLevelSchema.default('info')),
  environment: z.preprocess((val) => {
    const raw = emptyStringAsUndefined(val);
    if (typeof raw !== 'string') return raw;
    const lower = raw.toLowerCase();
    return environmentAliases[lower] ?? lower;
  }, z.enum(['development', 'production', 'testing']).default('development')),
  mcpTransportType: z.preprocess(
    (val) =>
      typeof val === 'string' ? emptyStringAsUndefined(val.toLowerCase()) : val,
    z.enum(['stdio', 'http']).default('stdio'),
  ),
  mcpHttpHost: z.preprocess(
    emptyStringAsUndefined,
    z.string().default('127.0.0.1'),
  ),
  mcpHttpPort: z.preprocess(
    emptyStringAsUndefined,
    z.coerce.number().int().positive().default(8001),
  ),
  mcpHttpEndpointPath: z.preprocess(
    emptyStringAsUndefined,
    z.string().startsWith('/').default('/mcp'),
  ),
  radflow: z.object({
    patientDetailsUrl: urlWithDefault(
      `${RADFLOW_APP_URL}/chatbotapi/Patient/GetPatientStudyRelatedDetails`,
    ),
    partnerTokenUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/patientportalapi/Partner/GetRefreshToken`,
    ),
    todoStatusUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/patientportalapi/Patient/GetPatientToDoStatus`,
    ),
    caseUpdateDetailsUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/chatbotapi/GetCaseUpdateDetailsChatbot`,
    ),
    patientReportUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/chatbotapi/GetPatientReportChatbot`,
    ),
    insertCaseUpdateLogUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/chatbotapi/InsertCaseUpdateLogChatbot`,
    ),
    lienBillBalanceUrl: urlWithDefault(
      `${RADFLOW_STAGING_URL}/chatbotapi/GetPatientLienBillBalanceDetails`,
    ),
    partnerApiKey: optionalString,
    chatbotUser: z.preprocess(
      emptyStringAsUndefined,
      z.string().default('Chatbot'),
    ),
    chatbotPassword: optionalString,
    requestTimeoutMs: z.number().int().positive(),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type RadFlowConfig = AppConfig['radflow'];

/**
 * Parses the current environment into a validated configuration object.
 * @throws {McpError} ConfigurationError when a variable fails validation.
 */
export const parseConfig = (): AppConfig => {
  const env = process.env;

  const rawConfig = {
    mcpServerName: env.MCP_SERVER_NAME,
    mcpServerVersion: env.MCP_SERVER_VERSION,
    logLevel: env.MCP_LOG_LEVEL,
    environment: env.NODE_ENV,
    mcpTransportType: env.MCP_TRANSPORT_TYPE,
    mcpHttpHost: env.MCP_HTTP_HOST,
    mcpHttpPort: env.MCP_HTTP_PORT,
    mcpHttpEndpointPath: env.MCP_HTTP_ENDPOINT_PATH,
    radflow: {
      patientDetailsUrl: env.RADFLOW_API_URL,
      partnerTokenUrl: env.RADFLOW_PARTNER_API_URL,
      todoStatusUrl: env.RADFLOW_TODO_STATUS_API_URL,
      caseUpdateDetailsUrl: env.RADFLOW_CASE_UPDATE_DETAILS_URL,
      patientReportUrl: env.RADFLOW_PATIENT_REPORT_URL,
      insertCaseUpdateLogUrl: env.RADFLOW_INSERT_CASE_UPDATE_LOG_URL,
      lienBillBalanceUrl: env.RADFLOW_LIEN_BILL_BALANCE_URL,
      partnerApiKey: env.RADFLOW_PARTNER_API_KEY,
      chatbotUser: env.RADFLOW_CHATBOT_USER,
      chatbotPassword: env.RADFLOW_CHATBOT_PASSWORD,
      requestTimeoutMs: RADFLOW_REQUEST_TIMEOUT_MS,
    },
  };

  const parsed = ConfigSchema.safeParse(rawConfig);

  if (!parsed.success) {
    // Logger depends on config, so report straight to the console.
    if (process.stdout.isTTY) {
      console.error(
        '❌ Invalid configuration found. Please check your environment variables.',
        parsed.error.flatten().fieldErrors,
      );
    }
    throw new McpError(
      JsonRpcErrorCode.ConfigurationError,
      'Invalid application configuration.',
      { validationErrors: parsed.error.flatten().fieldErrors },
    );
  }

  return Object.freeze(parsed.data);
};

export const config = parseConfig();
